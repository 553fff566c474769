/**
 * Pull Tool
 *
 * Fetches the latest pushed version of an environment and records it
 * locally, so a second machine can pick up an environment committed
 * elsewhere.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result, type RegistryRecord } from '../../domain/types';
import {
  createEnvironment,
  environmentNames,
  getEnvironment,
  hasEnvironment,
  normalizeName,
  personalImageReference,
  resolveCurrentEnvironment,
} from '../../domain/environments';
import { ENVIRONMENT_PREFIX } from '../../config/defaults';
import { ImageNotFoundError, NoEnvironmentsError, NotLoggedInError } from '../../lib/errors';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { pullSchema, type PullParams } from './schema';

export interface PullResult {
  environment: string;
  image: string;
  /** True when the environment was not configured locally before */
  created: boolean;
}

async function pickEnvironment(
  record: RegistryRecord,
  context: ToolContext,
): Promise<Result<string>> {
  const { catalog, output, prompter } = context;

  const remote = await catalog.listRepositoriesWithPrefix(record.username, ENVIRONMENT_PREFIX);
  if (!remote.ok) {
    output.warn(`could not list remote environments: ${remote.error.message}`);
  }
  const remoteNames = remote.ok ? remote.value : [];

  const names = [...new Set([...environmentNames(record), ...remoteNames])].sort((a, b) =>
    a.localeCompare(b),
  );
  if (names.length === 0) {
    return Failure(new NoEnvironmentsError());
  }

  const current = resolveCurrentEnvironment(record);
  const choices = names.map((name) => {
    const markers = [
      name === current ? 'current' : '',
      hasEnvironment(record, name) ? '' : 'remote only',
    ].filter(Boolean);
    return {
      name: markers.length > 0 ? `${name} (${markers.join(', ')})` : name,
      value: name,
    };
  });

  return Success(
    await prompter.select(
      'Select environment to pull:',
      choices,
      current && names.includes(current) ? current : undefined,
    ),
  );
}

function notFoundGuidance(environment: string, image: string, cause: Error): ImageNotFoundError {
  return new ImageNotFoundError(
    image,
    [
      `environment '${environment}' not found in the registry.`,
      '',
      'This usually means:',
      `1. The environment hasn't been committed yet - run 'devdrop commit ${environment}'`,
      "2. The environment name is incorrect - run 'devdrop ls' to see available environments",
      "3. You don't have access to this image",
      '',
      `Image name: ${image}`,
    ].join('\n'),
    cause,
  );
}

async function pullImpl(
  params: PullParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<PullResult>> {
  const { output, store } = context;
  const record = await store.load();

  if (!record.username) {
    return Failure(new NotLoggedInError());
  }

  let environment: string;
  if (params.environment) {
    environment = normalizeName(params.environment);
  } else {
    const picked = await pickEnvironment(record, context);
    if (!picked.ok) {
      return Failure(picked.error);
    }
    environment = picked.value;
  }

  const image = personalImageReference(record.username, environment);

  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return Failure(engineResult.error);
  }

  output.line(`Pulling environment '${environment}': ${image}`);
  const pullResult = await engineResult.value.pullImage(image, record.authToken || undefined);
  if (!pullResult.ok) {
    if (pullResult.error instanceof ImageNotFoundError) {
      return Failure(notFoundGuidance(environment, image, pullResult.error));
    }
    return Failure(pullResult.error);
  }

  const now = context.now();
  const existing = getEnvironment(record, environment);
  await store.addOrUpdateEnvironment(
    environment,
    existing
      ? { ...existing, image, lastUpdated: now }
      : createEnvironment(now, { image, description: 'Pulled from registry' }),
  );
  logger.info({ environment, image, created: !existing }, 'Environment pulled');

  output.line('Environment pulled successfully!');
  output.line(`Environment: ${environment}`);
  output.line(`Image: ${image}`);
  output.line();
  output.line(`Run 'devdrop run ${environment}' to use this environment in any project.`);

  return Success({ environment, image, created: !existing });
}

export const pull = wrapTool('pull', pullSchema, pullImpl);
