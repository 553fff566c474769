/**
 * Switch Tool - selects the current environment
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import {
  environmentNames,
  hasEnvironment,
  hasEnvironments,
  normalizeName,
  resolveCurrentEnvironment,
} from '../../domain/environments';
import { EnvironmentNotFoundError, NoEnvironmentsError } from '../../lib/errors';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { switchSchema, type SwitchParams } from './schema';

async function switchImpl(
  params: SwitchParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<string>> {
  const { output, prompter, store } = context;
  const record = await store.load();

  if (!hasEnvironments(record)) {
    return Failure(new NoEnvironmentsError());
  }

  let environment: string;
  if (params.environment) {
    environment = normalizeName(params.environment);
  } else {
    const current = resolveCurrentEnvironment(record);
    environment = await prompter.select(
      'Select environment:',
      environmentNames(record).map((name) => ({
        name: name === current ? `${name} (current)` : name,
        value: name,
      })),
      current,
    );
  }

  if (!hasEnvironment(record, environment)) {
    return Failure(new EnvironmentNotFoundError(environment));
  }

  await store.setCurrentEnvironment(environment);
  logger.info({ environment }, 'Switched environment');
  output.line(`Switched to environment: ${environment}`);

  return Success(environment);
}

export const switchEnvironment = wrapTool('switch', switchSchema, switchImpl);
