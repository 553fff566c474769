/**
 * Commit Tool
 *
 * Saves the environment's pending container as the user's personal image,
 * pushes it, and clears the pending container.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { getEnvironment, personalImageReference } from '../../domain/environments';
import {
  EnvironmentNotFoundError,
  NoContainerToCommitError,
  NotLoggedInError,
} from '../../lib/errors';
import { resolveTargetEnvironment, shortId } from '../helpers';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { commitSchema, type CommitParams } from './schema';

export interface CommitResult {
  environment: string;
  image: string;
  containerId: string;
  containerRemoved: boolean;
}

async function commitImpl(
  params: CommitParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<CommitResult>> {
  const { output, store } = context;
  const record = await store.load();

  if (!record.username) {
    return Failure(new NotLoggedInError());
  }
  if (!record.authToken) {
    return Failure(
      new NotLoggedInError("missing authentication token. Please run 'devdrop login' again"),
    );
  }

  const targetResult = resolveTargetEnvironment(record, params.environment);
  if (!targetResult.ok) {
    return Failure(targetResult.error);
  }
  const environment = targetResult.value;

  const existing = getEnvironment(record, environment);
  if (!existing) {
    return Failure(new EnvironmentNotFoundError(environment));
  }
  const containerId = existing.lastContainer;
  if (!containerId) {
    return Failure(new NoContainerToCommitError(environment));
  }

  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return Failure(engineResult.error);
  }
  const engine = engineResult.value;

  const image = personalImageReference(record.username, environment);

  output.line(`Committing environment: ${environment}`);
  output.line(`Container: ${shortId(containerId)}`);
  output.line(`Image: ${image}`);

  const commitResult = await engine.commitContainer(containerId, image);
  if (!commitResult.ok) {
    return Failure(commitResult.error);
  }
  output.line('Container committed successfully!');

  output.line(`Pushing image ${image}...`);
  const pushResult = await engine.pushImage(image, record.authToken);
  if (!pushResult.ok) {
    return Failure(pushResult.error);
  }
  output.line('Image pushed successfully!');

  await store.addOrUpdateEnvironment(environment, {
    ...existing,
    image,
    lastUpdated: context.now(),
    lastContainer: '',
  });
  logger.info({ environment, image }, 'Environment committed');

  output.line(`Cleaning up container ${shortId(containerId)}...`);
  const removeResult = await engine.removeContainer(containerId);
  if (removeResult.ok) {
    output.line('Container cleaned up successfully!');
  } else {
    output.warn(`failed to remove container: ${removeResult.error.message}`);
  }

  output.line();
  output.line(`Environment '${environment}' successfully committed and pushed as ${image}`);
  output.line(
    `You can now run 'devdrop run ${environment}' to use your customized environment in any project!`,
  );

  return Success({ environment, image, containerId, containerRemoved: removeResult.ok });
}

export const commit = wrapTool('commit', commitSchema, commitImpl);
