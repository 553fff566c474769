/**
 * Status Tool
 *
 * Summarizes login state and the current environment. Missing login or
 * environments are reported, not treated as failures.
 */

import type { Logger } from 'pino';
import { Success, type Result } from '../../domain/types';
import {
  environmentNames,
  getEnvironment,
  hasEnvironments,
  personalImageReference,
  resolveCurrentEnvironment,
} from '../../domain/environments';
import { formatTimestamp } from '../helpers';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { statusSchema, type StatusParams } from './schema';

export type StatusState = 'not-logged-in' | 'no-environments' | 'no-current-environment' | 'active';

export interface StatusResult {
  state: StatusState;
  username?: string;
  environment?: string;
  /** Engine state of the pending container, when there is one and it could be read */
  containerState?: string;
}

async function describeContainer(
  containerId: string,
  context: ToolContext,
  logger: Logger,
): Promise<{ label: string; state?: string }> {
  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return { label: 'Docker connection failed' };
  }
  const inspected = await engineResult.value.inspectContainer(containerId);
  if (!inspected.ok) {
    logger.debug({ containerId, error: inspected.error.message }, 'Container inspect failed');
    return { label: 'state unavailable' };
  }
  return { label: inspected.value.state, state: inspected.value.state };
}

async function statusImpl(
  _params: StatusParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<StatusResult>> {
  const { output, store } = context;
  const record = await store.load();

  if (!record.username) {
    output.line('Status: Not logged in');
    output.line("Run 'devdrop login' to authenticate with Docker Hub");
    return Success({ state: 'not-logged-in' });
  }

  const { username } = record;
  output.line(`User: ${username}`);

  if (!hasEnvironments(record)) {
    output.line('Status: No environments configured');
    output.line("Run 'devdrop init' to create your first environment");
    return Success({ state: 'no-environments', username });
  }

  const current = resolveCurrentEnvironment(record);
  const environment = getEnvironment(record, current);
  if (!environment) {
    output.line('Status: No active environment');
    output.line("Run 'devdrop switch' to select an environment");
    return Success({ state: 'no-current-environment', username });
  }

  output.line(`Current Environment: ${current}`);
  output.line(`Base Image: ${environment.baseImage}`);
  output.line(`Created: ${formatTimestamp(environment.created)}`);
  if (environment.lastUpdated.getTime() !== 0) {
    output.line(`Last Updated: ${formatTimestamp(environment.lastUpdated)}`);
  }
  if (environment.description) {
    output.line(`Description: ${environment.description}`);
  }

  const result: StatusResult = { state: 'active', username, environment: current };

  if (environment.lastContainer) {
    const container = await describeContainer(environment.lastContainer, context, logger);
    output.line(`Last Container: ${environment.lastContainer} (${container.label})`);
    if (container.state) {
      result.containerState = container.state;
    }
  }

  output.line(`Expected Image: ${personalImageReference(username, current)}`);

  const names = environmentNames(record);
  output.line();
  output.line(`Total Environments: ${names.length}`);

  const others = names.filter((name) => name !== current);
  if (others.length > 0) {
    output.line('Other Environments:');
    for (const name of others) {
      output.line(`  ${name}`);
    }
  }

  return Success(result);
}

export const status = wrapTool('status', statusSchema, statusImpl);
