/**
 * List Tool
 *
 * Shows locally configured environments and the `devdrop-*` repositories
 * the user has in the registry. A failed registry listing is reported
 * inline and does not fail the command.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result, type RegistryRecord } from '../../domain/types';
import {
  environmentNames,
  hasEnvironment,
  resolveCurrentEnvironment,
} from '../../domain/environments';
import { ENVIRONMENT_PREFIX } from '../../config/defaults';
import { NotLoggedInError } from '../../lib/errors';
import type { Output } from '../../infrastructure/output';
import { formatTimestamp, shortId } from '../helpers';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { listSchema, type ListParams } from './schema';

export interface ListResult {
  current: string;
  local: string[];
  /** Undefined when not requested or when the listing failed */
  remote?: string[];
}

function printLocal(record: RegistryRecord, current: string, output: Output): string[] {
  const names = environmentNames(record);
  output.line('Local Environments:');
  if (names.length === 0) {
    output.line('  (none configured)');
    return names;
  }

  for (const name of names) {
    const environment = record.environments[name];
    if (!environment) continue;

    output.line(`  ${name === current ? '*' : ' '} ${name}`);
    output.line(`    Base: ${environment.baseImage}`);
    if (environment.image) {
      output.line(`    Image: ${environment.image}`);
    }
    output.line(`    Created: ${formatTimestamp(environment.created)}`);
    if (environment.lastUpdated.getTime() !== 0) {
      output.line(`    Updated: ${formatTimestamp(environment.lastUpdated)}`);
    }
    if (environment.lastContainer) {
      output.line(`    Pending container: ${shortId(environment.lastContainer)}`);
    }
    output.line();
  }
  return names;
}

async function listImpl(
  params: ListParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<ListResult>> {
  const { catalog, output, store } = context;
  const record = await store.load();

  if (!record.username) {
    return Failure(new NotLoggedInError("not logged in. Please run 'devdrop login' first"));
  }

  const current = resolveCurrentEnvironment(record);
  const result: ListResult = { current, local: [] };

  if (!params.remoteOnly) {
    result.local = printLocal(record, current, output);
  }

  if (!params.localOnly) {
    output.line('Remote Environments (registry):');
    const remote = await catalog.listRepositoriesWithPrefix(record.username, ENVIRONMENT_PREFIX);
    if (!remote.ok) {
      logger.debug({ code: remote.error.code }, 'Remote listing failed');
      output.line(`  Error fetching remote images: ${remote.error.message}`);
    } else if (remote.value.length === 0) {
      output.line(`  (no ${ENVIRONMENT_PREFIX} images found)`);
      result.remote = [];
    } else {
      for (const name of remote.value) {
        const localStatus = hasEnvironment(record, name) ? 'configured locally' : 'not pulled';
        output.line(`  ${name} (${localStatus})`);
      }
      result.remote = remote.value;
    }
  }

  if (current && !params.remoteOnly) {
    output.line();
    output.line(`Current environment: ${current}`);
  }

  return Success(result);
}

export const listEnvironments = wrapTool('ls', listSchema, listImpl);
