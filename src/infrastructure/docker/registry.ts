/**
 * Docker Hub Registry Client
 *
 * Lists the repositories a user has pushed, so `ls` and `pull` can show
 * environments that exist remotely but not in the local config.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import type { ApplicationConfig } from '../../config/types';
import { RegistryRequestError, errorMessage } from '../../lib/errors';

const repositoryPageSchema = z.object({
  next: z.string().nullish(),
  results: z
    .array(
      z.object({
        name: z.string(),
      }),
    )
    .default([]),
});

export interface RegistryCatalog {
  /**
   * Repository names under `username` that start with `prefix`, ascending
   */
  listRepositoriesWithPrefix: (username: string, prefix: string) => Promise<Result<string[]>>;
}

/** Docker Hub never needs this many pages for one user; stops a looping `next` */
const MAX_PAGES = 50;

async function fetchPage(
  url: string,
  timeout: number,
  logger: Logger,
): Promise<Result<z.infer<typeof repositoryPageSchema>>> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    return Failure(
      new RegistryRequestError(
        `failed to fetch repositories: ${errorMessage(error)}`,
        { url },
        error instanceof Error ? error : undefined,
      ),
    );
  }

  if (!response.ok) {
    logger.debug({ url, status: response.status }, 'Docker Hub request failed');
    return Failure(
      new RegistryRequestError(`failed to fetch repositories: status ${response.status}`, {
        url,
        status: response.status,
      }),
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return Failure(
      new RegistryRequestError(
        `failed to decode repositories response: ${errorMessage(error)}`,
        { url },
        error instanceof Error ? error : undefined,
      ),
    );
  }

  const parsed = repositoryPageSchema.safeParse(body);
  if (!parsed.success) {
    return Failure(
      new RegistryRequestError('unexpected repositories response from Docker Hub', {
        url,
        issues: parsed.error.issues.map((issue) => issue.message),
      }),
    );
  }
  return Success(parsed.data);
}

/**
 * Create the Docker Hub catalog client
 */
export function createRegistryCatalog(config: ApplicationConfig, logger: Logger): RegistryCatalog {
  const log = logger.child({ component: 'RegistryCatalog' });

  return {
    async listRepositoriesWithPrefix(username: string, prefix: string): Promise<Result<string[]>> {
      const names: string[] = [];
      let url: string | null | undefined =
        `${config.registry.hubUrl}/v2/repositories/${encodeURIComponent(username)}/?page_size=${config.registry.pageSize}`;

      for (let page = 0; url && page < MAX_PAGES; page++) {
        const result = await fetchPage(url, config.registry.timeout, log);
        if (!result.ok) {
          return result;
        }
        for (const repository of result.value.results) {
          if (repository.name.startsWith(prefix)) {
            names.push(repository.name);
          }
        }
        url = result.value.next;
      }

      log.debug({ username, count: names.length }, 'Listed registry repositories');
      return Success(names.sort((a, b) => a.localeCompare(b)));
    },
  };
}
