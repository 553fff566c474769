/**
 * Docker engine client for environment operations
 *
 * Image and container lifecycle go through the Engine API (dockerode). The
 * interactive session is the one exception: TTY attach is delegated to
 * `docker start -ai`, which handles raw mode and resizes.
 */

import Docker from 'dockerode';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import type { ApplicationConfig } from '../../config/types';
import { DEFAULT_CONTAINER } from '../../config/defaults';
import { decodeAuthToken } from '../../lib/auth';
import {
  ConnectionError,
  EngineOperationError,
  ImageNotFoundError,
  errorMessage,
  isDevDropError,
  isImageNotFoundFailure,
} from '../../lib/errors';
import { CommandExecutor } from '../command-executor';

export interface RegistryLoginResult {
  status: string;
  identityToken?: string;
}

export interface ContainerStatus {
  id: string;
  /** Engine state such as `running`, `exited` or `created` */
  state: string;
}

/**
 * Container engine operations used by the commands.
 */
export interface ContainerEngine {
  /**
   * Pull an image; fails with ImageNotFoundError when the registry has no such image.
   * @param authToken - Stored registry token, needed for private images
   */
  pullImage: (ref: string, authToken?: string) => Promise<Result<void>>;

  imageExists: (ref: string) => Promise<boolean>;

  /**
   * Create a stopped container running a shell.
   * @param workdirMount - Host directory to bind at /workspace
   * @returns The new container id
   */
  createContainer: (image: string, workdirMount?: string) => Promise<Result<string>>;

  /**
   * Start the container attached to this process' terminal and wait for it
   * to exit. Shell exit codes 0-2 count as success.
   */
  runInteractive: (containerId: string) => Promise<Result<void>>;

  commitContainer: (containerId: string, imageRef: string) => Promise<Result<void>>;

  pushImage: (imageRef: string, authToken: string) => Promise<Result<void>>;

  removeContainer: (containerId: string) => Promise<Result<void>>;

  registryLogin: (username: string, password: string) => Promise<Result<RegistryLoginResult>>;

  inspectContainer: (containerId: string) => Promise<Result<ContainerStatus>>;
}

export interface ImageReference {
  repository: string;
  tag: string;
}

/**
 * Split `repo[:tag]`; a colon before the last slash belongs to a registry host
 */
export function parseImageReference(ref: string): ImageReference {
  const lastColon = ref.lastIndexOf(':');
  const lastSlash = ref.lastIndexOf('/');
  if (lastColon > lastSlash) {
    return { repository: ref.slice(0, lastColon), tag: ref.slice(lastColon + 1) || 'latest' };
  }
  return { repository: ref, tag: 'latest' };
}

interface DockerProgressEvent {
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
}

const loginResponseSchema = z.object({
  Status: z.string().default(''),
  IdentityToken: z.string().optional(),
});

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Build the dockerode client for the configured daemon
 */
export function createDocker(config: ApplicationConfig): Docker {
  return config.docker.socketPath ? new Docker({ socketPath: config.docker.socketPath }) : new Docker();
}

/**
 * Create an engine bound to an already constructed dockerode client
 */
export function createDockerEngine(
  docker: Docker,
  config: ApplicationConfig,
  logger: Logger,
  executor: CommandExecutor = new CommandExecutor(logger),
): ContainerEngine {
  const log = logger.child({ component: 'DockerEngine' });

  const followProgress = (
    stream: NodeJS.ReadableStream,
    label: string,
  ): Promise<DockerProgressEvent[]> =>
    new Promise((resolve, reject) => {
      const events: DockerProgressEvent[] = [];
      docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) {
            reject(err);
            return;
          }
          const failed = events.find((event) => event.error || event.errorDetail?.message);
          if (failed) {
            reject(new Error(failed.errorDetail?.message ?? failed.error));
            return;
          }
          resolve(events);
        },
        (event: DockerProgressEvent) => {
          events.push(event);
          log.debug({ event }, `Docker ${label} progress`);
        },
      );
    });

  const cliEnv = (): NodeJS.ProcessEnv =>
    config.docker.socketPath
      ? { ...process.env, DOCKER_HOST: `unix://${config.docker.socketPath}` }
      : process.env;

  return {
    async pullImage(ref: string, authToken?: string): Promise<Result<void>> {
      try {
        log.debug({ ref }, 'Pulling image');
        const options = authToken ? { authconfig: decodeAuthToken(authToken) } : {};
        const stream: NodeJS.ReadableStream = await docker.pull(ref, options);
        await followProgress(stream, 'pull');
        log.info({ ref }, 'Image pulled');
        return Success(undefined);
      } catch (error) {
        if (isDevDropError(error)) {
          return Failure(error);
        }
        log.debug({ ref, error: errorMessage(error) }, 'Image pull failed');
        if (isImageNotFoundFailure(error)) {
          return Failure(
            new ImageNotFoundError(ref, `image ${ref} not found: ${errorMessage(error)}`, asError(error)),
          );
        }
        return Failure(
          new EngineOperationError(
            'pull',
            `failed to pull image ${ref}: ${errorMessage(error)}`,
            { ref },
            asError(error),
          ),
        );
      }
    },

    async imageExists(ref: string): Promise<boolean> {
      try {
        await docker.getImage(ref).inspect();
        return true;
      } catch (error) {
        log.debug({ ref, error: errorMessage(error) }, 'Image not available locally');
        return false;
      }
    },

    async createContainer(image: string, workdirMount?: string): Promise<Result<string>> {
      try {
        const container = await docker.createContainer({
          Image: image,
          Cmd: [DEFAULT_CONTAINER.shell],
          Tty: true,
          OpenStdin: true,
          StdinOnce: false,
          AttachStdin: true,
          AttachStdout: true,
          AttachStderr: true,
          ...(workdirMount
            ? {
                WorkingDir: DEFAULT_CONTAINER.workspaceDir,
                HostConfig: { Binds: [`${workdirMount}:${DEFAULT_CONTAINER.workspaceDir}`] },
              }
            : {}),
        });
        log.info({ image, containerId: container.id, workdirMount }, 'Container created');
        return Success(container.id);
      } catch (error) {
        return Failure(
          new EngineOperationError(
            'create',
            `failed to create container from ${image}: ${errorMessage(error)}`,
            { image },
            asError(error),
          ),
        );
      }
    },

    async runInteractive(containerId: string): Promise<Result<void>> {
      try {
        const { exitCode, signal } = await executor.runInteractive(
          config.docker.binary,
          ['start', '-ai', containerId],
          { env: cliEnv() },
        );
        if (DEFAULT_CONTAINER.normalExitCodes.some((code) => code === exitCode)) {
          return Success(undefined);
        }
        const reason = signal ? `signal ${signal}` : `exit code ${exitCode}`;
        return Failure(
          new EngineOperationError(
            'start',
            `interactive session in container ${containerId} ended with ${reason}`,
            { containerId, exitCode },
          ),
        );
      } catch (error) {
        return Failure(
          new EngineOperationError(
            'start',
            `failed to start interactive container: ${errorMessage(error)}`,
            { containerId },
            asError(error),
          ),
        );
      }
    },

    async commitContainer(containerId: string, imageRef: string): Promise<Result<void>> {
      const { repository, tag } = parseImageReference(imageRef);
      try {
        await docker.getContainer(containerId).commit({
          repo: repository,
          tag,
          comment: DEFAULT_CONTAINER.commitComment,
          author: DEFAULT_CONTAINER.commitAuthor,
        });
        log.info({ containerId, imageRef }, 'Container committed');
        return Success(undefined);
      } catch (error) {
        return Failure(
          new EngineOperationError(
            'commit',
            `failed to commit container ${containerId} to ${imageRef}: ${errorMessage(error)}`,
            { containerId, imageRef },
            asError(error),
          ),
        );
      }
    },

    async pushImage(imageRef: string, authToken: string): Promise<Result<void>> {
      const { repository, tag } = parseImageReference(imageRef);
      try {
        const authconfig = decodeAuthToken(authToken);
        const stream = await docker.getImage(repository).push({ tag, authconfig });
        await followProgress(stream, 'push');
        log.info({ imageRef }, 'Image pushed');
        return Success(undefined);
      } catch (error) {
        if (isDevDropError(error)) {
          return Failure(error);
        }
        return Failure(
          new EngineOperationError(
            'push',
            `failed to push image ${imageRef}: ${errorMessage(error)}`,
            { imageRef },
            asError(error),
          ),
        );
      }
    },

    async removeContainer(containerId: string): Promise<Result<void>> {
      try {
        await docker.getContainer(containerId).remove({ force: true });
        log.info({ containerId }, 'Container removed');
        return Success(undefined);
      } catch (error) {
        return Failure(
          new EngineOperationError(
            'remove',
            `failed to remove container ${containerId}: ${errorMessage(error)}`,
            { containerId },
            asError(error),
          ),
        );
      }
    },

    async registryLogin(username: string, password: string): Promise<Result<RegistryLoginResult>> {
      try {
        const response: unknown = await docker.checkAuth({
          username,
          password,
          serveraddress: config.registry.serverAddress,
        });
        const parsed = loginResponseSchema.safeParse(response ?? {});
        const body = parsed.success ? parsed.data : { Status: '', IdentityToken: undefined };
        log.info({ username }, 'Registry login succeeded');
        return Success(
          body.IdentityToken
            ? { status: body.Status, identityToken: body.IdentityToken }
            : { status: body.Status },
        );
      } catch (error) {
        return Failure(
          new EngineOperationError(
            'login',
            `authentication failed: ${errorMessage(error)}`,
            { username },
            asError(error),
          ),
        );
      }
    },

    async inspectContainer(containerId: string): Promise<Result<ContainerStatus>> {
      try {
        const info = await docker.getContainer(containerId).inspect();
        return Success({ id: info.Id, state: info.State.Status });
      } catch (error) {
        if (isImageNotFoundFailure(error)) {
          return Failure(
            new EngineOperationError('inspect', `container ${containerId} no longer exists`, {
              containerId,
            }),
          );
        }
        return Failure(
          new EngineOperationError(
            'inspect',
            `failed to inspect container ${containerId}: ${errorMessage(error)}`,
            { containerId },
            asError(error),
          ),
        );
      }
    },
  };
}

/**
 * Connect to the daemon: build the client and ping it.
 * Fails with ConnectionError when the daemon cannot be reached.
 */
export async function connectDockerEngine(
  config: ApplicationConfig,
  logger: Logger,
  executor?: CommandExecutor,
): Promise<Result<ContainerEngine>> {
  const docker = createDocker(config);
  try {
    await docker.ping();
  } catch (error) {
    logger.debug({ error: errorMessage(error) }, 'Docker ping failed');
    return Failure(new ConnectionError(asError(error)));
  }
  return Success(createDockerEngine(docker, config, logger, executor));
}
