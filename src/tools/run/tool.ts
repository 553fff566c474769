/**
 * Run Tool
 *
 * Launches an environment with the working directory mounted at /workspace.
 * Image choice, in order: the personal image if it is already local, the
 * environment's committed image, its base image, then a pull of the
 * personal image as a last resort.
 */

import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { Success, Failure, type Result, type Environment } from '../../domain/types';
import { getEnvironment, personalImageReference } from '../../domain/environments';
import { DEFAULT_CONTAINER } from '../../config/defaults';
import { ImageNotFoundError, NotLoggedInError, errorMessage } from '../../lib/errors';
import type { ContainerEngine } from '../../infrastructure/docker/client';
import type { Output } from '../../infrastructure/output';
import { resolveTargetEnvironment } from '../helpers';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { runSchema, type RunParams } from './schema';

export interface RunResult {
  environment: string;
  image: string;
  containerId: string;
}

interface ImageChoice {
  engine: ContainerEngine;
  output: Output;
  personalImage: string;
  environment: Environment | undefined;
  authToken: string;
}

async function chooseImage(choice: ImageChoice): Promise<Result<string>> {
  const { engine, output, personalImage, environment, authToken } = choice;
  const token = authToken || undefined;

  if (await engine.imageExists(personalImage)) {
    output.line('Environment image found locally.');
    return Success(personalImage);
  }

  const committed = environment?.image;
  if (committed) {
    if (committed !== personalImage && (await engine.imageExists(committed))) {
      output.line(`Using committed image found locally: ${committed}`);
      return Success(committed);
    }
    output.line(`Pulling committed image ${committed}...`);
    const pulled = await engine.pullImage(committed, token);
    if (pulled.ok) {
      output.line('Image pulled successfully!');
      return Success(committed);
    }
    if (!environment?.baseImage) {
      return Failure(pulled.error);
    }
    output.warn(`could not pull ${committed}: ${pulled.error.message}`);
  }

  const baseImage = environment?.baseImage;
  if (baseImage) {
    output.line(`Environment image not found, using base image: ${baseImage}`);
    output.line(
      "Note: You'll be running the base environment. Run 'devdrop commit' after your session to save changes.",
    );
    if (!(await engine.imageExists(baseImage))) {
      output.line(`Pulling base image ${baseImage}...`);
      const pulled = await engine.pullImage(baseImage);
      if (!pulled.ok) {
        return Failure(pulled.error);
      }
    }
    return Success(baseImage);
  }

  output.line('Environment image not found locally. Pulling from registry...');
  const pulled = await engine.pullImage(personalImage, token);
  if (!pulled.ok) {
    if (pulled.error instanceof ImageNotFoundError) {
      return Failure(
        new ImageNotFoundError(
          personalImage,
          `failed to pull environment image ${personalImage}. Make sure the environment exists or run 'devdrop init' first`,
          pulled.error,
        ),
      );
    }
    return Failure(pulled.error);
  }
  output.line('Image pulled successfully!');
  return Success(personalImage);
}

async function runImpl(
  params: RunParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<RunResult>> {
  const { output, store } = context;
  const record = await store.load();

  if (!record.username) {
    return Failure(new NotLoggedInError());
  }

  const targetResult = resolveTargetEnvironment(record, params.environment);
  if (!targetResult.ok) {
    return Failure(targetResult.error);
  }
  const environment = targetResult.value;
  const personalImage = personalImageReference(record.username, environment);

  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return Failure(engineResult.error);
  }
  const engine = engineResult.value;

  output.line(`Using environment: ${environment}`);
  output.line(`Checking for environment image: ${personalImage}`);

  const imageResult = await chooseImage({
    engine,
    output,
    personalImage,
    environment: getEnvironment(record, environment),
    authToken: record.authToken,
  });
  if (!imageResult.ok) {
    return Failure(imageResult.error);
  }
  const image = imageResult.value;

  const workdir = resolve(context.cwd());
  output.line(`Starting environment in: ${workdir}`);
  output.line(
    `Current directory will be available as ${DEFAULT_CONTAINER.workspaceDir} inside the container.`,
  );
  output.line();

  const createResult = await engine.createContainer(image, workdir);
  if (!createResult.ok) {
    return Failure(createResult.error);
  }
  const containerId = createResult.value;

  output.line('Starting your development environment...');
  const runResult = await engine.runInteractive(containerId);
  if (!runResult.ok) {
    return Failure(runResult.error);
  }

  output.line();
  output.line('Development session ended.');
  output.line(`Environment: ${environment}`);
  output.line(`Container ID: ${containerId}`);

  try {
    await store.setEnvironmentContainer(environment, containerId);
    output.line(
      `Container saved for potential commit. Run 'devdrop commit ${environment}' to save your changes.`,
    );
  } catch (error) {
    logger.debug(
      { environment, containerId, error: errorMessage(error) },
      'Could not record container',
    );
    output.warn(`failed to save container ID to config: ${errorMessage(error)}`);
  }

  return Success({ environment, image, containerId });
}

export const run = wrapTool('run', runSchema, runImpl);
