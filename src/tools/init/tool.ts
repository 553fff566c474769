/**
 * Init Tool
 *
 * Starts a fresh environment from a starter image: pulls it, drops the user
 * into an interactive shell, and records the resulting container so that
 * `commit` can save it.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { createEnvironment, getEnvironment, normalizeName } from '../../domain/environments';
import {
  CUSTOM_STARTER,
  STARTER_IMAGES,
  isStarterImageName,
} from '../../config/defaults';
import { ValidationError } from '../../lib/errors';
import type { Prompter } from '../../infrastructure/prompts';
import { shortId } from '../helpers';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { initSchema, type InitParams } from './schema';

export interface InitResult {
  environment: string;
  baseImage: string;
  containerId: string;
}

const STARTER_OPTIONS = [...Object.keys(STARTER_IMAGES), CUSTOM_STARTER];

/**
 * Map a starter name (or `custom` plus an explicit reference) to an image
 */
export function resolveStarterImage(starter: string, customImage?: string): Result<string> {
  if (starter === CUSTOM_STARTER) {
    if (!customImage) {
      return Failure(new ValidationError('--base-image is required when using --image=custom'));
    }
    return Success(customImage);
  }
  if (isStarterImageName(starter)) {
    return Success(STARTER_IMAGES[starter]);
  }
  return Failure(
    new ValidationError(
      `unknown starter image: ${starter}. Available options: ${STARTER_OPTIONS.join(', ')}`,
      { starter },
    ),
  );
}

/**
 * Suggested environment name for an image, e.g. `golang:latest` -> `go`,
 * `registry.example.com/team/toolbox-dev:1.2` -> `toolbox`
 */
export function smartDefaultName(baseImage: string): string {
  if (baseImage.startsWith('ubuntu')) return 'ubuntu';
  if (baseImage.startsWith('golang')) return 'go';
  if (baseImage.startsWith('node')) return 'node';
  if (baseImage.startsWith('python')) return 'python';

  const lastSegment = baseImage.split('/').pop() ?? baseImage;
  const [imageName = lastSegment] = lastSegment.split(':');
  return imageName.replace(/-latest$/, '').replace(/-dev$/, '');
}

async function promptForStarterImage(prompter: Prompter): Promise<Result<string>> {
  const choices = STARTER_OPTIONS.map((option) => ({
    name: isStarterImageName(option)
      ? `${option} (${STARTER_IMAGES[option]})`
      : `${option} (provide your own image reference)`,
    value: option,
  }));

  const selected = await prompter.select('Select starter image:', choices);
  if (selected !== CUSTOM_STARTER) {
    return resolveStarterImage(selected);
  }

  const customImage = await prompter.input('Enter custom image reference:');
  if (!customImage) {
    return Failure(new ValidationError('custom image reference cannot be empty'));
  }
  return Success(customImage);
}

async function initImpl(
  params: InitParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<InitResult>> {
  const { output, prompter, store } = context;

  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return Failure(engineResult.error);
  }
  const engine = engineResult.value;

  const record = await store.load();

  const imageResult = params.image
    ? resolveStarterImage(params.image, params.baseImage)
    : await promptForStarterImage(prompter);
  if (!imageResult.ok) {
    return imageResult;
  }
  const baseImage = imageResult.value;

  let rawName = params.name;
  if (!rawName) {
    const suggested = smartDefaultName(baseImage);
    rawName = (await prompter.input('Environment name:', suggested)) || suggested;
  }
  const environment = normalizeName(rawName);

  output.line(`Initializing environment '${environment}' with base image: ${baseImage}`);
  output.line('Pulling base image...');
  const pullResult = await engine.pullImage(baseImage);
  if (!pullResult.ok) {
    return Failure(pullResult.error);
  }

  output.line('Starting interactive container...');
  output.line('You can now customize your development environment.');
  output.line(
    `When finished, type 'exit' and then run 'devdrop commit ${environment}' to save your changes.`,
  );
  output.line();

  const createResult = await engine.createContainer(baseImage);
  if (!createResult.ok) {
    return Failure(createResult.error);
  }
  const containerId = createResult.value;

  const runResult = await engine.runInteractive(containerId);
  if (!runResult.ok) {
    return Failure(runResult.error);
  }

  const now = context.now();
  const existing = getEnvironment(record, environment);
  await store.addOrUpdateEnvironment(
    environment,
    createEnvironment(now, {
      ...(existing ? { created: existing.created, image: existing.image } : {}),
      baseImage,
      description: `Environment based on ${baseImage}`,
      lastContainer: containerId,
    }),
  );
  await store.setCurrentEnvironment(environment);
  logger.info({ environment, baseImage, containerId }, 'Environment initialized');

  output.line();
  output.line('Container exited successfully!');
  output.line(`Environment: ${environment}`);
  output.line(`Container ID: ${shortId(containerId)}`);
  output.line(`Run 'devdrop commit ${environment}' to save your customizations.`);

  return Success({ environment, baseImage, containerId });
}

export const init = wrapTool('init', initSchema, initImpl);
