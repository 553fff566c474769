/**
 * Login Tool
 *
 * Authenticates against the registry through the engine and stores the
 * username plus an auth token that later pushes use.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { createAuthToken } from '../../lib/auth';
import { ValidationError } from '../../lib/errors';
import { wrapTool } from '../tool-wrapper';
import type { ToolContext } from '../types';
import { loginSchema, type LoginParams } from './schema';

export interface LoginResult {
  username: string;
  status: string;
}

async function loginImpl(
  params: LoginParams,
  context: ToolContext,
  logger: Logger,
): Promise<Result<LoginResult>> {
  const { output, prompter, store, config } = context;

  const engineResult = await context.connectEngine();
  if (!engineResult.ok) {
    return Failure(engineResult.error);
  }
  const engine = engineResult.value;

  const username = params.username || (await prompter.input('Username:'));
  if (!username) {
    return Failure(new ValidationError('username cannot be empty'));
  }

  const password = await prompter.password('Password:');
  if (!password) {
    return Failure(new ValidationError('password cannot be empty'));
  }

  const loginResult = await engine.registryLogin(username, password);
  if (!loginResult.ok) {
    return Failure(loginResult.error);
  }
  const { status } = loginResult.value;

  output.line(`Login successful! ${status}`);
  output.line(`Logged in as: ${username}`);

  const authToken = createAuthToken({
    username,
    password,
    serveraddress: config.registry.serverAddress,
  });

  await store.setUsername(username);
  await store.setAuthToken(authToken);
  logger.info({ username }, 'Saved registry credentials');

  output.line('Authentication credentials saved to devdrop configuration.');

  return Success({ username, status });
}

export const login = wrapTool('login', loginSchema, loginImpl);
