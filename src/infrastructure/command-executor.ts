/**
 * Command Executor - runs external commands attached to the user's terminal
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface InteractiveResult {
  /** -1 when the process was killed by a signal */
  exitCode: number;
  signal?: NodeJS.Signals;
}

export class CommandExecutor {
  constructor(private readonly logger: Logger) {}

  /**
   * Run a command with stdin, stdout and stderr inherited from this process.
   * Resolves once the command exits; rejects only if it cannot be started.
   */
  async runInteractive(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<InteractiveResult> {
    const { cwd = process.cwd(), env = process.env } = options;

    this.logger.debug({ command, args, cwd }, 'Executing interactive command');

    return new Promise((resolve, reject) => {
      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        stdio: 'inherit',
      };

      const child = spawn(command, args, spawnOptions);

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, signal }, 'Interactive command completed');
        resolve(signal ? { exitCode, signal } : { exitCode });
      });

      child.on('error', (error: Error) => {
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
