/**
 * devdrop command-line program
 *
 * One commander subcommand per tool. Each action builds the dependency
 * container, runs the tool, and turns a failed Result into
 * `Error: <message>` on stderr with exit code 1.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  type OutputConfiguration,
} from 'commander';
import { z } from 'zod';
import { createContainer, type ContainerConfigOverrides, type Deps } from '../app/container';
import { validateConfig } from '../config/validation';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../lib/logger';
import type { Result } from '../domain/types';
import {
  commit,
  init,
  listEnvironments,
  login,
  pull,
  run,
  status,
  switchEnvironment,
} from '../tools';

export interface GlobalOptions {
  logLevel?: LogLevel;
  verbose?: boolean;
}

export type DepsFactory = (overrides: ContainerConfigOverrides) => Deps;

const packageJsonSchema = z.object({ version: z.string() });

/** src/cli and dist/cli both sit two levels below the package root */
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  const parsed = packageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Allowed levels: ${LOG_LEVELS.join(', ')}.`);
  }
  return value;
}

/**
 * `--log-level`, then LOG_LEVEL, then debug for `--verbose`, else warn
 */
export function resolveLogLevel(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (options.logLevel) return options.logLevel;
  const fromEnv = env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return options.verbose ? 'debug' : 'warn';
}

const defaultDepsFactory: DepsFactory = (overrides) => createContainer(overrides);

export interface ProgramOptions {
  makeDeps?: DepsFactory;
  /** Where commander writes help and errors; stdout/stderr by default */
  output?: OutputConfiguration;
}

/**
 * Build the program. Exits are overridden so `runCli` can map them to an
 * exit code; subcommands inherit that and the output configuration.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const makeDeps = options.makeDeps ?? defaultDepsFactory;
  const program = new Command();
  program.exitOverride();
  if (options.output) {
    program.configureOutput(options.output);
  }

  const execute = async <T>(
    command: Command,
    invoke: (deps: Deps) => Promise<Result<T>>,
  ): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const deps = makeDeps({ logLevel: resolveLogLevel(globals) });

    const validation = validateConfig(deps.config);
    for (const warning of validation.warnings) {
      deps.logger.warn({ path: warning.path }, warning.message);
    }
    if (!validation.isValid) {
      const details = validation.errors.map((error) => `${error.path}: ${error.message}`);
      command.error(`Error: invalid configuration: ${details.join('; ')}`, {
        exitCode: 1,
        code: 'devdrop.config',
      });
    }

    const result = await invoke(deps);
    if (!result.ok) {
      command.error(`Error: ${result.error.message}`, {
        exitCode: 1,
        code: `devdrop.${result.error.code}`,
      });
    }
  };

  program
    .name('devdrop')
    .description('Snapshot, share, and re-launch personal development containers')
    .version(readVersion())
    .option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`, parseLogLevel)
    .option('--verbose', 'enable debug logging')
    .addHelpText(
      'after',
      `
Examples:
  $ devdrop login                      Authenticate with Docker Hub
  $ devdrop init --name go --image go  Create devdrop-go from golang:latest
  $ devdrop commit                     Save and push the current environment
  $ devdrop run                        Run the current environment in this directory

Environment Variables:
  DEVDROP_CONFIG           Path of the environment registry file
  DEVDROP_HOME             Directory holding config.yaml (default: ~/.devdrop)
  DOCKER_SOCKET            Docker daemon socket path
  DEVDROP_DOCKER_BIN       Docker CLI used for interactive sessions
  DEVDROP_HUB_URL          Docker Hub API base URL
  DEVDROP_REGISTRY_SERVER  Registry server address used for login
  DEVDROP_HUB_TIMEOUT      Docker Hub request timeout in milliseconds
  LOG_LEVEL                Logging level (default: warn)
`,
    );

  program
    .command('login')
    .description('Authenticate with Docker Hub and store credentials')
    .option('-u, --username <name>', 'registry username (prompted when omitted)')
    .action(async (options: { username?: string }, command: Command) => {
      await execute(command, (deps) => login({ username: options.username }, deps));
    });

  program
    .command('init')
    .description('Create a new environment from a starter image and customize it')
    .option('-n, --name <name>', "environment name (prefixed with 'devdrop-')")
    .option('-i, --image <starter>', "starter image: ubuntu, go, node, python, or 'custom'")
    .option('--base-image <image>', 'image reference to use with --image custom')
    .action(
      async (options: { name?: string; image?: string; baseImage?: string }, command: Command) => {
        await execute(command, (deps) => init(options, deps));
      },
    );

  program
    .command('run')
    .description('Run an environment with the current directory mounted at /workspace')
    .argument('[environment-name]', 'environment to run (default: current)')
    .action(async (environment: string | undefined, _options: unknown, command: Command) => {
      await execute(command, (deps) => run({ environment }, deps));
    });

  program
    .command('commit')
    .description("Commit the environment's last container and push it")
    .argument('[environment-name]', 'environment to commit (default: current)')
    .action(async (environment: string | undefined, _options: unknown, command: Command) => {
      await execute(command, (deps) => commit({ environment }, deps));
    });

  program
    .command('pull')
    .description('Pull the latest version of an environment from the registry')
    .argument('[environment-name]', 'environment to pull (prompted when omitted)')
    .action(async (environment: string | undefined, _options: unknown, command: Command) => {
      await execute(command, (deps) => pull({ environment }, deps));
    });

  program
    .command('switch')
    .description('Select the current environment')
    .argument('[environment-name]', 'environment to switch to (prompted when omitted)')
    .action(async (environment: string | undefined, _options: unknown, command: Command) => {
      await execute(command, (deps) => switchEnvironment({ environment }, deps));
    });

  program
    .command('ls')
    .description('List local and remote environments')
    .option('--remote-only', 'show only registry repositories')
    .option('--local-only', 'show only local environments')
    .action(
      async (options: { remoteOnly?: boolean; localOnly?: boolean }, command: Command) => {
        await execute(command, (deps) => listEnvironments(options, deps));
      },
    );

  program
    .command('status')
    .description('Show login state and the current environment')
    .action(async (_options: unknown, command: Command) => {
      await execute(command, (deps) => status({}, deps));
    });

  return program;
}

/**
 * Parse argv and run the matching command.
 * @returns The process exit code
 */
export async function runCli(
  argv: readonly string[] = process.argv,
  options: ProgramOptions = {},
): Promise<number> {
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
}
