import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { resolveLogLevel, runCli, type DepsFactory } from '../../../src/cli/program';
import { createEnvironment } from '../../../src/domain/environments';
import {
  createTestContext,
  seedRecord,
  type TestContext,
} from '../../__support__/utilities/mock-infrastructure';

describe('CLI Interface', () => {
  let test: TestContext;
  let stdout: string[];
  let stderr: string[];
  let makeDeps: jest.Mock<DepsFactory>;

  beforeEach(async () => {
    test = await createTestContext();
    const created = new Date('2025-01-01T00:00:00.000Z');
    await seedRecord(test.store, {
      username: 'alice',
      currentEnvironment: 'devdrop-go',
      environments: {
        'devdrop-go': createEnvironment(created, { baseImage: 'golang:latest' }),
        'devdrop-node': createEnvironment(created, { baseImage: 'node:latest' }),
      },
    });
    stdout = [];
    stderr = [];
    makeDeps = jest.fn<DepsFactory>(() => test.context);
  });

  afterEach(async () => {
    await test.cleanup();
  });

  function cli(...args: string[]): Promise<number> {
    return runCli(['node', 'devdrop', ...args], {
      makeDeps,
      output: {
        writeOut: (text) => {
          stdout.push(text);
        },
        writeErr: (text) => {
          stderr.push(text);
        },
      },
    });
  }

  it('should run a command and exit with 0', async () => {
    const exitCode = await cli('switch', 'node');

    expect(exitCode).toBe(0);
    expect(stderr).toEqual([]);
    expect(test.lines).toEqual(['Switched to environment: devdrop-node']);
    expect((await test.store.load()).currentEnvironment).toBe('devdrop-node');
  });

  it('should print a failed command as Error: <message> and exit with 1', async () => {
    const exitCode = await cli('switch', 'nonexistent');

    expect(exitCode).toBe(1);
    expect(stderr).toEqual([
      "Error: environment 'devdrop-nonexistent' not found. Run 'devdrop ls' to see available environments\n",
    ]);
    expect((await test.store.load()).currentEnvironment).toBe('devdrop-go');
  });

  it('should pass ls flags through to validation', async () => {
    const exitCode = await cli('ls', '--remote-only', '--local-only');

    expect(exitCode).toBe(1);
    expect(stderr).toEqual([
      'Error: invalid ls options: --remote-only and --local-only cannot be used together\n',
    ]);
  });

  it('should refuse to run with an invalid configuration', async () => {
    makeDeps.mockReturnValue({
      ...test.context,
      config: { ...test.config, configPath: 'relative/config.yaml' },
    });

    const exitCode = await cli('status');

    expect(exitCode).toBe(1);
    expect(stderr).toEqual(['Error: invalid configuration: configPath: Must be an absolute path\n']);
    expect(test.lines).toEqual([]);
  });

  it('should pass the requested log level to the container', async () => {
    await cli('--log-level', 'error', 'status');

    expect(makeDeps).toHaveBeenCalledWith({ logLevel: 'error' });
  });

  it('should reject an unknown log level', async () => {
    const exitCode = await cli('--log-level', 'chatty', 'status');

    expect(exitCode).toBe(1);
    expect(makeDeps).not.toHaveBeenCalled();
  });

  it('should print the package version', async () => {
    const exitCode = await cli('--version');

    expect(exitCode).toBe(0);
    expect(stdout).toEqual(['0.3.0\n']);
  });

  it('should fail on an unknown command', async () => {
    const exitCode = await cli('teleport');

    expect(exitCode).toBe(1);
    expect(stderr[0]).toMatch(/^error: unknown command 'teleport'/);
  });

  describe('resolveLogLevel', () => {
    it('should prefer the flag, then LOG_LEVEL, then --verbose', () => {
      expect(resolveLogLevel({ logLevel: 'info', verbose: true }, { LOG_LEVEL: 'error' })).toBe(
        'info',
      );
      expect(resolveLogLevel({ verbose: true }, { LOG_LEVEL: 'error' })).toBe('error');
      expect(resolveLogLevel({ verbose: true }, {})).toBe('debug');
      expect(resolveLogLevel({}, { LOG_LEVEL: 'loud' })).toBe('warn');
    });
  });
});
