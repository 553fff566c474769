import { describe, it, expect, afterEach } from '@jest/globals';
import { switchEnvironment } from '../../../src/tools/switch';
import { createEnvironment } from '../../../src/domain/environments';
import { EnvironmentNotFoundError, NoEnvironmentsError } from '../../../src/lib/errors';
import {
  createTestContext,
  seedRecord,
  type PromptAnswers,
  type TestContext,
} from '../../__support__/utilities/mock-infrastructure';

describe('switch', () => {
  let test: TestContext;

  afterEach(async () => {
    await test.cleanup();
  });

  async function setup(answers: PromptAnswers = {}): Promise<void> {
    test = await createTestContext({ answers });
    const created = new Date('2025-01-01T00:00:00.000Z');
    await seedRecord(test.store, {
      username: 'alice',
      currentEnvironment: 'devdrop-go',
      environments: {
        'devdrop-go': createEnvironment(created, { baseImage: 'golang:latest' }),
        'devdrop-node': createEnvironment(created, { baseImage: 'node:latest' }),
      },
    });
  }

  it('should set the named environment as current', async () => {
    await setup();

    const result = await switchEnvironment({ environment: 'node' }, test.context);

    expect(result).toEqual({ ok: true, value: 'devdrop-node' });
    expect((await test.store.load()).currentEnvironment).toBe('devdrop-node');
    expect(test.lines).toEqual(['Switched to environment: devdrop-node']);
  });

  it('should leave the current environment unchanged for an unknown name', async () => {
    await setup();

    const result = await switchEnvironment({ environment: 'nonexistent' }, test.context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(EnvironmentNotFoundError);
      expect(result.error.message).toBe(
        "environment 'devdrop-nonexistent' not found. Run 'devdrop ls' to see available environments",
      );
    }
    expect((await test.store.load()).currentEnvironment).toBe('devdrop-go');
  });

  it('should offer a selection marking the current environment', async () => {
    await setup({ selections: ['devdrop-node'] });

    const result = await switchEnvironment({}, test.context);

    expect(result).toEqual({ ok: true, value: 'devdrop-node' });
    expect(test.prompter.select).toHaveBeenCalledWith(
      'Select environment:',
      [
        { name: 'devdrop-go (current)', value: 'devdrop-go' },
        { name: 'devdrop-node', value: 'devdrop-node' },
      ],
      'devdrop-go',
    );
  });

  it('should fail when there is nothing to switch to', async () => {
    test = await createTestContext();

    const result = await switchEnvironment({ environment: 'go' }, test.context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NoEnvironmentsError);
    }
  });
});
