import { describe, it, expect, afterEach } from '@jest/globals';
import { init, resolveStarterImage, smartDefaultName } from '../../../src/tools/init';
import { Failure } from '../../../src/domain/types';
import { ImageNotFoundError, ValidationError } from '../../../src/lib/errors';
import {
  TEST_CONTAINER_ID,
  createTestContext,
  seedRecord,
  type TestContext,
} from '../../__support__/utilities/mock-infrastructure';

describe('init', () => {
  describe('resolveStarterImage', () => {
    it('should map starter names to images', () => {
      expect(resolveStarterImage('ubuntu')).toEqual({ ok: true, value: 'ubuntu:24.04' });
      expect(resolveStarterImage('go')).toEqual({ ok: true, value: 'golang:latest' });
    });

    it('should take the explicit reference for custom', () => {
      expect(resolveStarterImage('custom', 'alpine:3.20')).toEqual({ ok: true, value: 'alpine:3.20' });
    });

    it('should require a base image for custom', () => {
      const result = resolveStarterImage('custom');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('--base-image is required when using --image=custom');
      }
    });

    it('should list the options for an unknown starter', () => {
      const result = resolveStarterImage('rust');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'unknown starter image: rust. Available options: ubuntu, go, node, python, custom',
        );
      }
    });
  });

  describe('smartDefaultName', () => {
    it('should suggest short names for the starter images', () => {
      expect(smartDefaultName('ubuntu:24.04')).toBe('ubuntu');
      expect(smartDefaultName('golang:latest')).toBe('go');
      expect(smartDefaultName('node:latest')).toBe('node');
      expect(smartDefaultName('python:3.12')).toBe('python');
    });

    it('should derive a name from other references', () => {
      expect(smartDefaultName('registry.example.test/team/toolbox-dev:1.2')).toBe('toolbox');
      expect(smartDefaultName('alpine:3.20')).toBe('alpine');
      expect(smartDefaultName('acme/builder-latest')).toBe('builder');
    });
  });

  describe('tool', () => {
    let test: TestContext;

    afterEach(async () => {
      await test.cleanup();
    });

    it('should pull, run and record the environment as current', async () => {
      test = await createTestContext();

      const result = await init({ name: 'foo', image: 'go' }, test.context);

      expect(result).toEqual({
        ok: true,
        value: {
          environment: 'devdrop-foo',
          baseImage: 'golang:latest',
          containerId: TEST_CONTAINER_ID,
        },
      });
      expect(test.engine.pullImage).toHaveBeenCalledWith('golang:latest');
      expect(test.engine.createContainer).toHaveBeenCalledWith('golang:latest');
      expect(test.engine.runInteractive).toHaveBeenCalledWith(TEST_CONTAINER_ID);

      const record = await test.store.load();
      expect(record.currentEnvironment).toBe('devdrop-foo');
      expect(record.environments['devdrop-foo']).toEqual({
        image: '',
        baseImage: 'golang:latest',
        created: new Date('2025-01-01T00:00:00.000Z'),
        lastUpdated: new Date('2025-01-01T00:00:00.000Z'),
        description: 'Environment based on golang:latest',
        lastContainer: TEST_CONTAINER_ID,
      });
      expect(test.lines).toContain('Container ID: c0ffee123456');
    });

    it('should prompt for the starter image and suggest a name', async () => {
      test = await createTestContext({ answers: { selections: ['python'], inputs: [''] } });

      const result = await init({}, test.context);

      expect(result.ok && result.value.environment).toBe('devdrop-python');
      expect(test.prompter.input).toHaveBeenCalledWith('Environment name:', 'python');
      const choices = test.prompter.select.mock.calls[0]?.[1];
      expect(choices?.[0]).toEqual({ name: 'ubuntu (ubuntu:24.04)', value: 'ubuntu' });
      expect(choices?.map((choice) => choice.value)).toEqual([
        'ubuntu',
        'go',
        'node',
        'python',
        'custom',
      ]);
    });

    it('should ask for a reference when custom is selected', async () => {
      test = await createTestContext({
        answers: {
          selections: ['custom'],
          inputs: ['registry.example.test/team/toolbox-dev:1.2', ''],
        },
      });

      const result = await init({}, test.context);

      expect(result).toEqual({
        ok: true,
        value: {
          environment: 'devdrop-toolbox',
          baseImage: 'registry.example.test/team/toolbox-dev:1.2',
          containerId: TEST_CONTAINER_ID,
        },
      });
    });

    it('should reject custom without a base image before pulling', async () => {
      test = await createTestContext();

      const result = await init({ name: 'x', image: 'custom' }, test.context);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
      }
      expect(test.engine.pullImage).not.toHaveBeenCalled();
    });

    it('should record nothing when the pull fails', async () => {
      test = await createTestContext();
      test.engine.pullImage.mockResolvedValueOnce(
        Failure(new ImageNotFoundError('nosuch:image')),
      );

      const result = await init(
        { name: 'bad', image: 'custom', baseImage: 'nosuch:image' },
        test.context,
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('image nosuch:image not found');
      }
      expect(test.engine.createContainer).not.toHaveBeenCalled();
      expect((await test.store.load()).environments).toEqual({});
    });

    it('should keep created and image when re-initializing an environment', async () => {
      test = await createTestContext();
      await seedRecord(test.store, {
        username: 'alice',
        environments: {
          'devdrop-foo': {
            image: 'alice/devdrop-foo:latest',
            baseImage: 'golang:latest',
            created: new Date('2024-12-01T00:00:00.000Z'),
            lastUpdated: new Date('2024-12-02T00:00:00.000Z'),
            description: 'Environment based on golang:latest',
            lastContainer: '',
          },
        },
      });

      await init({ name: 'devdrop-foo', image: 'node' }, test.context);

      const environment = (await test.store.load()).environments['devdrop-foo'];
      expect(environment?.created.toISOString()).toBe('2024-12-01T00:00:00.000Z');
      expect(environment?.image).toBe('alice/devdrop-foo:latest');
      expect(environment?.baseImage).toBe('node:latest');
      expect(environment?.lastContainer).toBe(TEST_CONTAINER_ID);
    });
  });
});
