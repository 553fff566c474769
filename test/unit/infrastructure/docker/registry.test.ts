import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { createRegistryCatalog } from '../../../../src/infrastructure/docker/registry';
import { RegistryRequestError } from '../../../../src/lib/errors';
import {
  createTestConfig,
  createTestLogger,
} from '../../../__support__/utilities/mock-infrastructure';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Docker Hub registry catalog', () => {
  const config = {
    ...createTestConfig('/tmp/devdrop-registry-test'),
    registry: {
      hubUrl: 'https://hub.example.test',
      serverAddress: 'https://index.docker.io/v1/',
      timeout: 5000,
      pageSize: 100,
    },
  };
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should return matching repositories sorted by name', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        next: null,
        results: [
          { name: 'devdrop-python' },
          { name: 'website' },
          { name: 'devdrop-go' },
          { name: 'devdropper' },
        ],
      }),
    );
    const catalog = createRegistryCatalog(config, createTestLogger());

    const result = await catalog.listRepositoriesWithPrefix('alice', 'devdrop-');

    expect(result).toEqual({ ok: true, value: ['devdrop-go', 'devdrop-python'] });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0]?.[0]).toBe(
      'https://hub.example.test/v2/repositories/alice/?page_size=100',
    );
  });

  it('should follow pagination links', async () => {
    fetchSpy
      .mockResolvedValueOnce(
        jsonResponse({
          next: 'https://hub.example.test/v2/repositories/alice/?page=2&page_size=100',
          results: [{ name: 'devdrop-node' }],
        }),
      )
      .mockResolvedValueOnce(
        jsonResponse({ next: null, results: [{ name: 'devdrop-base' }] }),
      );
    const catalog = createRegistryCatalog(config, createTestLogger());

    const result = await catalog.listRepositoriesWithPrefix('alice', 'devdrop-');

    expect(result).toEqual({ ok: true, value: ['devdrop-base', 'devdrop-node'] });
    expect(fetchSpy.mock.calls[1]?.[0]).toBe(
      'https://hub.example.test/v2/repositories/alice/?page=2&page_size=100',
    );
  });

  it('should fail with RegistryRequestError on a non-success status', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'object not found' }, 404));
    const catalog = createRegistryCatalog(config, createTestLogger());

    const result = await catalog.listRepositoriesWithPrefix('nobody', 'devdrop-');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RegistryRequestError);
      expect(result.error.message).toBe('failed to fetch repositories: status 404');
    }
  });

  it('should fail with RegistryRequestError when the request throws', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));
    const catalog = createRegistryCatalog(config, createTestLogger());

    const result = await catalog.listRepositoriesWithPrefix('alice', 'devdrop-');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('failed to fetch repositories: fetch failed');
    }
  });

  it('should reject a response of the wrong shape', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: 'nope' }));
    const catalog = createRegistryCatalog(config, createTestLogger());

    const result = await catalog.listRepositoriesWithPrefix('alice', 'devdrop-');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('unexpected repositories response from Docker Hub');
    }
  });
});
