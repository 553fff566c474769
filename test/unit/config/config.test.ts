import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { join, resolve } from 'node:path';
import { createConfiguration, createDefaultConfig } from '../../../src/config/config';
import { validateConfig } from '../../../src/config/validation';
import {
  DEFAULT_ENVIRONMENT_NAME,
  STARTER_IMAGES,
  isStarterImageName,
} from '../../../src/config/defaults';

describe('Configuration Module', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createDefaultConfig', () => {
    it('should place the registry file under .devdrop in the given home', () => {
      const config = createDefaultConfig('/home/tester');

      expect(config.configPath).toBe(join('/home/tester', '.devdrop', 'config.yaml'));
      expect(config.logLevel).toBe('warn');
    });

    it('should use Docker Hub defaults', () => {
      const config = createDefaultConfig('/home/tester');

      expect(config.docker).toEqual({ socketPath: '', binary: 'docker' });
      expect(config.registry).toEqual({
        hubUrl: 'https://hub.docker.com',
        serverAddress: 'https://index.docker.io/v1/',
        timeout: 30000,
        pageSize: 100,
      });
    });
  });

  describe('createConfiguration', () => {
    it('should prefer DEVDROP_CONFIG over DEVDROP_HOME', () => {
      const config = createConfiguration({
        DEVDROP_CONFIG: '/srv/devdrop/custom.yaml',
        DEVDROP_HOME: '/srv/other',
      });

      expect(config.configPath).toBe(resolve('/srv/devdrop/custom.yaml'));
    });

    it('should put config.yaml directly inside DEVDROP_HOME', () => {
      const config = createConfiguration({ DEVDROP_HOME: '/srv/devdrop' });

      expect(config.configPath).toBe(join(resolve('/srv/devdrop'), 'config.yaml'));
    });

    it('should apply docker and registry overrides', () => {
      const config = createConfiguration({
        DEVDROP_HOME: '/srv/devdrop',
        DOCKER_SOCKET: '/run/user/1000/docker.sock',
        DEVDROP_DOCKER_BIN: 'podman',
        DEVDROP_HUB_URL: 'https://hub.example.test///',
        DEVDROP_REGISTRY_SERVER: 'registry.example.test',
        DEVDROP_HUB_TIMEOUT: '2500',
      });

      expect(config.docker).toEqual({
        socketPath: '/run/user/1000/docker.sock',
        binary: 'podman',
      });
      expect(config.registry).toEqual({
        hubUrl: 'https://hub.example.test',
        serverAddress: 'registry.example.test',
        timeout: 2500,
        pageSize: 100,
      });
    });

    it('should accept a valid LOG_LEVEL and ignore an unknown one', () => {
      expect(createConfiguration({ DEVDROP_HOME: '/x', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
      expect(createConfiguration({ DEVDROP_HOME: '/x', LOG_LEVEL: 'chatty' }).logLevel).toBe('warn');
    });

    it('should fall back to the default timeout when the value is not a number', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      const config = createConfiguration({ DEVDROP_HOME: '/x', DEVDROP_HUB_TIMEOUT: 'soon' });

      expect(config.registry.timeout).toBe(30000);
      expect(warn).toHaveBeenCalledWith(
        'Invalid DEVDROP_HUB_TIMEOUT: soon. Using default: 30000',
      );
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      const result = validateConfig(createDefaultConfig('/home/tester'));

      expect(result).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('should report each invalid field', () => {
      const defaults = createDefaultConfig('/home/tester');
      const result = validateConfig({
        ...defaults,
        configPath: 'relative/config.yaml',
        docker: { socketPath: '', binary: '  ' },
        registry: { ...defaults.registry, hubUrl: 'hub.docker.com', timeout: 0 },
      });

      expect(result.isValid).toBe(false);
      expect(result.errors.map((error) => error.path)).toEqual([
        'configPath',
        'docker.binary',
        'registry.hubUrl',
        'registry.timeout',
      ]);
    });

    it('should warn about very short timeouts', () => {
      const defaults = createDefaultConfig('/home/tester');
      const result = validateConfig({
        ...defaults,
        registry: { ...defaults.registry, timeout: 200 },
      });

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        {
          path: 'registry.timeout',
          message: 'Timeouts under one second usually fail against Docker Hub',
        },
      ]);
    });
  });

  describe('defaults', () => {
    it('should name the default environment with the prefix', () => {
      expect(DEFAULT_ENVIRONMENT_NAME).toBe('devdrop-default');
    });

    it('should recognise only the listed starter images', () => {
      expect(Object.keys(STARTER_IMAGES)).toEqual(['ubuntu', 'go', 'node', 'python']);
      expect(isStarterImageName('go')).toBe(true);
      expect(isStarterImageName('custom')).toBe(false);
      expect(isStarterImageName('toString')).toBe(false);
    });
  });
});
