import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { getEnvironment, log, prefersLocalEndpoints } from '../../src/config.js';

describe('Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.HUEFY_DEBUG;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
  });

  describe('getEnvironment', () => {
    it('should read APP_ENV and NODE_ENV from the given source', () => {
      const env = getEnvironment({ APP_ENV: 'local', NODE_ENV: 'test' });

      expect(env.appEnv).toBe('local');
      expect(env.nodeEnv).toBe('test');
      expect(env.debug).toBe(false);
    });

    it('should treat empty strings as unset', () => {
      const env = getEnvironment({ APP_ENV: '', NODE_ENV: '' });

      expect(env.appEnv).toBeUndefined();
      expect(env.nodeEnv).toBeUndefined();
    });

    it('should enable debug for HUEFY_DEBUG=1 or true', () => {
      expect(getEnvironment({ HUEFY_DEBUG: '1' }).debug).toBe(true);
      expect(getEnvironment({ HUEFY_DEBUG: 'true' }).debug).toBe(true);
      expect(getEnvironment({ HUEFY_DEBUG: 'yes' }).debug).toBe(false);
    });

    it('should resolve the package root above src', () => {
      const env = getEnvironment({});

      expect(env.packageRoot).toBe(path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..'));
    });
  });

  describe('prefersLocalEndpoints', () => {
    const withEnv = (appEnv?: string, nodeEnv?: string) =>
      prefersLocalEndpoints({ appEnv, nodeEnv, debug: false, packageRoot: '/' });

    it('should default to production when nothing is set', () => {
      expect(withEnv()).toBe(false);
    });

    it('should pick local for development or local', () => {
      expect(withEnv('development')).toBe(true);
      expect(withEnv(undefined, 'local')).toBe(true);
    });

    it('should let production win over development', () => {
      expect(withEnv('development', 'production')).toBe(false);
      expect(withEnv('production', 'development')).toBe(false);
    });

    it('should not treat other values as local', () => {
      expect(withEnv('staging', 'test')).toBe(false);
    });
  });

  describe('log', () => {
    it('should write prefixed messages to stderr when HUEFY_DEBUG is set', () => {
      process.env.HUEFY_DEBUG = '1';
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('Test message', 42);

      expect(spy).toHaveBeenCalledWith('[huefy] Test message', 42);
    });

    it('should follow HUEFY_DEBUG changes made while running', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('before');
      process.env.HUEFY_DEBUG = 'true';
      log('after');

      expect(spy.mock.calls).toEqual([['[huefy] after']]);
    });

    it('should stay quiet without HUEFY_DEBUG', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('Test message');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
