import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import { getConfigPath, loadConfigFile, mergeConfigOverrides } from '../../src/configFile.js';
import { HuefyConfig } from '../../src/huefyConfig.js';
import { ValidationError } from '../../src/errors.js';
import { createTestContext, writeContextFile, type TestContext } from '../utils/test-context.js';

const FULL_CONFIG = `
base_url: https://mail.example.test/api/
transport: http
local: false
timeout_ms: 5000
connect_timeout_ms: 1500
kernel_binary_path: /opt/huefy/kernel
retry:
  enabled: true
  max_retries: 1
  base_delay_ms: 200
  max_delay_ms: 800
  backoff_multiplier: 3
`;

describe('Config File', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  it('should default to ~/.huefy/config.yaml', () => {
    expect(getConfigPath()).toBe(path.join(os.homedir(), '.huefy', 'config.yaml'));
  });

  it('should return no options for a missing file', () => {
    expect(loadConfigFile(path.join(ctx.rootDir, 'absent.yaml'))).toEqual({});
  });

  it('should return no options for an empty file', async () => {
    const file = await writeContextFile(ctx, 'empty.yaml', '');

    expect(loadConfigFile(file)).toEqual({});
  });

  it('should map snake_case keys onto config options', async () => {
    const file = await writeContextFile(ctx, 'config.yaml', FULL_CONFIG);

    expect(loadConfigFile(file)).toEqual({
      baseUrl: 'https://mail.example.test/api/',
      transport: 'http',
      local: false,
      timeoutMs: 5000,
      connectTimeoutMs: 1500,
      kernelBinaryPath: '/opt/huefy/kernel',
      retry: {
        enabled: true,
        maxRetries: 1,
        baseDelayMs: 200,
        maxDelayMs: 800,
        backoffMultiplier: 3,
      },
    });
  });

  it('should only include keys present in the file', async () => {
    const file = await writeContextFile(ctx, 'config.yaml', 'transport: http\nretry:\n  max_retries: 0\n');

    expect(loadConfigFile(file)).toEqual({ transport: 'http', retry: { maxRetries: 0 } });
  });

  it('should reject malformed YAML', async () => {
    const file = await writeContextFile(ctx, 'broken.yaml', 'transport: [http\n');

    let caught: unknown;
    try {
      loadConfigFile(file);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field: 'configFile' });
    expect(caught instanceof Error && caught.message.startsWith(`Failed to parse config file ${file}: `)).toBe(true);
  });

  it('should reject unknown keys', async () => {
    const file = await writeContextFile(ctx, 'config.yaml', 'api_key: test-secret\n');

    expect(() => loadConfigFile(file)).toThrow(ValidationError);
  });

  it('should report the offending key for a wrong type', async () => {
    const file = await writeContextFile(ctx, 'config.yaml', 'timeout_ms: fast\n');

    let caught: unknown;
    try {
      loadConfigFile(file);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field: 'configFile.timeout_ms' });
  });

  describe('mergeConfigOverrides', () => {
    it('should let explicit options win', () => {
      const merged = mergeConfigOverrides(
        { transport: 'http', timeoutMs: 5000 },
        { timeoutMs: 7000 },
      );

      expect(merged).toEqual({ transport: 'http', timeoutMs: 7000 });
    });

    it('should never clear a file value with undefined', () => {
      const merged = mergeConfigOverrides({ transport: 'http' }, { transport: undefined });

      expect(merged.transport).toBe('http');
    });
  });

  describe('HuefyConfig.fromFile', () => {
    it('should build a validated config from file and overrides', async () => {
      const file = await writeContextFile(ctx, 'config.yaml', FULL_CONFIG);

      const config = HuefyConfig.fromFile(file, { timeoutMs: 7000, environment: {} });

      expect(config.getTransport()).toBe('http');
      expect(config.getTimeout()).toBe(7000);
      expect(config.getConnectTimeout()).toBe(1500);
      expect(config.getHttpEndpoint()).toBe('https://mail.example.test/api');
      expect(config.getRetryConfig().delayFor(2)).toBe(600);
      expect(config.kernelBinaryPath).toBe('/opt/huefy/kernel');
    });

    it('should surface invalid values from the file', async () => {
      const file = await writeContextFile(ctx, 'config.yaml', 'transport: smtp\n');

      expect(() => HuefyConfig.fromFile(file, { environment: {} }))
        .toThrow('Transport must be one of: kernel, http');
    });
  });
});
