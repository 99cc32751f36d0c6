// ============================================================================
// Config File — YAML-based persistent configuration
// ============================================================================
// Loads from ~/.huefy/config.yaml (or an explicit path). Explicit options
// override config file values, config file values override defaults.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import YAML from 'yaml';
import { z } from 'zod';
import { log } from './config.js';
import { ValidationError } from './errors.js';
import type { HuefyConfigOptions, RetryConfigOptions } from './huefyConfig.js';
import { parseWithSchema } from './validation.js';

// ============================================================================
// File Schema
// ============================================================================

const ConfigFileSchema = z
  .object({
    base_url: z.string().optional(),
    transport: z.string().optional(),
    local: z.boolean().optional(),
    timeout_ms: z.number().optional(),
    connect_timeout_ms: z.number().optional(),
    kernel_binary_path: z.string().optional(),
    retry: z
      .object({
        enabled: z.boolean().optional(),
        max_retries: z.number().optional(),
        base_delay_ms: z.number().optional(),
        max_delay_ms: z.number().optional(),
        backoff_multiplier: z.number().optional(),
      })
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Config Path
// ============================================================================

const CONFIG_PATH = join(homedir(), '.huefy', 'config.yaml');

export function getConfigPath(): string {
  return CONFIG_PATH;
}

// ============================================================================
// Load & Parse
// ============================================================================

/**
 * Read config options from YAML. A missing file yields no options; a file
 * that exists but cannot be parsed is rejected.
 */
export function loadConfigFile(filePath: string = CONFIG_PATH): HuefyConfigOptions {
  if (!existsSync(filePath)) {
    log(`Config: no file at ${filePath}, using defaults`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(
      `Failed to parse config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { field: 'configFile', cause: err },
    );
  }

  if (parsed === null || parsed === undefined) return {};

  const file = parseWithSchema(ConfigFileSchema, parsed, 'configFile');
  log(`Config: loaded ${filePath}`);
  return toOptions(file);
}

function toOptions(file: ConfigFile): HuefyConfigOptions {
  const options: HuefyConfigOptions = {
    ...(file.base_url !== undefined && { baseUrl: file.base_url }),
    ...(file.transport !== undefined && { transport: file.transport }),
    ...(file.local !== undefined && { local: file.local }),
    ...(file.timeout_ms !== undefined && { timeoutMs: file.timeout_ms }),
    ...(file.connect_timeout_ms !== undefined && { connectTimeoutMs: file.connect_timeout_ms }),
    ...(file.kernel_binary_path !== undefined && { kernelBinaryPath: file.kernel_binary_path }),
  };

  if (file.retry) {
    const retry: RetryConfigOptions = {
      ...(file.retry.enabled !== undefined && { enabled: file.retry.enabled }),
      ...(file.retry.max_retries !== undefined && { maxRetries: file.retry.max_retries }),
      ...(file.retry.base_delay_ms !== undefined && { baseDelayMs: file.retry.base_delay_ms }),
      ...(file.retry.max_delay_ms !== undefined && { maxDelayMs: file.retry.max_delay_ms }),
      ...(file.retry.backoff_multiplier !== undefined && { backoffMultiplier: file.retry.backoff_multiplier }),
    };
    options.retry = retry;
  }

  return options;
}

/**
 * Merge explicit options over file values. Explicit options take precedence;
 * `undefined` never clears a file value.
 */
export function mergeConfigOverrides(
  fileOptions: HuefyConfigOptions,
  overrides: HuefyConfigOptions,
): HuefyConfigOptions {
  return {
    ...fileOptions,
    ...(overrides.baseUrl !== undefined && { baseUrl: overrides.baseUrl }),
    ...(overrides.transport !== undefined && { transport: overrides.transport }),
    ...(overrides.local !== undefined && { local: overrides.local }),
    ...(overrides.timeoutMs !== undefined && { timeoutMs: overrides.timeoutMs }),
    ...(overrides.connectTimeoutMs !== undefined && { connectTimeoutMs: overrides.connectTimeoutMs }),
    ...(overrides.kernelBinaryPath !== undefined && { kernelBinaryPath: overrides.kernelBinaryPath }),
    ...(overrides.retry !== undefined && { retry: overrides.retry }),
    ...(overrides.environment !== undefined && { environment: overrides.environment }),
  };
}
