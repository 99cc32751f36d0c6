// ============================================================================
// Client Configuration
// ============================================================================
// Endpoint selection, timeouts, transport mode and retry policy. Values are
// validated on construction and again by every setter. Clients copy what they
// need when they are built, so mutating a config later never re-targets an
// existing client.
// ============================================================================

import { z } from 'zod';
import { getEnvironment, prefersLocalEndpoints, type EnvSource, type Environment } from './config.js';
import { loadConfigFile, mergeConfigOverrides } from './configFile.js';
import { ValidationError } from './errors.js';
import { computeBackoffDelay, type BackoffPolicy } from './retry.js';
import { parseWithSchema } from './validation.js';

export const TRANSPORT_MODES = ['kernel', 'http'] as const;
export type TransportMode = (typeof TRANSPORT_MODES)[number];

export const PRODUCTION_HTTP_ENDPOINT = 'https://api.huefy.dev/api/v1/sdk';
export const LOCAL_HTTP_ENDPOINT = 'http://localhost:8080/api/v1/sdk';
export const PRODUCTION_GRPC_ENDPOINT = 'api.huefy.dev:50051';
export const LOCAL_GRPC_ENDPOINT = 'localhost:50051';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_TRANSPORT: TransportMode = 'kernel';

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

// ============================================================================
// Retry Policy
// ============================================================================

export interface RetryConfigOptions {
  enabled?: boolean;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

const DEFAULT_RETRY: Required<RetryConfigOptions> = {
  enabled: true,
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
};

const RetryConfigSchema = z
  .object({
    enabled: z.boolean({ invalid_type_error: 'enabled must be a boolean' }),
    maxRetries: z
      .number({ invalid_type_error: 'maxRetries must be a number' })
      .int('maxRetries must be an integer')
      .min(0, 'maxRetries cannot be negative'),
    baseDelayMs: z
      .number({ invalid_type_error: 'baseDelayMs must be a number' })
      .min(0, 'baseDelayMs cannot be negative')
      .max(MAX_TIMER_MS, `baseDelayMs cannot exceed ${MAX_TIMER_MS}ms`),
    maxDelayMs: z
      .number({ invalid_type_error: 'maxDelayMs must be a number' })
      .min(0, 'maxDelayMs cannot be negative')
      .max(MAX_TIMER_MS, `maxDelayMs cannot exceed ${MAX_TIMER_MS}ms`),
    backoffMultiplier: z
      .number({ invalid_type_error: 'backoffMultiplier must be a number' })
      .min(1, 'backoffMultiplier must be at least 1'),
  })
  .refine(r => r.maxDelayMs >= r.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export class RetryConfig implements BackoffPolicy {
  readonly enabled: boolean;
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;

  constructor(options: RetryConfigOptions = {}) {
    const parsed = parseWithSchema(
      RetryConfigSchema,
      {
        enabled: options.enabled ?? DEFAULT_RETRY.enabled,
        maxRetries: options.maxRetries ?? DEFAULT_RETRY.maxRetries,
        baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs,
        backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY.backoffMultiplier,
      },
      'retry',
    );
    this.enabled = parsed.enabled;
    this.maxRetries = parsed.maxRetries;
    this.baseDelayMs = parsed.baseDelayMs;
    this.maxDelayMs = parsed.maxDelayMs;
    this.backoffMultiplier = parsed.backoffMultiplier;
  }

  static disabled(): RetryConfig {
    return new RetryConfig({ enabled: false, maxRetries: 0 });
  }

  /** Retries actually attempted: none when the policy is switched off. */
  get effectiveRetries(): number {
    return this.enabled ? this.maxRetries : 0;
  }

  delayFor(attempt: number): number {
    return computeBackoffDelay(attempt, this);
  }

  toJSON(): Required<RetryConfigOptions> {
    return {
      enabled: this.enabled,
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      backoffMultiplier: this.backoffMultiplier,
    };
  }
}

// ============================================================================
// Huefy Config
// ============================================================================

export interface HuefyConfigOptions {
  /** Custom endpoint; overrides `local` for both transports */
  baseUrl?: string | null;
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Connection timeout in ms (default: 10000) */
  connectTimeoutMs?: number;
  retry?: RetryConfig | RetryConfigOptions;
  /** 'kernel' (default) or 'http' */
  transport?: string;
  /** Use local development endpoints. Defaults from APP_ENV / NODE_ENV. */
  local?: boolean;
  /** Explicit kernel executable; skips the platform lookup */
  kernelBinaryPath?: string;
  /** Environment snapshot (defaults to process.env) */
  environment?: EnvSource;
}

export interface HuefyConfigSnapshot {
  baseUrl: string | null;
  timeoutMs: number;
  connectTimeoutMs: number;
  transport: TransportMode;
  local: boolean;
  kernelBinaryPath?: string;
  retry: Required<RetryConfigOptions>;
  httpEndpoint: string;
  grpcEndpoint: string;
}

const TimeoutSchema = z
  .number({ invalid_type_error: 'Timeout must be a number' })
  .positive('Timeout must be positive')
  .finite('Timeout must be finite')
  .max(MAX_TIMER_MS, `Timeout cannot exceed ${MAX_TIMER_MS}ms`);

const ConnectTimeoutSchema = z
  .number({ invalid_type_error: 'Connect timeout must be a number' })
  .positive('Connect timeout must be positive')
  .finite('Connect timeout must be finite')
  .max(MAX_TIMER_MS, `Connect timeout cannot exceed ${MAX_TIMER_MS}ms`);

const TransportSchema = z.enum(TRANSPORT_MODES, {
  errorMap: () => ({ message: `Transport must be one of: ${TRANSPORT_MODES.join(', ')}` }),
});

export function parseTransportMode(value: unknown): TransportMode {
  return parseWithSchema(TransportSchema, value, 'transport');
}

export class HuefyConfig {
  readonly environment: Environment;
  readonly kernelBinaryPath?: string;
  private readonly local: boolean;
  private baseUrl: string | null = null;
  private timeoutMs = DEFAULT_TIMEOUT_MS;
  private connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS;
  private retry = new RetryConfig();
  private transport: TransportMode = DEFAULT_TRANSPORT;

  constructor(options: HuefyConfigOptions = {}) {
    this.environment = getEnvironment(options.environment);
    this.setBaseUrl(options.baseUrl ?? null);
    this.setTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.setConnectTimeout(options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
    this.setRetryConfig(options.retry ?? new RetryConfig());
    this.setTransport(options.transport ?? DEFAULT_TRANSPORT);
    this.local = options.local ?? prefersLocalEndpoints(this.environment);
    this.kernelBinaryPath = options.kernelBinaryPath?.trim() || undefined;
  }

  /** Same as `new HuefyConfig(options)` with retries switched off. */
  static withoutRetries(options: Omit<HuefyConfigOptions, 'retry'> = {}): HuefyConfig {
    return new HuefyConfig({ ...options, retry: RetryConfig.disabled() });
  }

  /**
   * Build a config from HUEFY_* variables. Unset variables keep their defaults.
   */
  static fromEnvironment(env: EnvSource = process.env): HuefyConfig {
    const numberVar = (name: string): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') return undefined;
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ValidationError(`${name} must be a number, got "${raw}"`, { field: name });
      }
      return value;
    };
    const flagVar = (name: string): boolean | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') return undefined;
      return raw === '1' || raw.toLowerCase() === 'true';
    };

    const maxRetries = numberVar('HUEFY_MAX_RETRIES');
    return new HuefyConfig({
      baseUrl: env.HUEFY_BASE_URL,
      transport: env.HUEFY_TRANSPORT || undefined,
      timeoutMs: numberVar('HUEFY_TIMEOUT_MS'),
      connectTimeoutMs: numberVar('HUEFY_CONNECT_TIMEOUT_MS'),
      local: flagVar('HUEFY_LOCAL'),
      kernelBinaryPath: env.HUEFY_KERNEL_PATH,
      retry: maxRetries !== undefined ? { maxRetries } : undefined,
      environment: env,
    });
  }

  /**
   * Load options from a YAML file (default ~/.huefy/config.yaml). `overrides`
   * win over file values.
   */
  static fromFile(filePath?: string, overrides: HuefyConfigOptions = {}): HuefyConfig {
    return new HuefyConfig(mergeConfigOverrides(loadConfigFile(filePath), overrides));
  }

  // ==========================================================================
  // Endpoints
  // ==========================================================================

  getHttpEndpoint(): string {
    if (this.baseUrl !== null) return this.baseUrl;
    return this.local ? LOCAL_HTTP_ENDPOINT : PRODUCTION_HTTP_ENDPOINT;
  }

  getGrpcEndpoint(): string {
    if (this.baseUrl !== null) return this.baseUrl;
    return this.local ? LOCAL_GRPC_ENDPOINT : PRODUCTION_GRPC_ENDPOINT;
  }

  getBaseUrl(): string | null {
    return this.baseUrl;
  }

  setBaseUrl(baseUrl: string | null): void {
    const trimmed = baseUrl?.trim().replace(/\/+$/, '');
    this.baseUrl = trimmed ? trimmed : null;
  }

  isLocal(): boolean {
    return this.local;
  }

  // ==========================================================================
  // Timeouts
  // ==========================================================================

  getTimeout(): number {
    return this.timeoutMs;
  }

  setTimeout(timeoutMs: number): void {
    this.timeoutMs = parseWithSchema(TimeoutSchema, timeoutMs, 'timeoutMs');
  }

  getConnectTimeout(): number {
    return this.connectTimeoutMs;
  }

  setConnectTimeout(connectTimeoutMs: number): void {
    this.connectTimeoutMs = parseWithSchema(ConnectTimeoutSchema, connectTimeoutMs, 'connectTimeoutMs');
  }

  // ==========================================================================
  // Retry & Transport
  // ==========================================================================

  getRetryConfig(): RetryConfig {
    return this.retry;
  }

  setRetryConfig(retry: RetryConfig | RetryConfigOptions): void {
    this.retry = retry instanceof RetryConfig ? retry : new RetryConfig(retry);
  }

  getTransport(): TransportMode {
    return this.transport;
  }

  setTransport(transport: string): void {
    this.transport = parseTransportMode(transport);
  }

  isKernelTransport(): boolean {
    return this.transport === 'kernel';
  }

  isHttpTransport(): boolean {
    return this.transport === 'http';
  }

  toJSON(): HuefyConfigSnapshot {
    return {
      baseUrl: this.baseUrl,
      timeoutMs: this.timeoutMs,
      connectTimeoutMs: this.connectTimeoutMs,
      transport: this.transport,
      local: this.local,
      kernelBinaryPath: this.kernelBinaryPath,
      retry: this.retry.toJSON(),
      httpEndpoint: this.getHttpEndpoint(),
      grpcEndpoint: this.getGrpcEndpoint(),
    };
  }
}
