// ============================================================================
// HTTP Transport — calls the Huefy REST API directly
// ============================================================================
// One fetch per attempt, aborted after the configured timeout. Connection
// failures and 5xx responses are retried with exponential backoff; 4xx
// responses are translated into typed errors straight away.
// ============================================================================

import { Agent, fetch as undiciFetch } from 'undici';
import {
  HuefyError,
  NetworkError,
  TimeoutError,
  createErrorFromResponse,
} from '../errors.js';
import type { HuefyConfig, RetryConfig } from '../huefyConfig.js';
import type { EmailPayload } from '../models.js';
import { sleep as defaultSleep } from '../retry.js';
import { isJsonObject, type HuefyTransport, type JsonObject, type Logger } from './types.js';

export const USER_AGENT = 'Huefy-Node-SDK/1.0.0';

type HttpMethod = 'GET' | 'POST';

export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponse {
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface HttpTransportOptions {
  /** Replaces the undici-backed fetch (tests, custom agents) */
  fetch?: FetchLike;
  /** Replaces the backoff timer */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface RawResponse {
  status: number;
  statusText: string;
  body: string;
}

const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT']);

export class HttpTransport implements HuefyTransport {
  readonly mode = 'http' as const;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;
  private readonly agent: Agent | null;

  constructor(apiKey: string, config: HuefyConfig, options: HttpTransportOptions = {}) {
    this.baseUrl = config.getHttpEndpoint().replace(/\/+$/, '');
    this.timeoutMs = config.getTimeout();
    this.retry = config.getRetryConfig();
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
    this.headers = {
      'X-API-Key': apiKey,
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    };

    if (options.fetch) {
      this.agent = null;
      this.fetchImpl = options.fetch;
    } else {
      const agent = new Agent({ connect: { timeout: config.getConnectTimeout() } });
      this.agent = agent;
      this.fetchImpl = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }
  }

  async sendEmail(payload: EmailPayload): Promise<JsonObject> {
    return this.request('POST', '/emails/send', payload);
  }

  async sendBulkEmails(payloads: EmailPayload[]): Promise<JsonObject> {
    return this.request('POST', '/emails/bulk', { emails: payloads });
  }

  async healthCheck(): Promise<JsonObject> {
    return this.request('GET', '/health');
  }

  getEndpoint(): string {
    return this.baseUrl;
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  async close(): Promise<void> {
    if (this.agent) {
      await this.agent.close();
    }
  }

  // ============================================================================
  // Private
  // ============================================================================

  private async request(method: HttpMethod, path: string, data?: unknown): Promise<JsonObject> {
    const url = `${this.baseUrl}${path}`;
    const body = data === undefined ? undefined : JSON.stringify(data);
    const maxRetries = this.retry.effectiveRetries;
    let lastFailure: HuefyError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.retry.delayFor(attempt);
        this.logger?.(`${method} ${path} retry ${attempt}/${maxRetries} in ${delay}ms (${lastFailure?.message})`);
        await this.sleep(delay);
      }

      let response: RawResponse;
      try {
        response = await this.send(method, url, body);
      } catch (err) {
        if (!(err instanceof NetworkError)) throw err;
        lastFailure = err;
        continue;
      }

      if (response.status >= 500) {
        lastFailure = createErrorFromResponse(response.body, response.status);
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        throw createErrorFromResponse(response.body, response.status);
      }

      return this.decodeSuccess(response.body);
    }

    throw this.exhausted(maxRetries + 1, lastFailure);
  }

  /**
   * Perform one attempt. Anything that prevents an HTTP response from arriving
   * comes back as a NetworkError (or TimeoutError).
   */
  private async send(method: HttpMethod, url: string, body?: string): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        ...(body !== undefined && { body }),
        signal: controller.signal,
      });
      const text = await res.text();
      return { status: res.status, statusText: res.statusText, body: text };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`Request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      if (isConnectTimeout(err)) {
        throw new TimeoutError(`Connection timed out: ${describe(err)}`, { cause: err });
      }
      throw new NetworkError(`Network error: ${describe(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  private decodeSuccess(body: string): JsonObject {
    if (body.trim() === '') {
      throw new HuefyError('Empty response body received', { code: 'EMPTY_RESPONSE' });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new HuefyError(`Failed to decode JSON response: ${describe(err)}`, {
        code: 'INVALID_JSON',
        cause: err,
      });
    }

    if (!isJsonObject(parsed)) {
      throw new HuefyError('Expected a JSON object in the response body', { code: 'INVALID_RESPONSE' });
    }
    return parsed;
  }

  private exhausted(attempts: number, last: HuefyError | null): NetworkError {
    const message = `Request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${last?.message ?? 'unknown error'}`;
    const options = { cause: last ?? undefined, statusCode: last?.statusCode };
    return last instanceof TimeoutError
      ? new TimeoutError(message, options)
      : new NetworkError(message, options);
  }
}

function describe(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
  return `${err.message}${cause}`;
}

function isConnectTimeout(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const candidates = [err, err.cause];
  return candidates.some(
    c => typeof c === 'object' && c !== null && 'code' in c && typeof c.code === 'string' && CONNECT_TIMEOUT_CODES.has(c.code),
  );
}
