// ============================================================================
// HuefyClient — template email sending SDK
// ============================================================================
// Validates requests, forwards them to the transport chosen at construction
// (kernel subprocess or direct HTTP), and decodes the results.
//
// Usage:
//   const client = new HuefyClient('your-api-key', new HuefyConfig({ transport: 'http' }));
//   const res = await client.sendEmail(new SendEmailRequest({
//     templateKey: 'welcome-email',
//     recipient: 'john@example.com',
//     data: { name: 'John' },
//   }));
//   console.log(res.messageId);
//   await client.close();
// ============================================================================

import { EventEmitter } from 'events';
import { log } from './config.js';
import { HuefyError, ValidationError } from './errors.js';
import { HuefyConfig, type TransportMode } from './huefyConfig.js';
import {
  BulkEmailResponse,
  HealthResponse,
  SendEmailRequest,
  SendEmailResponse,
} from './models.js';
import { HttpTransport } from './transports/http.js';
import { KernelTransport } from './transports/kernel.js';
import type { HuefyTransport, JsonObject, Logger } from './transports/types.js';

export interface HuefyClientOptions {
  /** Diagnostic sink (defaults to the HUEFY_DEBUG-gated stderr log) */
  logger?: Logger;
}

export type ClientOperation = 'sendEmail' | 'sendBulkEmails' | 'healthCheck';

export interface ClientResultEvent {
  operation: ClientOperation;
  duration_ms: number;
  success: true;
}

export interface ClientErrorEvent {
  operation: ClientOperation;
  duration_ms: number;
  error: string;
  code: string;
}

export class HuefyClient {
  private readonly transport: HuefyTransport;
  private readonly log: Logger;

  readonly events = new EventEmitter();

  constructor(apiKey: string, config: HuefyConfig = new HuefyConfig(), options: HuefyClientOptions = {}) {
    if (typeof apiKey !== 'string' || apiKey.trim() === '') {
      throw new ValidationError('API key cannot be empty', { field: 'apiKey' });
    }

    this.log = options.logger ?? log;
    // EventEmitter throws on an unobserved 'error' emit.
    this.events.on('error', () => {});

    this.transport = config.isHttpTransport()
      ? new HttpTransport(apiKey, config, { logger: this.log })
      : new KernelTransport(apiKey, config, { logger: this.log });

    this.log(
      `HuefyClient initialized (transport=${this.transport.mode}, endpoint=${this.transport.getEndpoint()}, timeout=${this.transport.getTimeout()}ms)`,
    );
  }

  /**
   * Send a single templated email.
   *
   * @throws ValidationError before any I/O when the request is invalid
   */
  async sendEmail(request: SendEmailRequest): Promise<SendEmailResponse> {
    if (!(request instanceof SendEmailRequest)) {
      throw new ValidationError('Request must be a SendEmailRequest', { field: 'request' });
    }
    request.validate();
    const payload = await this.dispatch('sendEmail', () => this.transport.sendEmail(request.toPayload()));
    return SendEmailResponse.fromPayload(payload);
  }

  /**
   * Send several emails in one call. Every request is validated first; nothing
   * is sent if any of them is invalid.
   */
  async sendBulkEmails(requests: SendEmailRequest[]): Promise<BulkEmailResponse> {
    if (!Array.isArray(requests)) {
      throw new ValidationError('Requests must be an array', { field: 'requests' });
    }
    if (requests.length === 0) {
      throw new ValidationError('Requests array cannot be empty', { field: 'requests' });
    }

    requests.forEach((request, index) => {
      if (!(request instanceof SendEmailRequest)) {
        throw new ValidationError(`Request at index ${index} must be a SendEmailRequest`, {
          field: 'requests',
          index,
        });
      }
      try {
        request.validate();
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        throw new ValidationError(`Validation failed for request ${index}: ${err.message}`, {
          field: err.field,
          index,
          cause: err,
        });
      }
    });

    const payloads = requests.map(r => r.toPayload());
    const payload = await this.dispatch('sendBulkEmails', () => this.transport.sendBulkEmails(payloads));
    return BulkEmailResponse.fromPayload(payload);
  }

  async healthCheck(): Promise<HealthResponse> {
    const payload = await this.dispatch('healthCheck', () => this.transport.healthCheck());
    return HealthResponse.fromPayload(payload);
  }

  /** Release transport resources (HTTP connection agent). */
  async close(): Promise<void> {
    await this.transport.close();
  }

  get transportMode(): TransportMode {
    return this.transport.mode;
  }

  get endpoint(): string {
    return this.transport.getEndpoint();
  }

  get timeoutMs(): number {
    return this.transport.getTimeout();
  }

  // ============================================================================
  // Private
  // ============================================================================

  private async dispatch(operation: ClientOperation, call: () => Promise<JsonObject>): Promise<JsonObject> {
    const startTime = Date.now();
    try {
      const payload = await call();
      const event: ClientResultEvent = { operation, duration_ms: Date.now() - startTime, success: true };
      this.events.emit('result', event);
      return payload;
    } catch (err) {
      const event: ClientErrorEvent = {
        operation,
        duration_ms: Date.now() - startTime,
        error: err instanceof Error ? err.message : String(err),
        code: err instanceof HuefyError ? err.code : 'UNKNOWN',
      };
      this.log(`${operation} failed: ${event.error}`);
      this.events.emit('error', event);
      throw err;
    }
  }
}
