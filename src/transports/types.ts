// ============================================================================
// Transport Interface
// ============================================================================
// HuefyClient talks to exactly one transport, chosen when the client is built.
// Both implementations return the decoded JSON payload of a successful call
// and throw HuefyError subclasses for everything else.
// ============================================================================

import type { TransportMode } from '../huefyConfig.js';
import type { EmailPayload } from '../models.js';

export type JsonObject = Record<string, unknown>;

export type Logger = (msg: string) => void;

export interface HuefyTransport {
  readonly mode: TransportMode;
  sendEmail(payload: EmailPayload): Promise<JsonObject>;
  sendBulkEmails(payloads: EmailPayload[]): Promise<JsonObject>;
  healthCheck(): Promise<JsonObject>;
  /** Endpoint this transport talks to (URL for HTTP, host:port for kernel) */
  getEndpoint(): string;
  /** Per-call timeout in ms */
  getTimeout(): number;
  /** Release anything held between calls */
  close(): Promise<void>;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
