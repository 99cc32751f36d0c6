// ============================================================================
// Request / Response Models
// ============================================================================
// Wire shapes for the send, bulk and health calls. Requests validate before
// dispatch; responses are decoded from whatever payload the transport
// returned and reject shapes they cannot read.
// ============================================================================

import { z } from 'zod';
import { HuefyError } from './errors.js';
import { parseWithSchema } from './validation.js';

export const EMAIL_PROVIDERS = ['ses', 'sendgrid', 'mailgun', 'mailchimp'] as const;
export type EmailProvider = (typeof EMAIL_PROVIDERS)[number];

// ============================================================================
// SendEmailRequest
// ============================================================================

/** What the API receives for one email. */
export interface EmailPayload {
  templateKey: string;
  recipient: string;
  data: Record<string, string>;
  provider?: EmailProvider;
}

export interface SendEmailRequestInit {
  templateKey: string;
  recipient: string;
  data?: Record<string, string>;
  provider?: EmailProvider;
}

const SendEmailRequestSchema = z.object({
  templateKey: z
    .string({ invalid_type_error: 'Template key must be a string' })
    .trim()
    .min(1, 'Template key is required'),
  recipient: z
    .string({ invalid_type_error: 'Recipient must be a string' })
    .trim()
    .min(1, 'Recipient email is required')
    .email('Invalid recipient email address'),
  data: z.record(z.string({ invalid_type_error: 'Template data values must be strings' }), {
    invalid_type_error: 'Template data must be an object',
  }),
  provider: z
    .enum(EMAIL_PROVIDERS, {
      errorMap: () => ({ message: `Provider must be one of: ${EMAIL_PROVIDERS.join(', ')}` }),
    })
    .optional(),
});

// Non-strings pass through for the schema to report.
function trimmed(value: string): string {
  return typeof value === 'string' ? value.trim() : value;
}

export class SendEmailRequest {
  readonly templateKey: string;
  readonly recipient: string;
  readonly data: Record<string, string>;
  readonly provider?: EmailProvider;

  /** Template key and recipient are stored trimmed. */
  constructor(init: SendEmailRequestInit) {
    this.templateKey = trimmed(init.templateKey);
    this.recipient = trimmed(init.recipient);
    this.data = init.data ?? {};
    this.provider = init.provider;
  }

  static fromPayload(payload: EmailPayload): SendEmailRequest {
    return new SendEmailRequest(payload);
  }

  /**
   * Throws a ValidationError for the first rule broken, checked in field
   * order: template key, recipient, data, provider.
   */
  validate(): void {
    parseWithSchema(SendEmailRequestSchema, {
      templateKey: this.templateKey,
      recipient: this.recipient,
      data: this.data,
      provider: this.provider,
    });
  }

  toPayload(): EmailPayload {
    return {
      templateKey: this.templateKey,
      recipient: this.recipient,
      data: { ...this.data },
      ...(this.provider !== undefined && { provider: this.provider }),
    };
  }
}

// ============================================================================
// Response Decoding
// ============================================================================

function decode<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new HuefyError(`Invalid ${what} response${where}: ${issue?.message ?? 'unexpected shape'}`, {
      code: 'INVALID_RESPONSE',
      cause: result.error,
    });
  }
  return result.data;
}

const SendEmailResponseSchema = z.object({
  success: z.boolean().default(true),
  message: z.string().default(''),
  messageId: z.string().default(''),
  provider: z.string().default(''),
});

export type SendEmailResponsePayload = z.output<typeof SendEmailResponseSchema>;

export class SendEmailResponse {
  readonly success: boolean;
  readonly message: string;
  readonly messageId: string;
  readonly provider: string;

  constructor(payload: SendEmailResponsePayload) {
    this.success = payload.success;
    this.message = payload.message;
    this.messageId = payload.messageId;
    this.provider = payload.provider;
  }

  static fromPayload(payload: unknown): SendEmailResponse {
    return new SendEmailResponse(decode(SendEmailResponseSchema, payload, 'send'));
  }

  toPayload(): SendEmailResponsePayload {
    return {
      success: this.success,
      message: this.message,
      messageId: this.messageId,
      provider: this.provider,
    };
  }
}

const BulkErrorSchema = z.object({
  code: z.string().default('UNKNOWN_ERROR'),
  message: z.string().default(''),
});

const BulkEmailResultSchema = z.object({
  email: z.string().default(''),
  success: z.boolean(),
  result: SendEmailResponseSchema.optional(),
  error: BulkErrorSchema.optional(),
});

const BulkEmailResponseSchema = z.object({
  results: z.array(BulkEmailResultSchema).default([]),
});

export interface BulkEmailResult {
  email: string;
  success: boolean;
  result?: SendEmailResponse;
  error?: { code: string; message: string };
}

export interface BulkEmailResponsePayload {
  results: Array<{
    email: string;
    success: boolean;
    result?: SendEmailResponsePayload;
    error?: { code: string; message: string };
  }>;
}

export class BulkEmailResponse {
  readonly results: BulkEmailResult[];

  constructor(results: BulkEmailResult[]) {
    this.results = results;
  }

  static fromPayload(payload: unknown): BulkEmailResponse {
    const decoded = decode(BulkEmailResponseSchema, payload, 'bulk');
    return new BulkEmailResponse(
      decoded.results.map(entry => ({
        email: entry.email,
        success: entry.success,
        ...(entry.result && { result: new SendEmailResponse(entry.result) }),
        ...(entry.error && { error: entry.error }),
      })),
    );
  }

  get successCount(): number {
    return this.results.filter(r => r.success).length;
  }

  get failureCount(): number {
    return this.results.length - this.successCount;
  }

  get allSucceeded(): boolean {
    return this.failureCount === 0;
  }

  toPayload(): BulkEmailResponsePayload {
    return {
      results: this.results.map(r => ({
        email: r.email,
        success: r.success,
        ...(r.result && { result: r.result.toPayload() }),
        ...(r.error && { error: { ...r.error } }),
      })),
    };
  }
}

const HealthResponseSchema = z.object({
  status: z.string().default('unknown'),
  timestamp: z.string().default(''),
  version: z.string().default(''),
});

export type HealthResponsePayload = z.output<typeof HealthResponseSchema>;

export class HealthResponse {
  readonly status: string;
  readonly timestamp: string;
  readonly version: string;

  constructor(payload: HealthResponsePayload) {
    this.status = payload.status;
    this.timestamp = payload.timestamp;
    this.version = payload.version;
  }

  static fromPayload(payload: unknown): HealthResponse {
    return new HealthResponse(decode(HealthResponseSchema, payload, 'health'));
  }

  isHealthy(): boolean {
    return this.status === 'healthy';
  }

  toPayload(): HealthResponsePayload {
    return { status: this.status, timestamp: this.timestamp, version: this.version };
  }
}
