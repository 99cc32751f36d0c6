// ============================================================================
// Error Taxonomy
// ============================================================================
// Every failed SDK call ends in exactly one HuefyError (or subclass). API error
// codes are mapped to classes through a registry; unknown codes fall back to
// the base class carrying the original code and message.
// ============================================================================

export interface HuefyErrorOptions {
  code?: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class HuefyError extends Error {
  readonly code: string;
  readonly statusCode?: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: HuefyErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = options.code ?? this.defaultCode();
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  protected defaultCode(): string {
    return 'HUEFY_ERROR';
  }
}

export interface ValidationErrorOptions extends HuefyErrorOptions {
  field?: string;
  index?: number;
}

export class ValidationError extends HuefyError {
  readonly field?: string;
  readonly index?: number;

  constructor(message: string, options: ValidationErrorOptions = {}) {
    super(message, options);
    this.field = options.field;
    this.index = options.index;
  }

  protected override defaultCode(): string {
    return 'VALIDATION_ERROR';
  }
}

export class NetworkError extends HuefyError {
  protected override defaultCode(): string {
    return 'NETWORK_ERROR';
  }
}

/** A timeout is a network failure as far as retry is concerned. */
export class TimeoutError extends NetworkError {
  protected override defaultCode(): string {
    return 'TIMEOUT';
  }
}

export class AuthenticationError extends HuefyError {
  protected override defaultCode(): string {
    return 'INVALID_API_KEY';
  }
}

export class TemplateNotFoundError extends HuefyError {
  protected override defaultCode(): string {
    return 'TEMPLATE_NOT_FOUND';
  }
}

export class InvalidRecipientError extends ValidationError {
  protected override defaultCode(): string {
    return 'INVALID_RECIPIENT';
  }
}

export class RateLimitError extends HuefyError {
  /** Seconds the API asked us to wait, when it said. */
  readonly retryAfter?: number;

  constructor(message: string, options: HuefyErrorOptions = {}) {
    super(message, options);
    const retryAfter = options.details?.retryAfter;
    this.retryAfter = typeof retryAfter === 'number' ? retryAfter : undefined;
  }

  protected override defaultCode(): string {
    return 'RATE_LIMIT_EXCEEDED';
  }
}

export class ProviderError extends HuefyError {
  protected override defaultCode(): string {
    return 'PROVIDER_ERROR';
  }
}

// ============================================================================
// Code Registry
// ============================================================================

export type HuefyErrorClass = new (message: string, options?: HuefyErrorOptions) => HuefyError;

const registry = new Map<string, HuefyErrorClass>([
  ['INVALID_API_KEY', AuthenticationError],
  ['UNAUTHORIZED', AuthenticationError],
  ['FORBIDDEN', AuthenticationError],
  ['TEMPLATE_NOT_FOUND', TemplateNotFoundError],
  ['INVALID_RECIPIENT', InvalidRecipientError],
  ['VALIDATION_ERROR', ValidationError],
  ['INVALID_REQUEST', ValidationError],
  ['RATE_LIMIT_EXCEEDED', RateLimitError],
  ['RATE_LIMITED', RateLimitError],
  ['PROVIDER_ERROR', ProviderError],
  ['TIMEOUT', TimeoutError],
  ['NETWORK_ERROR', NetworkError],
]);

/**
 * Map an additional API error code to an error class. Later registrations
 * replace earlier ones for the same code.
 */
export function registerErrorCode(code: string, errorClass: HuefyErrorClass): void {
  registry.set(code, errorClass);
}

export function errorClassFor(code: string): HuefyErrorClass {
  return registry.get(code) ?? HuefyError;
}

export function createError(
  code: string,
  message: string,
  options: Omit<HuefyErrorOptions, 'code'> = {},
): HuefyError {
  const ErrorClass = errorClassFor(code);
  return new ErrorClass(message, { ...options, code });
}

// ============================================================================
// Response Translation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a non-2xx response body into a typed error. The API wraps failures as
 * `{ error: { code, message, details? } }`; anything else is reported under
 * `HTTP_<status>`.
 */
export function createErrorFromResponse(
  body: string,
  statusCode: number,
  cause?: unknown,
): HuefyError {
  const fallbackCode = `HTTP_${statusCode}`;
  const fallbackMessage = `HTTP ${statusCode}`;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return createError(fallbackCode, body.trim() || fallbackMessage, { statusCode, cause });
  }

  const envelope = isRecord(parsed) ? parsed.error : undefined;
  if (isRecord(envelope)) {
    const { code, message, details } = envelope;
    return createError(
      typeof code === 'string' && code ? code : fallbackCode,
      typeof message === 'string' && message ? message : fallbackMessage,
      { statusCode, cause, details: isRecord(details) ? details : undefined },
    );
  }

  const topLevelMessage = isRecord(parsed) ? parsed.message : undefined;
  const message = typeof topLevelMessage === 'string' && topLevelMessage ? topLevelMessage : fallbackMessage;
  return createError(fallbackCode, message, { statusCode, cause });
}
