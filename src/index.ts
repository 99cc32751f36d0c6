// ============================================================================
// huefy-sdk — public API
// ============================================================================
//
// import { HuefyClient, HuefyConfig, SendEmailRequest } from 'huefy-sdk';
//
// const client = new HuefyClient('your-api-key', new HuefyConfig({ transport: 'http' }));
// const res = await client.sendEmail(new SendEmailRequest({
//   templateKey: 'welcome-email',
//   recipient: 'john@example.com',
//   data: { name: 'John Doe' },
//   provider: 'sendgrid',
// }));
// ============================================================================

export { HuefyClient } from './client.js';
export type {
  HuefyClientOptions,
  ClientOperation,
  ClientResultEvent,
  ClientErrorEvent,
} from './client.js';

export {
  HuefyConfig,
  RetryConfig,
  TRANSPORT_MODES,
  MAX_TIMER_MS,
  PRODUCTION_HTTP_ENDPOINT,
  LOCAL_HTTP_ENDPOINT,
  PRODUCTION_GRPC_ENDPOINT,
  LOCAL_GRPC_ENDPOINT,
  parseTransportMode,
} from './huefyConfig.js';
export type {
  HuefyConfigOptions,
  HuefyConfigSnapshot,
  RetryConfigOptions,
  TransportMode,
} from './huefyConfig.js';
export { loadConfigFile, mergeConfigOverrides, getConfigPath } from './configFile.js';

export {
  SendEmailRequest,
  SendEmailResponse,
  BulkEmailResponse,
  HealthResponse,
  EMAIL_PROVIDERS,
} from './models.js';
export type {
  EmailPayload,
  EmailProvider,
  SendEmailRequestInit,
  SendEmailResponsePayload,
  BulkEmailResult,
  BulkEmailResponsePayload,
  HealthResponsePayload,
} from './models.js';

export {
  HuefyError,
  ValidationError,
  NetworkError,
  TimeoutError,
  AuthenticationError,
  TemplateNotFoundError,
  InvalidRecipientError,
  RateLimitError,
  ProviderError,
  registerErrorCode,
  createError,
  createErrorFromResponse,
} from './errors.js';
export type { HuefyErrorOptions, ValidationErrorOptions, HuefyErrorClass } from './errors.js';

export { computeBackoffDelay } from './retry.js';

export * from './transports/index.js';
