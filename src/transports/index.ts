// ============================================================================
// Transport Layer — public API
// ============================================================================

export type { HuefyTransport, JsonObject, Logger } from './types.js';
export { HttpTransport, USER_AGENT } from './http.js';
export type { HttpTransportOptions, FetchLike, FetchInit, FetchResponse } from './http.js';
export { KernelTransport } from './kernel.js';
export type { KernelCommand, KernelCommandName, KernelTransportOptions } from './kernel.js';
export { ProcessRunner } from './process.js';
export type { ProcessResult, RunProcessOptions } from './process.js';
export { resolveKernelBinaryName, resolveKernelBinaryPath, assertExecutable } from './platform.js';
