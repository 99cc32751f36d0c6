// ============================================================================
// Kernel Transport — one subprocess per call
// ============================================================================
// Spawns the platform's kernel executable, writes a single JSON command to
// its stdin, and reads a single JSON result from its stdout:
//
//   in:  { command, config: { apiKey, endpoint, timeout }, data? }
//   out: { success, data?, error?: { code, message } }
//
// No retry happens here; a failed process is reported as-is.
// ============================================================================

import { HuefyError, NetworkError, createError } from '../errors.js';
import type { HuefyConfig } from '../huefyConfig.js';
import type { EmailPayload } from '../models.js';
import { assertExecutable, resolveKernelBinaryPath } from './platform.js';
import { ProcessRunner } from './process.js';
import { isJsonObject, type HuefyTransport, type JsonObject, type Logger } from './types.js';

export type KernelCommandName = 'sendEmail' | 'sendBulkEmails' | 'healthCheck';

export interface KernelCommand {
  command: KernelCommandName;
  config: {
    apiKey: string;
    endpoint: string;
    timeout: number;
  };
  data?: EmailPayload | EmailPayload[];
}

export interface KernelTransportOptions {
  /** Shared runner; lets callers account for live processes */
  runner?: ProcessRunner;
  logger?: Logger;
}

export class KernelTransport implements HuefyTransport {
  readonly mode = 'kernel' as const;
  readonly binaryPath: string;
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly runner: ProcessRunner;
  private readonly logger?: Logger;

  constructor(apiKey: string, config: HuefyConfig, options: KernelTransportOptions = {}) {
    this.apiKey = apiKey;
    this.endpoint = config.getGrpcEndpoint();
    this.timeoutMs = config.getTimeout();
    this.logger = options.logger;
    this.runner = options.runner ?? new ProcessRunner(options.logger);
    this.binaryPath = config.kernelBinaryPath
      ?? resolveKernelBinaryPath(config.environment.packageRoot);

    assertExecutable(this.binaryPath);
  }

  async sendEmail(payload: EmailPayload): Promise<JsonObject> {
    return this.execute('sendEmail', payload);
  }

  async sendBulkEmails(payloads: EmailPayload[]): Promise<JsonObject> {
    return this.execute('sendBulkEmails', payloads);
  }

  async healthCheck(): Promise<JsonObject> {
    return this.execute('healthCheck');
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  async close(): Promise<void> {
    // Processes never outlive a call.
  }

  private buildCommand(command: KernelCommandName, data?: EmailPayload | EmailPayload[]): KernelCommand {
    return {
      command,
      config: {
        apiKey: this.apiKey,
        endpoint: this.endpoint,
        timeout: this.timeoutMs,
      },
      ...(data !== undefined && { data }),
    };
  }

  private async execute(command: KernelCommandName, data?: EmailPayload | EmailPayload[]): Promise<JsonObject> {
    const input = JSON.stringify(this.buildCommand(command, data));
    this.logger?.(`kernel ${command} (endpoint=${this.endpoint})`);

    const result = await this.runner.run({
      command: this.binaryPath,
      input,
      timeoutMs: this.timeoutMs,
      label: 'kernel binary',
    });

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      const reason = result.exitCode === null
        ? `was terminated by signal ${result.signal ?? 'unknown'}`
        : `exited with code ${result.exitCode}`;
      throw new NetworkError(`Kernel binary ${reason}${stderr ? `: ${stderr}` : ''}`, {
        details: { exitCode: result.exitCode, signal: result.signal, stderr },
      });
    }

    return this.decode(result.stdout, result.stderr);
  }

  private decode(stdout: string, stderr: string): JsonObject {
    if (stdout.trim() === '') {
      throw new HuefyError('Empty response from kernel binary', {
        code: 'EMPTY_RESPONSE',
        details: { stderr },
      });
    }

    let response: unknown;
    try {
      response = JSON.parse(stdout);
    } catch (err) {
      throw new HuefyError(
        `Failed to decode kernel response: ${err instanceof Error ? err.message : String(err)}`,
        { code: 'INVALID_JSON', cause: err, details: { stderr } },
      );
    }

    if (!isJsonObject(response) || response.success !== true) {
      const error: JsonObject = isJsonObject(response) && isJsonObject(response.error) ? response.error : {};
      const code = typeof error.code === 'string' && error.code ? error.code : 'KERNEL_ERROR';
      const message = typeof error.message === 'string' && error.message ? error.message : 'Unknown kernel error';
      throw createError(code, `Kernel error: ${message}`, { details: { stderr } });
    }

    const { data } = response;
    if (data === undefined || data === null) {
      return {};
    }
    if (!isJsonObject(data)) {
      throw new HuefyError('Kernel response data must be a JSON object', { code: 'INVALID_RESPONSE' });
    }
    return data;
  }
}
