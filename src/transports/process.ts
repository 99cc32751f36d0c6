// ============================================================================
// Process Runner
// ============================================================================
// Spawn-with-pipes, bounded read-to-completion, and reap-on-every-path for
// one-shot subprocess calls. A child is always dead, and its pipes closed,
// by the time run() settles.
// ============================================================================

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { NetworkError, TimeoutError } from '../errors.js';
import type { Logger } from './types.js';

export interface RunProcessOptions {
  command: string;
  args?: string[];
  /** Written to stdin, which is then closed */
  input: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  /** Name used in error messages (default: the command) */
  label?: string;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Handle on a spawned child that knows whether it has fully closed.
 */
class ManagedProcess {
  readonly child: ChildProcessWithoutNullStreams;
  readonly closed: Promise<void>;

  constructor(child: ChildProcessWithoutNullStreams) {
    this.child = child;
    this.closed = new Promise(resolve => {
      child.once('close', () => resolve());
    });
  }

  get running(): boolean {
    return this.child.pid !== undefined && this.child.exitCode === null && this.child.signalCode === null;
  }

  async release(): Promise<void> {
    if (this.running) {
      this.child.kill('SIGKILL');
      await this.closed;
    }
    this.child.stdin.destroy();
    this.child.stdout.destroy();
    this.child.stderr.destroy();
  }
}

export class ProcessRunner {
  private readonly live = new Set<ChildProcessWithoutNullStreams>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /** Children spawned by this runner that have not been reaped yet */
  get activeCount(): number {
    return this.live.size;
  }

  async run(options: RunProcessOptions): Promise<ProcessResult> {
    const child = spawn(options.command, options.args ?? [], {
      env: options.env ?? process.env,
      windowsHide: true,
    });
    const proc = new ManagedProcess(child);
    this.live.add(child);

    try {
      return await this.communicate(proc, options);
    } finally {
      await proc.release();
      this.live.delete(child);
    }
  }

  private communicate(proc: ManagedProcess, options: RunProcessOptions): Promise<ProcessResult> {
    const { child } = proc;
    const label = options.label ?? options.command;

    return new Promise<ProcessResult>((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const timer = setTimeout(() => {
        finish(() => reject(new TimeoutError(
          `${label} did not finish within ${options.timeoutMs}ms`,
          { details: { stderr } },
        )));
      }, options.timeoutMs);

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      // A child that exits without reading its input causes EPIPE here; the
      // exit status is what gets reported.
      child.stdin.on('error', (err) => {
        this.logger?.(`Process stdin error: ${err.message}`);
      });

      child.on('error', (err) => {
        finish(() => reject(new NetworkError(
          `Failed to start ${label} process: ${err.message}`,
          { cause: err },
        )));
      });

      child.on('close', (code, signal) => {
        finish(() => resolve({ stdout, stderr, exitCode: code, signal }));
      });

      child.stdin.end(options.input);
    });
  }
}
