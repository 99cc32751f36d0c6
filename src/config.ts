import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type EnvSource = Record<string, string | undefined>;

/**
 * Ambient signals, snapshotted once when a config is built; endpoint defaults
 * come only from that snapshot. log() is the exception: it re-reads
 * HUEFY_DEBUG on every call so output can be switched on in a running process.
 */
export interface Environment {
  appEnv?: string;
  nodeEnv?: string;
  debug: boolean;
  packageRoot: string;
}

export function getEnvironment(env: EnvSource = process.env): Environment {
  return {
    appEnv: env.APP_ENV || undefined,
    nodeEnv: env.NODE_ENV || undefined,
    debug: env.HUEFY_DEBUG === '1' || env.HUEFY_DEBUG === 'true',
    packageRoot: path.resolve(__dirname, '..'),
  };
}

/**
 * Local endpoints only when the environment says so explicitly; a missing
 * APP_ENV/NODE_ENV means production.
 */
export function prefersLocalEndpoints(environment: Environment): boolean {
  const values = [environment.appEnv, environment.nodeEnv];
  if (values.includes('production')) return false;
  return values.some(v => v === 'development' || v === 'local');
}

/** Prefixed stderr line, only while HUEFY_DEBUG is 1 or true. */
export function log(message: string, ...args: unknown[]): void {
  if (getEnvironment().debug) {
    console.error(`[huefy] ${message}`, ...args);
  }
}
