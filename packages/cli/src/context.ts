import { createLogger, retry } from '@lp-builds/shared';
import type { Config } from '@lp-builds/shared';
import { Launchpad, RemoteRequestError } from '@lp-builds/launchpad';
import { loadCatalog } from './config-loader.js';
import { OpenPgpEncryptor } from './encryption.js';

const logger = createLogger('cli');

export function createLaunchpad(config: Config): Launchpad {
  return Launchpad.fromConfig(config, {
    catalog: loadCatalog(config),
    encryptor: new OpenPgpEncryptor(),
  });
}

/** Server errors and network failures are worth another try; the rest are not. */
export function isTransient(err: Error): boolean {
  if (err instanceof RemoteRequestError) return err.statusCode >= 500;
  return err instanceof TypeError;
}

/**
 * Run a read-only query with retries. Mutations are never retried: a
 * request that timed out may still have been applied.
 */
export function withRetries<T>(fn: () => Promise<T>, retries: number): Promise<T> {
  return retry(fn, {
    maxAttempts: retries + 1,
    baseDelayMs: 1000,
    maxDelayMs: 10000,
    shouldRetry: isTransient,
    onRetry: (err, attempt, delayMs) => {
      logger.warn(`Attempt ${attempt} failed (${err.message}), retrying in ${delayMs}ms`);
    },
  });
}

export function parseCount(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new Error(`Expected a non-negative number, got "${value}"`);
  }
  return n;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
