import { isTransientError } from '../classify';
import { CONFIG } from '../config';
import logger from '../logger';
import { incRetries } from '../metrics';
import { delayMs } from './timeout';

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  isTransient?: (err: unknown) => boolean;
  /** Used in log lines and the retry metric. */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wait before each retry: initial, doubled after every retry, capped at max.
 */
export function backoffSchedule(
  retries: number,
  initialDelayMs = CONFIG.RETRY.INITIAL_DELAY_MS,
  maxDelayMs = CONFIG.RETRY.MAX_DELAY_MS,
): number[] {
  const out: number[] = [];
  let wait = Math.min(initialDelayMs, maxDelayMs);
  for (let i = 0; i < retries; i++) {
    out.push(wait);
    wait = Math.min(wait * 2, maxDelayMs);
  }
  return out;
}

/**
 * Run `operation`, retrying transient failures with exponential backoff.
 * Permanent failures, and the last failure once the budget is spent,
 * are rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? CONFIG.RETRY.MAX_RETRIES;
  const maxDelay = opts.maxDelayMs ?? CONFIG.RETRY.MAX_DELAY_MS;
  const isTransient = opts.isTransient ?? isTransientError;
  const sleep = opts.sleep ?? delayMs;
  const label = opts.label ?? 'operation';

  let retries = 0;
  let wait = Math.min(opts.initialDelayMs ?? CONFIG.RETRY.INITIAL_DELAY_MS, maxDelay);

  while (true) {
    try {
      return await operation();
    } catch (err) {
      if (!isTransient(err) || retries >= maxRetries) throw err;
      retries++;
      logger.warn(
        { err, operation: label, attempt: retries, maxRetries, waitMs: wait },
        `${label} failed, retrying in ${wait}ms`,
      );
      incRetries(label);
      await sleep(wait);
      wait = Math.min(wait * 2, maxDelay);
    }
  }
}

export default retryWithBackoff;
