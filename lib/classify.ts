import {
  HttpStatusError,
  NetworkError,
  ProviderError,
  TimeoutError,
} from './errors';
import type { ProviderApiError } from './types';

/** Cloudflare's "rate limited" error code. */
export const RATE_LIMITED_CODE = 1015;

const TRANSIENT_MESSAGE_MARKERS = [
  'rate limit',
  'ratelimit',
  'too many requests',
  'temporar',
  'timeout',
  'try again',
];

export function isTransientStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

export function isTransientProviderError(e: ProviderApiError): boolean {
  if (e.code === RATE_LIMITED_CODE) return true;
  const msg = (e.message ?? '').toLowerCase();
  return TRANSIENT_MESSAGE_MARKERS.some((m) => msg.includes(m));
}

export function isTransientProviderErrors(errors: ProviderApiError[]): boolean {
  return errors.some(isTransientProviderError);
}

/**
 * Decide whether a failure is worth retrying.
 * Anything not recognised here is permanent.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof NetworkError || err instanceof TimeoutError) return true;
  if (err instanceof HttpStatusError) return isTransientStatus(err.status);
  if (err instanceof ProviderError) return err.transient;
  return false;
}
