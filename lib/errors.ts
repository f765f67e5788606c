import type { ProviderApiError } from './types';

export type SyncErrorKind =
  | 'config'
  | 'io'
  | 'network'
  | 'timeout'
  | 'http'
  | 'parse'
  | 'provider'
  | 'ip-source'
  | 'quorum';

/**
 * Base class for every failure the sync loop knows how to classify.
 * `kind` is the discriminant the classifier and the logs key on.
 */
export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings. Fatal at startup. */
export class ConfigError extends SyncError {
  readonly kind = 'config';
}

/** Backup directory or file could not be written. */
export class BackupError extends SyncError {
  readonly kind = 'io';
}

/** Transport-level failure: DNS, connection reset, TLS, ... */
export class NetworkError extends SyncError {
  readonly kind = 'network';
}

export class TimeoutError extends SyncError {
  readonly kind = 'timeout';

  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

/** Non-2xx response that carried no usable provider envelope. */
export class HttpStatusError extends SyncError {
  readonly kind = 'http';

  constructor(readonly url: string, readonly status: number, readonly body = '') {
    super(`HTTP ${status} from ${url}${body ? `: ${truncate(body, 200)}` : ''}`);
  }
}

export class ResponseParseError extends SyncError {
  readonly kind = 'parse';
}

/** Provider answered with `success: false`. */
export class ProviderError extends SyncError {
  readonly kind = 'provider';

  constructor(
    message: string,
    readonly errors: ProviderApiError[],
    readonly status: number,
    readonly transient: boolean,
  ) {
    super(`${message}: ${formatProviderErrors(errors)}`);
  }
}

/** An IP-echo service returned something that is not an IPv4 address. */
export class IpSourceError extends SyncError {
  readonly kind = 'ip-source';
}

export class QuorumError extends SyncError {
  readonly kind = 'quorum';

  constructor(
    readonly tally: ReadonlyMap<string, number>,
    readonly failures: number,
    readonly needed: number,
  ) {
    super(
      `Failed to determine public IP by quorum (need ${needed} sources to agree; ` +
        `got ${describeTally(tally)}, ${failures} failed)`,
    );
  }
}

export function formatProviderErrors(errors: ProviderApiError[]): string {
  if (!errors.length) return 'unknown error';
  return errors
    .map((e) => {
      if (e.code !== undefined && e.message) return `${e.code}: ${e.message}`;
      return e.message ?? String(e.code ?? 'unknown error');
    })
    .join(', ');
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describeTally(tally: ReadonlyMap<string, number>): string {
  if (!tally.size) return 'no answers';
  return Array.from(tally, ([ip, n]) => `${ip}×${n}`).join(', ');
}

function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}…` : s;
}
