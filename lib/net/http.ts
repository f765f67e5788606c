import pLimit from 'p-limit';
import { CONFIG } from '../config';
import { NetworkError, TimeoutError } from '../errors';
import logger from '../logger';

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string) {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(CONFIG.CONCURRENCY.PER_HOST);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface FetchOptions {
  timeoutMs?: number; // covers the request and reading the body
}

/**
 * One HTTP attempt with a deadline. Never retries; callers wrap it in
 * `retryWithBackoff`. Transport failures become NetworkError, an expired
 * deadline becomes TimeoutError.
 */
export async function fetchWithTimeout(
  url: string,
  init?: RequestInit,
  opts?: FetchOptions,
): Promise<HttpResponse> {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const limit = getLimitForHost(getHostFromUrl(url));
  return limit(() => exec(url, init, timeoutMs));
}

async function exec(url: string, init: RequestInit | undefined, timeoutMs: number): Promise<HttpResponse> {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  const method = init?.method ?? 'GET';
  try {
    const headers = new Headers(init?.headers);
    if (!headers.has('User-Agent')) headers.set('User-Agent', CONFIG.USER_AGENT);
    const res = await fetch(url, { ...init, headers, signal: controller.signal });
    const body = await res.text();
    return { status: res.status, ok: res.ok, body };
  } catch (err) {
    if (controller.signal.aborted) {
      logger.debug({ url, method, timeoutMs }, 'http request aborted by deadline');
      throw new TimeoutError(`${method} ${url}`, timeoutMs);
    }
    logger.debug({ url, method, err }, 'http network error');
    throw new NetworkError(`${method} ${url} failed: ${describe(err)}`, { cause: err });
  } finally {
    clearTimeout(id);
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
