import { fetchWithTimeout } from '../net/http';
import { retryWithBackoff, RetryOptions } from '../net/retry';
import { HttpStatusError, IpSourceError } from '../errors';
import { parseIPv4 } from '../ipv4';
import { CONFIG } from '../config';

export interface FetchIpSourceOptions {
  timeoutMs?: number;
  retry?: RetryOptions;
}

/**
 * Common wrapper for IP-echo sources.
 * One GET per attempt under its own deadline; transient failures are retried,
 * a body that is not a bare IPv4 address is not.
 */
export async function fetchIpSource(
  url: string,
  sourceName: string,
  opts?: FetchIpSourceOptions,
): Promise<string> {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;

  return retryWithBackoff(async () => {
    const res = await fetchWithTimeout(url, { headers: { Accept: 'text/plain' } }, { timeoutMs });
    if (!res.ok) throw new HttpStatusError(url, res.status, res.body);

    const text = res.body.trim();
    if (!text) throw new IpSourceError(`${sourceName} returned an empty body`);
    const ip = parseIPv4(text);
    if (!ip) {
      throw new IpSourceError(`Failed to parse IPv4 address from ${sourceName}: ${text.slice(0, 64)}`);
    }
    return ip;
  }, { label: `ip-source:${sourceName}`, ...opts?.retry });
}

export default fetchIpSource;
