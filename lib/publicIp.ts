import { QuorumError, toError } from './errors';
import logger from './logger';
import { incIpSourceFailures } from './metrics';
import type { FetchIpSourceOptions } from './sources/fetchIpSource';
import { fetchIpify, IPIFY } from './sources/ipify';
import { fetchAmazonAws, AMAZONAWS } from './sources/amazonaws';
import { fetchIcanhazip, ICANHAZIP } from './sources/icanhazip';
import type { SourceOutcome } from './types';

/** Smallest count that is a strict majority of `sources`. */
export function majorityOf(sources: number): number {
  return Math.floor(sources / 2) + 1;
}

export interface IpFetcher {
  name: string;
  fetch: (opts?: FetchIpSourceOptions) => Promise<string>;
}

export const DEFAULT_IP_FETCHERS: readonly IpFetcher[] = [
  { name: IPIFY.name, fetch: fetchIpify },
  { name: AMAZONAWS.name, fetch: fetchAmazonAws },
  { name: ICANHAZIP.name, fetch: fetchIcanhazip },
];

/**
 * Reduce per-source outcomes to one address.
 * The most frequent address wins only if a strict majority of the sources
 * reported it. A shared top count fails, so a 1-1-1 split fails just like
 * total failure.
 */
export function resolveQuorum(
  outcomes: readonly SourceOutcome[],
  quorum = majorityOf(outcomes.length),
): string {
  const tally = new Map<string, number>();
  let failures = 0;
  for (const o of outcomes) {
    if (o.ok) tally.set(o.ip, (tally.get(o.ip) ?? 0) + 1);
    else failures++;
  }

  let best: string | null = null;
  let bestCount = 0;
  let tied = false;
  for (const [ip, count] of tally) {
    if (count > bestCount) {
      best = ip;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }

  if (best === null || tied || bestCount < quorum) throw new QuorumError(tally, failures, quorum);
  return best;
}

/**
 * Ask every source concurrently, wait for all of them, then vote.
 * Each task only contributes its own settled result.
 */
export async function discoverPublicIp(
  fetchers: readonly IpFetcher[] = DEFAULT_IP_FETCHERS,
  opts?: FetchIpSourceOptions,
): Promise<string> {
  const settled = await Promise.allSettled(fetchers.map((f) => f.fetch(opts)));

  const outcomes = settled.map((r, i): SourceOutcome => {
    const source = fetchers[i].name;
    if (r.status === 'fulfilled') return { source, ok: true, ip: r.value };
    return { source, ok: false, error: toError(r.reason) };
  });

  for (const o of outcomes) {
    if (o.ok) {
      logger.debug({ source: o.source, ip: o.ip }, 'ip source answered');
    } else {
      incIpSourceFailures(o.source);
      logger.warn({ source: o.source, err: o.error }, 'ip source failed');
    }
  }

  const ip = resolveQuorum(outcomes, majorityOf(fetchers.length));
  logger.info({ ip, sources: outcomes.length }, 'public IP resolved by quorum');
  return ip;
}

export default discoverPublicIp;
