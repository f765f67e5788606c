import type { CloudflareClient } from './cloudflare';
import { toError } from './errors';
import logger from './logger';
import { incCycle, incDomainFailures, incRecordUpdates } from './metrics';
import { discoverPublicIp } from './publicIp';
import { checkAndUpdate, ReconcilerDeps } from './reconciler';
import type { CycleSummary, DomainOutcome } from './types';

export interface CycleDeps {
  client: CloudflareClient;
  discover?: () => Promise<string>;
  reconcile?: (domain: string, ip: string, deps: ReconcilerDeps) => Promise<boolean>;
  backup?: ReconcilerDeps['backup'];
  backupOptions?: ReconcilerDeps['backupOptions'];
  now?: () => number;
}

/**
 * One pass: discover the public IP, then reconcile every domain in order.
 * Discovery failure skips all domains; a failed domain never stops the rest.
 */
export async function runCycle(domainNames: readonly string[], deps: CycleDeps): Promise<CycleSummary> {
  const now = deps.now ?? Date.now;
  const started = now();
  const discover = deps.discover ?? (() => discoverPublicIp());
  const reconcile = deps.reconcile ?? checkAndUpdate;

  let ip: string;
  try {
    ip = await discover();
  } catch (e) {
    const err = toError(e);
    logger.error({ err }, 'public IP discovery failed, skipping this cycle');
    incCycle('discovery_failed');
    return {
      ok: false,
      ip: null,
      startedAt: new Date(started).toISOString(),
      durationMs: now() - started,
      domains: [],
      error: err.message,
    };
  }

  const domains: DomainOutcome[] = [];
  for (const domain of domainNames) {
    try {
      const updated = await reconcile(domain, ip, {
        client: deps.client,
        backup: deps.backup,
        backupOptions: deps.backupOptions,
      });
      if (updated) {
        incRecordUpdates();
        domains.push({ domain, status: 'updated' });
      } else {
        domains.push({ domain, status: 'unchanged' });
      }
    } catch (e) {
      const err = toError(e);
      incDomainFailures();
      logger.error({ err, domain }, 'failed to check or update DNS record');
      domains.push({ domain, status: 'failed', error: err.message });
    }
  }

  const ok = domains.every((d) => d.status !== 'failed');
  incCycle(ok ? 'ok' : 'partial');
  return {
    ok,
    ip,
    startedAt: new Date(started).toISOString(),
    durationMs: now() - started,
    domains,
  };
}

/** One-line description for the status file and logs. */
export function describeCycle(summary: CycleSummary): string {
  if (!summary.ip) return `Error: ${summary.error ?? 'public IP discovery failed'}`;
  const count = (s: DomainOutcome['status']) => summary.domains.filter((d) => d.status === s).length;
  const parts = [`IP ${summary.ip}`, `${count('updated')} updated`, `${count('unchanged')} unchanged`];
  const failed = summary.domains.filter((d): d is Extract<DomainOutcome, { status: 'failed' }> => d.status === 'failed');
  if (failed.length) parts.push(`${failed.length} failed (${failed.map((d) => `${d.domain}: ${d.error}`).join('; ')})`);
  return parts.join(', ');
}

export default runCycle;
