import { setTimeout as sleepFor } from 'timers/promises';
import { createCloudflareClient } from './cloudflare';
import type { SyncConfig } from './config';
import { CONFIG } from './config';
import { describeCycle, runCycle, CycleDeps } from './cycle';
import logger from './logger';
import { writeStatusFile } from './status';
import type { CycleSummary } from './types';

export interface SchedulerOptions {
  signal?: AbortSignal;
  statusFile?: string;
  cycle?: (domainNames: readonly string[], deps: CycleDeps) => Promise<CycleSummary>;
  deps?: Partial<CycleDeps>;
  /** Resolves after `ms`, or early when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

// Node fires any timer longer than this after 1ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Waits `ms` in timer-sized chunks; returns early when `signal` aborts. */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms;
  try {
    while (remaining > 0 && !signal?.aborted) {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      await sleepFor(chunk, undefined, { signal });
      remaining -= chunk;
    }
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
}

/**
 * Run a cycle, record its status, wait the configured interval, repeat,
 * until `signal` aborts. Cycle failures are logged; they never end the loop.
 * @returns number of cycles run
 */
export async function runForever(config: SyncConfig, opts: SchedulerOptions = {}): Promise<number> {
  const cycle = opts.cycle ?? runCycle;
  const sleep = opts.sleep ?? abortableSleep;
  const statusFile = opts.statusFile ?? CONFIG.STATUS_FILE;
  const intervalMs = config.updateIntervalMinutes * 60_000;
  const deps: CycleDeps = {
    ...opts.deps,
    client: opts.deps?.client ?? createCloudflareClient({ apiToken: config.apiToken, zoneId: config.zoneId }),
  };

  logger.info(
    { domains: config.domainNames, intervalMinutes: config.updateIntervalMinutes },
    'dns-ip-sync started',
  );

  let cycles = 0;
  while (!opts.signal?.aborted) {
    let success = false;
    let message: string;
    try {
      const summary = await cycle(config.domainNames, deps);
      success = summary.ok;
      message = describeCycle(summary);
      logger.info({ ok: summary.ok, durationMs: summary.durationMs }, `cycle finished: ${message}`);
    } catch (err) {
      message = `Error: ${err instanceof Error ? err.message : String(err)}`;
      logger.error({ err }, 'cycle crashed');
    }
    cycles++;
    await writeStatusFile(statusFile, { success, message, at: new Date() });

    if (opts.signal?.aborted) break;
    logger.info({ minutes: config.updateIntervalMinutes }, 'waiting before next check');
    await sleep(intervalMs, opts.signal);
  }

  logger.info({ cycles }, 'dns-ip-sync stopped');
  return cycles;
}

export default runForever;
