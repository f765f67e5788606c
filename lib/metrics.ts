/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `dns_ip_sync_cycles_total{outcome}` (Counter): ok, partial or discovery_failed
 * - `dns_ip_sync_record_updates_total` (Counter)
 * - `dns_ip_sync_domain_failures_total` (Counter)
 * - `dns_ip_sync_retries_total{operation}` (Counter)
 * - `dns_ip_sync_ip_source_failures_total{source}` (Counter)
 * - `dns_ip_sync_last_success_timestamp_seconds` (Gauge)
 *
 * `register.metrics()` is served by `metricsServer.ts` when METRICS_PORT is set.
 */

import { Counter, Gauge, register } from 'prom-client';

export type CycleOutcome = 'ok' | 'partial' | 'discovery_failed';

export const cyclesTotal = new Counter({
  name: 'dns_ip_sync_cycles_total',
  help: 'Sync cycles run, by outcome',
  labelNames: ['outcome'] as const,
});

export const recordUpdatesTotal = new Counter({
  name: 'dns_ip_sync_record_updates_total',
  help: 'DNS records rewritten with a new address',
});

export const domainFailuresTotal = new Counter({
  name: 'dns_ip_sync_domain_failures_total',
  help: 'Domains whose reconciliation failed',
});

export const retriesTotal = new Counter({
  name: 'dns_ip_sync_retries_total',
  help: 'Retries of transient failures, by operation',
  labelNames: ['operation'] as const,
});

export const ipSourceFailuresTotal = new Counter({
  name: 'dns_ip_sync_ip_source_failures_total',
  help: 'IP-echo sources that failed to answer, by source',
  labelNames: ['source'] as const,
});

export const lastSuccessTimestamp = new Gauge({
  name: 'dns_ip_sync_last_success_timestamp_seconds',
  help: 'Unix time of the last cycle that completed without failures',
});

export function incCycle(outcome: CycleOutcome): void {
  cyclesTotal.inc({ outcome });
  if (outcome === 'ok') lastSuccessTimestamp.set(Date.now() / 1000);
}

export function incRecordUpdates(count = 1): void {
  recordUpdatesTotal.inc(count);
}

export function incDomainFailures(count = 1): void {
  domainFailuresTotal.inc(count);
}

export function incRetries(operation: string): void {
  retriesTotal.inc({ operation });
}

export function incIpSourceFailures(source: string): void {
  ipSourceFailuresTotal.inc({ source });
}

export { register };
