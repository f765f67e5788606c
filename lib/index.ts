export { retryWithBackoff, backoffSchedule } from './net/retry';
export type { RetryOptions } from './net/retry';
export { isTransientError, isTransientProviderError, isTransientProviderErrors, isTransientStatus } from './classify';
export { discoverPublicIp, resolveQuorum, majorityOf, DEFAULT_IP_FETCHERS } from './publicIp';
export type { IpFetcher } from './publicIp';
export { createCloudflareClient } from './cloudflare';
export type { CloudflareClient, CloudflareOptions } from './cloudflare';
export { backupDnsRecord, sanitizeRecordName, formatBackupTimestamp } from './backup';
export { checkAndUpdate } from './reconciler';
export { runCycle, describeCycle } from './cycle';
export { runForever } from './scheduler';
export { loadSyncConfig, splitDomainNames } from './config';
export type { SyncConfig } from './config';
export { writeStatusFile } from './status';
export { parseIPv4, isIPv4 } from './ipv4';
export * from './errors';
export type {
  DnsRecord,
  ProviderApiError,
  ProviderEnvelope,
  CycleSummary,
  DomainOutcome,
  SourceOutcome,
} from './types';
