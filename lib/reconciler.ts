import { backupDnsRecord, BackupOptions } from './backup';
import type { CloudflareClient } from './cloudflare';
import logger from './logger';
import type { DnsRecord } from './types';

export interface ReconcilerDeps {
  client: CloudflareClient;
  backup?: (record: DnsRecord) => Promise<string>;
  backupOptions?: BackupOptions;
}

/**
 * Point the A record for `domain` at `ip`.
 *
 * The record is backed up before it is rewritten. Backup failure aborts
 * before any mutation. A missing record is not an error.
 *
 * @returns true when the record was rewritten
 */
export async function checkAndUpdate(domain: string, ip: string, deps: ReconcilerDeps): Promise<boolean> {
  logger.info({ domain }, 'checking DNS record');

  const records = await deps.client.listARecords(domain);
  const record = records[0];
  if (!record) {
    logger.warn({ domain }, 'no matching A record found');
    return false;
  }
  if (records.length > 1) {
    logger.debug({ domain, count: records.length }, 'several A records match, using the first');
  }

  logger.info({ domain, current: record.content }, 'current DNS record address');
  if (record.content === ip) {
    logger.info({ domain, ip }, 'address unchanged, no update needed');
    return false;
  }

  logger.info({ domain, from: record.content, to: ip }, 'address changed, updating record');
  const backup = deps.backup ?? ((r: DnsRecord) => backupDnsRecord(r, deps.backupOptions));
  await backup(record);

  await deps.client.updateARecord(record, ip);
  logger.info({ domain, ip }, 'DNS record updated');
  return true;
}

export default checkAndUpdate;
