import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { CONFIG } from './config';
import { BackupError } from './errors';
import logger from './logger';
import type { DnsRecord } from './types';

export const MAX_SANITIZED_LENGTH = 128;
export const EMPTY_NAME_PLACEHOLDER = 'unnamed';

/**
 * Make a record name safe to embed in a file name.
 * Only [A-Za-z0-9._-] survive; everything else, path separators included,
 * becomes `_`. Idempotent.
 */
export function sanitizeRecordName(name: string): string {
  const clean = name.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, MAX_SANITIZED_LENGTH);
  return clean || EMPTY_NAME_PLACEHOLDER;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function formatBackupTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

export function backupFileName(record: Pick<DnsRecord, 'name'>, now: Date): string {
  return `${formatBackupTimestamp(now)}_${sanitizeRecordName(record.name)}_backup.json`;
}

export interface BackupOptions {
  dir?: string;
  now?: Date;
}

/**
 * Write a pretty-printed snapshot of `record` before it is overwritten.
 * A second backup of the same name within the same second replaces the first.
 * @returns path of the written file
 */
export async function backupDnsRecord(record: DnsRecord, opts?: BackupOptions): Promise<string> {
  const dir = opts?.dir ?? CONFIG.BACKUP_DIR;
  const file = path.join(dir, backupFileName(record, opts?.now ?? new Date()));

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new BackupError(`Cannot create backup directory ${dir}`, { cause: err });
  }

  try {
    await writeFile(file, JSON.stringify(record, null, 2), 'utf8');
  } catch (err) {
    throw new BackupError(`Cannot write backup ${file}`, { cause: err });
  }

  logger.info({ record: record.name, file }, 'DNS record backup created');
  return file;
}

export default backupDnsRecord;
