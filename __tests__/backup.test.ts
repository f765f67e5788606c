import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  backupDnsRecord,
  backupFileName,
  EMPTY_NAME_PLACEHOLDER,
  formatBackupTimestamp,
  sanitizeRecordName,
} from '../lib/backup';
import { BackupError } from '../lib/errors';
import type { DnsRecord } from '../lib/types';

const RECORD: DnsRecord = {
  id: 'r1',
  name: 'home.example.com',
  content: '203.0.113.5',
  type: 'A',
  proxied: false,
  ttl: 120,
};

const NOW = new Date(2024, 0, 2, 3, 4, 5);

describe('sanitizeRecordName', () => {
  test('keeps safe names as they are', () => {
    expect(sanitizeRecordName('home.example.com')).toBe('home.example.com');
    expect(sanitizeRecordName('a-b_c.D9')).toBe('a-b_c.D9');
  });

  test('replaces path separators and other characters', () => {
    expect(sanitizeRecordName('../weird/name')).toBe('.._weird_name');
    expect(sanitizeRecordName('C:\\dir\\x')).toBe('C__dir_x');
    expect(sanitizeRecordName('*.example.com')).toBe('_.example.com');
    expect(sanitizeRecordName('a b\tc')).toBe('a_b_c');
    expect(sanitizeRecordName('ñ.example')).toBe('_.example');
  });

  test('empty input maps to the placeholder', () => {
    expect(sanitizeRecordName('')).toBe(EMPTY_NAME_PLACEHOLDER);
  });

  test('caps the length at 128', () => {
    expect(sanitizeRecordName('a'.repeat(300))).toBe('a'.repeat(128));
  });

  test('is idempotent and total', () => {
    const inputs = ['', '../weird/name', 'home.example.com', '/'.repeat(200), 'ü/ö?*', ' '];
    for (const input of inputs) {
      const once = sanitizeRecordName(input);
      expect(sanitizeRecordName(once)).toBe(once);
      expect(once).toMatch(/^[A-Za-z0-9._-]{1,128}$/);
    }
  });
});

describe('backup file naming', () => {
  test('timestamp is YYYYMMDD_HHMMSS in local time', () => {
    expect(formatBackupTimestamp(NOW)).toBe('20240102_030405');
    expect(formatBackupTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('20231231_235958');
  });

  test('combines timestamp and sanitized name', () => {
    expect(backupFileName({ name: '../weird/name' }, NOW)).toBe('20240102_030405_.._weird_name_backup.json');
  });
});

describe('backupDnsRecord', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), 'dns-ip-sync-backup-'));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  test('creates the directory and writes pretty JSON that round-trips', async () => {
    const dir = path.join(tmp, 'nested', 'backups');

    const file = await backupDnsRecord(RECORD, { dir, now: NOW });

    expect(file).toBe(path.join(dir, '20240102_030405_home.example.com_backup.json'));
    const raw = await readFile(file, 'utf8');
    expect(raw).toBe(JSON.stringify(RECORD, null, 2));
    expect(JSON.parse(raw)).toEqual(RECORD);
  });

  test('an existing directory is fine and same-second backups overwrite', async () => {
    await backupDnsRecord(RECORD, { dir: tmp, now: NOW });
    await backupDnsRecord({ ...RECORD, content: '203.0.113.6' }, { dir: tmp, now: NOW });

    const files = await readdir(tmp);
    expect(files).toEqual(['20240102_030405_home.example.com_backup.json']);
    const saved = JSON.parse(await readFile(path.join(tmp, files[0]), 'utf8'));
    expect(saved.content).toBe('203.0.113.6');
  });

  test('fails with BackupError when the directory cannot be created', async () => {
    const blocker = path.join(tmp, 'not-a-dir');
    await writeFile(blocker, 'x');

    await expect(backupDnsRecord(RECORD, { dir: blocker, now: NOW })).rejects.toBeInstanceOf(BackupError);
  });
});
