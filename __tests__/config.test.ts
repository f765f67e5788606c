import { envInt, loadSyncConfig, splitDomainNames } from '../lib/config';
import { ConfigError } from '../lib/errors';

const VALID = {
  CLOUDFLARE_API_TOKEN: 'test-token',
  CLOUDFLARE_ZONE_ID: 'test-zone',
  DOMAIN_NAME: 'example.com;another.com',
  UPDATE_INTERVAL: '15',
};

describe('loadSyncConfig', () => {
  test('reads every setting', () => {
    expect(loadSyncConfig(VALID)).toEqual({
      apiToken: 'test-token',
      zoneId: 'test-zone',
      domainNames: ['example.com', 'another.com'],
      updateIntervalMinutes: 15,
    });
  });

  test('missing variables are a ConfigError naming them', () => {
    expect(() => loadSyncConfig({})).toThrow(ConfigError);
    expect(() => loadSyncConfig({ ...VALID, CLOUDFLARE_ZONE_ID: undefined })).toThrow(
      'CLOUDFLARE_ZONE_ID must be set',
    );
    expect(() => loadSyncConfig({ ...VALID, CLOUDFLARE_API_TOKEN: '  ' })).toThrow(
      'CLOUDFLARE_API_TOKEN must be set',
    );
  });

  test('needs at least one domain', () => {
    expect(() => loadSyncConfig({ ...VALID, DOMAIN_NAME: ' , ; ' })).toThrow(
      'DOMAIN_NAME must list at least one domain',
    );
  });

  test('interval must be whole minutes, at least one', () => {
    expect(() => loadSyncConfig({ ...VALID, UPDATE_INTERVAL: '0' })).toThrow('UPDATE_INTERVAL must be at least 1 minute');
    expect(() => loadSyncConfig({ ...VALID, UPDATE_INTERVAL: 'ten' })).toThrow(
      'UPDATE_INTERVAL must be a whole number of minutes',
    );
    expect(() => loadSyncConfig({ ...VALID, UPDATE_INTERVAL: '1.5' })).toThrow(ConfigError);
    expect(loadSyncConfig({ ...VALID, UPDATE_INTERVAL: '1' }).updateIntervalMinutes).toBe(1);
  });
});

describe('splitDomainNames', () => {
  test('splits on commas and semicolons, trims, drops empties', () => {
    expect(splitDomainNames(' a.example.com , ;b.example.com;; c.example.com ')).toEqual([
      'a.example.com',
      'b.example.com',
      'c.example.com',
    ]);
    expect(splitDomainNames('')).toEqual([]);
  });
});

describe('envInt', () => {
  const NAME = 'DNS_IP_SYNC_TEST_INT';

  afterEach(() => {
    delete process.env[NAME];
  });

  test('falls back when unset', () => {
    expect(envInt(NAME, 3)).toBe(3);
  });

  test('reads an integer', () => {
    process.env[NAME] = '7';
    expect(envInt(NAME, 3)).toBe(7);
  });

  test('0 falls back by default but is kept when the minimum allows it', () => {
    process.env[NAME] = '0';
    expect(envInt(NAME, 3)).toBe(3);
    expect(envInt(NAME, 3, 0)).toBe(0);
  });

  test('rejects fractions, negatives and garbage', () => {
    for (const raw of ['2.5', '-1', 'many']) {
      process.env[NAME] = raw;
      expect(envInt(NAME, 3, 0)).toBe(3);
    }
  });
});

describe('CONFIG', () => {
  afterEach(() => {
    delete process.env.RETRY_MAX_RETRIES;
  });

  test('RETRY_MAX_RETRIES=0 disables retries', () => {
    process.env.RETRY_MAX_RETRIES = '0';
    jest.isolateModules(() => {
      const { CONFIG } = require('../lib/config') as typeof import('../lib/config');
      expect(CONFIG.RETRY.MAX_RETRIES).toBe(0);
    });
  });
});
