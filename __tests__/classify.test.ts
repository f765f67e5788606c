import {
  isTransientError,
  isTransientProviderError,
  isTransientProviderErrors,
  isTransientStatus,
} from '../lib/classify';
import {
  ConfigError,
  HttpStatusError,
  IpSourceError,
  NetworkError,
  ProviderError,
  ResponseParseError,
  TimeoutError,
} from '../lib/errors';

describe('isTransientError', () => {
  test('429 and 5xx responses are transient', () => {
    expect(isTransientError(new HttpStatusError('https://x.test', 429))).toBe(true);
    expect(isTransientError(new HttpStatusError('https://x.test', 503))).toBe(true);
    expect(isTransientError(new HttpStatusError('https://x.test', 500))).toBe(true);
  });

  test('other 4xx responses are permanent', () => {
    expect(isTransientError(new HttpStatusError('https://x.test', 404))).toBe(false);
    expect(isTransientError(new HttpStatusError('https://x.test', 400))).toBe(false);
    expect(isTransientError(new HttpStatusError('https://x.test', 403))).toBe(false);
  });

  test('network errors and timeouts are transient', () => {
    expect(isTransientError(new NetworkError('connection reset'))).toBe(true);
    expect(isTransientError(new TimeoutError('GET https://x.test', 10))).toBe(true);
  });

  test('provider errors follow their transient flag', () => {
    expect(isTransientError(new ProviderError('Cloudflare API error', [], 200, true))).toBe(true);
    expect(isTransientError(new ProviderError('Cloudflare API error', [], 400, false))).toBe(false);
  });

  test('everything else is permanent', () => {
    expect(isTransientError(new ConfigError('DOMAIN_NAME must be set'))).toBe(false);
    expect(isTransientError(new ResponseParseError('not JSON'))).toBe(false);
    expect(isTransientError(new IpSourceError('garbage'))).toBe(false);
    expect(isTransientError(new Error('boom'))).toBe(false);
    expect(isTransientError('boom')).toBe(false);
  });
});

describe('isTransientStatus', () => {
  test('only 429 and 500-599', () => {
    expect([200, 400, 404, 429, 499, 500, 599, 600].map(isTransientStatus)).toEqual([
      false, false, false, true, false, true, true, false,
    ]);
  });
});

describe('isTransientProviderError', () => {
  test('code 1015 is transient regardless of message', () => {
    expect(isTransientProviderError({ code: 1015, message: 'Forbidden' })).toBe(true);
    expect(isTransientProviderError({ code: 1015 })).toBe(true);
  });

  test('matches rate-limit and retry wording case-insensitively', () => {
    expect(isTransientProviderError({ message: 'Rate Limit exceeded' })).toBe(true);
    expect(isTransientProviderError({ message: 'ratelimited' })).toBe(true);
    expect(isTransientProviderError({ message: 'Too Many Requests' })).toBe(true);
    expect(isTransientProviderError({ message: 'Service temporarily unavailable' })).toBe(true);
    expect(isTransientProviderError({ code: 10000, message: 'Upstream Timeout' })).toBe(true);
    expect(isTransientProviderError({ message: 'Please try again later' })).toBe(true);
  });

  test('other provider errors are permanent', () => {
    expect(isTransientProviderError({ code: 9109, message: 'Invalid access token' })).toBe(false);
    expect(isTransientProviderError({ code: 81057, message: 'Record already exists.' })).toBe(false);
    expect(isTransientProviderError({})).toBe(false);
  });

  test('a list is transient when any entry is', () => {
    expect(isTransientProviderErrors([{ code: 9109, message: 'Invalid access token' }, { code: 1015 }])).toBe(true);
    expect(isTransientProviderErrors([{ code: 9109, message: 'Invalid access token' }])).toBe(false);
    expect(isTransientProviderErrors([])).toBe(false);
  });
});
