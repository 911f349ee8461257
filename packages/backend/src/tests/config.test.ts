import { parseStaticTokens, trackingConfig } from '../config/tracking';
import { ConfigurationError } from '../types/tracking';

describe('parseStaticTokens', () => {
  test('parses token:userId:role entries', () => {
    expect(parseStaticTokens('test-admin-token:admin-1:admin, test-guide-token:guide-1:guide')).toEqual([
      { token: 'test-admin-token', userId: 'admin-1', role: 'admin' },
      { token: 'test-guide-token', userId: 'guide-1', role: 'guide' },
    ]);
  });

  test('empty or missing values yield no tokens', () => {
    expect(parseStaticTokens(undefined)).toEqual([]);
    expect(parseStaticTokens('')).toEqual([]);
  });

  test('rejects malformed entries and unknown roles', () => {
    expect(() => parseStaticTokens('test-token:user-1')).toThrow(ConfigurationError);
    expect(() => parseStaticTokens('test-token:user-1:superuser')).toThrow('Invalid AUTH_TOKENS entry: test-token:user-1:superuser');
  });
});

describe('TrackingConfig', () => {
  test('test environment uses in-memory storage, short send timeouts and no webhooks', () => {
    const config = trackingConfig.getConfig();

    expect(config.storage.driver).toBe('memory');
    expect(config.realtime.sendTimeout).toBe(200);
    expect(config.webhooks.enabled).toBe(false);
    expect(config.realtime.path).toBe('/ws/location');
  });

  test('validates the loaded configuration', () => {
    expect(trackingConfig.validateConfig()).toBe(true);
  });
});
