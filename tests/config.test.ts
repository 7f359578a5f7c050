import path from 'path';
import { Browser, createVersionQuery, detectPlatform } from '../src/types';
import { DEFAULT_ENDPOINTS, defaultCacheDir, loadConfig } from '../src/utils/config';

describe('Configuration', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({}, { HOME: '/home/tester' });

    expect(config).toEqual({
      cacheDir: path.join('/home/tester', '.browser-fetcher'),
      downloadDir: path.join('/home/tester', '.browser-fetcher', 'downloads'),
      indexTimeoutMs: 30000,
      downloadTimeoutMs: 600000,
      retryAttempts: 3,
      retryBaseDelayMs: 1000,
      latestTtlMs: 0,
      prefixTtlMs: 86400000,
      pinLatest: false,
      firefoxLocale: 'en-US',
      archFallback: true,
      endpoints: DEFAULT_ENDPOINTS,
    });
  });

  it('should read settings from the environment', () => {
    const config = loadConfig(
      {},
      {
        BROWSER_FETCHER_CACHE_DIR: '/var/cache/fetcher',
        ALL_PROXY: 'socks5://127.0.0.1:1080',
        BROWSER_FETCHER_PROXY: 'socks5h://127.0.0.1:9050',
        BROWSER_FETCHER_RETRY_ATTEMPTS: '5',
        BROWSER_FETCHER_PIN_LATEST: '1',
        BROWSER_FETCHER_ARCH_FALLBACK: 'false',
        BROWSER_FETCHER_FIREFOX_LOCALE: 'pt-BR',
      },
    );

    expect(config.cacheDir).toBe('/var/cache/fetcher');
    expect(config.downloadDir).toBe(path.join('/var/cache/fetcher', 'downloads'));
    expect(config.proxyUrl).toBe('socks5h://127.0.0.1:9050');
    expect(config.retryAttempts).toBe(5);
    expect(config.pinLatest).toBe(true);
    expect(config.archFallback).toBe(false);
    expect(config.firefoxLocale).toBe('pt-BR');
  });

  it('should fall back to ALL_PROXY', () => {
    expect(loadConfig({}, { HOME: '/home/tester', ALL_PROXY: 'socks5://127.0.0.1:1080' }).proxyUrl).toBe(
      'socks5://127.0.0.1:1080',
    );
  });

  it('should ignore an ALL_PROXY that is not a SOCKS proxy', () => {
    expect(loadConfig({}, { HOME: '/home/tester', ALL_PROXY: 'http://proxy.internal:3128' }).proxyUrl).toBeUndefined();
    expect(loadConfig({}, { HOME: '/home/tester', ALL_PROXY: 'SOCKS5H://127.0.0.1:9050' }).proxyUrl).toBe(
      'SOCKS5H://127.0.0.1:9050',
    );
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { cacheDir: '/tmp/override', latestTtlMs: 60000, endpoints: { ...DEFAULT_ENDPOINTS, firefoxReleasesUrl: 'http://127.0.0.1:1/pub' } },
      { BROWSER_FETCHER_CACHE_DIR: '/var/cache/fetcher', BROWSER_FETCHER_LATEST_TTL: '5' },
    );

    expect(config.cacheDir).toBe('/tmp/override');
    expect(config.latestTtlMs).toBe(60000);
    expect(config.endpoints.firefoxReleasesUrl).toBe('http://127.0.0.1:1/pub');
    expect(config.endpoints.chromiumReleasesUrl).toBe(DEFAULT_ENDPOINTS.chromiumReleasesUrl);
  });

  it.each([
    [{ BROWSER_FETCHER_RETRY_ATTEMPTS: 'many' }, 'BROWSER_FETCHER_RETRY_ATTEMPTS'],
    [{ BROWSER_FETCHER_INDEX_TIMEOUT: '-1' }, 'BROWSER_FETCHER_INDEX_TIMEOUT'],
    [{ BROWSER_FETCHER_PIN_LATEST: 'yes' }, 'BROWSER_FETCHER_PIN_LATEST'],
    [{ BROWSER_FETCHER_FIREFOX_LOCALE: '../etc' }, 'BROWSER_FETCHER_FIREFOX_LOCALE'],
  ])('should reject invalid environment %j', (env, variable) => {
    expect(() => loadConfig({}, env)).toThrow(`Invalid browser-fetcher configuration: ${variable}:`);
  });

  it('should place the cache under LOCALAPPDATA when set', () => {
    expect(defaultCacheDir({ LOCALAPPDATA: '/appdata', HOME: '/home/tester' })).toBe(
      path.join('/appdata', 'browser-fetcher'),
    );
  });
});

describe('Platform and query helpers', () => {
  it('should map Node platform names', () => {
    expect(detectPlatform('win32', 'ia32')).toEqual({ os: 'windows', arch: 'x86' });
    expect(detectPlatform('darwin', 'arm64')).toEqual({ os: 'mac', arch: 'arm64' });
    expect(detectPlatform('linux', 'x64')).toEqual({ os: 'linux', arch: 'x64' });
    expect(detectPlatform('freebsd', 'x64')).toBeUndefined();
    expect(detectPlatform('linux', 'ppc64')).toBeUndefined();
  });

  it('should build frozen queries on the stable channel by default', () => {
    const query = createVersionQuery(Browser.FIREFOX, '97', { os: 'linux', arch: 'x64' });
    expect(query).toEqual({
      browser: Browser.FIREFOX,
      versionSpec: '97',
      platform: { os: 'linux', arch: 'x64' },
      channel: 'stable',
    });
    expect(Object.isFrozen(query)).toBe(true);
    expect('proxy' in query).toBe(false);
  });
});
