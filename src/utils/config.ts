import os from 'os';
import path from 'path';
import { z } from 'zod';
import { FetcherConfig, IndexEndpoints } from '../types';

export const DEFAULT_ENDPOINTS: IndexEndpoints = {
  chromiumReleasesUrl: 'https://chromiumdash.appspot.com',
  chromiumSnapshotsApiUrl: 'https://www.googleapis.com/storage/v1',
  chromiumSnapshotsDownloadUrl: 'https://storage.googleapis.com/chromium-browser-snapshots',
  firefoxProductDetailsUrl: 'https://product-details.mozilla.org/1.0/firefox.json',
  firefoxReleasesUrl: 'https://ftp.mozilla.org/pub/firefox/releases',
};

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

// Environment schema, validated once per loadConfig call
const EnvSchema = z.object({
  BROWSER_FETCHER_CACHE_DIR: z.string().min(1).optional(),
  BROWSER_FETCHER_DOWNLOAD_DIR: z.string().min(1).optional(),
  BROWSER_FETCHER_PROXY: z.string().min(1).optional(),
  ALL_PROXY: z.string().min(1).optional(),
  BROWSER_FETCHER_INDEX_TIMEOUT: numberFromEnv(30000),
  BROWSER_FETCHER_DOWNLOAD_TIMEOUT: numberFromEnv(600000), // 10 min
  BROWSER_FETCHER_RETRY_ATTEMPTS: numberFromEnv(3),
  BROWSER_FETCHER_RETRY_DELAY: numberFromEnv(1000),
  BROWSER_FETCHER_LATEST_TTL: numberFromEnv(0),
  BROWSER_FETCHER_PREFIX_TTL: numberFromEnv(86400000), // 24h
  BROWSER_FETCHER_PIN_LATEST: booleanFromEnv(false),
  BROWSER_FETCHER_FIREFOX_LOCALE: z.string().regex(/^[a-zA-Z]{2,3}(-[a-zA-Z0-9]+)?$/).default('en-US'),
  BROWSER_FETCHER_ARCH_FALLBACK: booleanFromEnv(true),
});

/**
 * Per-user cache directory: %LOCALAPPDATA% on Windows, the home directory elsewhere
 */
export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOCALAPPDATA) {
    return path.join(env.LOCALAPPDATA, 'browser-fetcher');
  }
  return path.join(env.HOME || os.homedir(), '.browser-fetcher');
}

/**
 * Load configuration from environment variables.
 * This is the only place the environment is read; components receive
 * their settings through constructors.
 */
// ALL_PROXY is shared with other tools and often names an HTTP proxy; only a SOCKS one applies here
function socksOnly(url: string | undefined): string | undefined {
  return url !== undefined && /^socks/i.test(url.trim()) ? url : undefined;
}

export function loadConfig(
  overrides: Partial<FetcherConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): FetcherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid browser-fetcher configuration: ${issues}`);
  }
  const vars = parsed.data;

  const cacheDir = overrides.cacheDir ?? vars.BROWSER_FETCHER_CACHE_DIR ?? defaultCacheDir(env);
  const proxyUrl = overrides.proxyUrl ?? vars.BROWSER_FETCHER_PROXY ?? socksOnly(vars.ALL_PROXY);

  return {
    cacheDir,
    downloadDir:
      overrides.downloadDir ?? vars.BROWSER_FETCHER_DOWNLOAD_DIR ?? path.join(cacheDir, 'downloads'),
    ...(proxyUrl ? { proxyUrl } : {}),
    indexTimeoutMs: overrides.indexTimeoutMs ?? vars.BROWSER_FETCHER_INDEX_TIMEOUT,
    downloadTimeoutMs: overrides.downloadTimeoutMs ?? vars.BROWSER_FETCHER_DOWNLOAD_TIMEOUT,
    retryAttempts: overrides.retryAttempts ?? vars.BROWSER_FETCHER_RETRY_ATTEMPTS,
    retryBaseDelayMs: overrides.retryBaseDelayMs ?? vars.BROWSER_FETCHER_RETRY_DELAY,
    latestTtlMs: overrides.latestTtlMs ?? vars.BROWSER_FETCHER_LATEST_TTL,
    prefixTtlMs: overrides.prefixTtlMs ?? vars.BROWSER_FETCHER_PREFIX_TTL,
    pinLatest: overrides.pinLatest ?? vars.BROWSER_FETCHER_PIN_LATEST,
    firefoxLocale: overrides.firefoxLocale ?? vars.BROWSER_FETCHER_FIREFOX_LOCALE,
    archFallback: overrides.archFallback ?? vars.BROWSER_FETCHER_ARCH_FALLBACK,
    endpoints: { ...DEFAULT_ENDPOINTS, ...overrides.endpoints },
  };
}
