import 'dotenv/config';
import { FetchOrchestrator, ResolveAndFetchOptions } from './download';
import { Browser, FetcherConfig, Platform } from './types';
import { loadConfig } from './utils/config';

export * from './types';
export * from './download';
export { loadConfig, defaultCacheDir, DEFAULT_ENDPOINTS } from './utils/config';
export {
  BrowserFetchError,
  CacheCorruptError,
  DownloadFailedError,
  IndexUnavailableError,
  InvalidProxyUrlError,
  UnknownVersionError,
  UnsupportedPlatformError,
  describeError,
  isBrowserFetchError,
} from './utils/errors';
export type { BrowserFetchErrorKind, ErrorContext } from './utils/errors';
export { logger } from './utils/logger';

export interface ResolveAndFetchCallOptions extends ResolveAndFetchOptions {
  config?: Partial<FetcherConfig>;
}

/**
 * Resolve `versionSpec` for a browser and platform, download the build and
 * return the local artifact path, or the unpacked directory with `extract`.
 * Settings come from the environment unless given in `options.config`.
 */
export async function resolveAndFetch(
  browser: Browser,
  versionSpec: string,
  platform: Platform,
  proxyUrl?: string,
  options: ResolveAndFetchCallOptions = {},
): Promise<string> {
  const { config, ...fetchOptions } = options;
  const orchestrator = new FetchOrchestrator(loadConfig(config));
  return orchestrator.resolveAndFetch(browser, versionSpec, platform, proxyUrl, fetchOptions);
}
