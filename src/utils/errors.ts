import { Browser, Platform, formatPlatform } from '../types';

export type BrowserFetchErrorKind =
  | 'InvalidProxyUrl'
  | 'UnsupportedPlatform'
  | 'IndexUnavailable'
  | 'UnknownVersion'
  | 'DownloadFailed'
  | 'CacheCorrupt';

export interface ErrorContext {
  browser?: Browser;
  versionSpec?: string;
  platform?: Platform;
  url?: string;
}

/**
 * Base class for every failure the fetcher reports to its caller.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export abstract class BrowserFetchError extends Error {
  abstract readonly kind: BrowserFetchErrorKind;
  abstract readonly retryable: boolean;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.context = context;
  }
}

export class InvalidProxyUrlError extends BrowserFetchError {
  readonly kind = 'InvalidProxyUrl';
  readonly retryable = false;

  constructor(
    public readonly proxyUrl: string,
    reason: string,
  ) {
    super(`Invalid proxy URL "${redactCredentials(proxyUrl)}": ${reason}`);
    this.name = 'InvalidProxyUrlError';
  }
}

export class UnsupportedPlatformError extends BrowserFetchError {
  readonly kind = 'UnsupportedPlatform';
  readonly retryable = false;

  constructor(browser: Browser, platform: Platform, detail?: string) {
    super(
      `${browser} has no builds for ${formatPlatform(platform)}${detail ? ` (${detail})` : ''}`,
      { browser, platform },
    );
    this.name = 'UnsupportedPlatformError';
  }
}

export class IndexUnavailableError extends BrowserFetchError {
  readonly kind = 'IndexUnavailable';
  readonly retryable = true;

  constructor(browser: Browser, url: string, cause: unknown, platform?: Platform) {
    super(
      `Version index for ${browser} is unavailable (${url}): ${causeMessage(cause)}`,
      { browser, url, platform },
      cause,
    );
    this.name = 'IndexUnavailableError';
  }
}

export class UnknownVersionError extends BrowserFetchError {
  readonly kind = 'UnknownVersion';
  readonly retryable = false;

  constructor(browser: Browser, versionSpec: string, platform: Platform) {
    super(
      `No ${browser} build matches "${versionSpec}" on ${formatPlatform(platform)}`,
      { browser, versionSpec, platform },
    );
    this.name = 'UnknownVersionError';
  }
}

export class DownloadFailedError extends BrowserFetchError {
  readonly kind = 'DownloadFailed';
  readonly retryable = true;

  constructor(context: ErrorContext, cause: unknown) {
    super(`Download failed for ${context.url ?? 'artifact'}: ${causeMessage(cause)}`, context, cause);
    this.name = 'DownloadFailedError';
  }
}

/**
 * Raised while reading the resolution cache. The cache recovers from it
 * as a full miss, so it never reaches a caller.
 */
export class CacheCorruptError extends BrowserFetchError {
  readonly kind = 'CacheCorrupt';
  readonly retryable = false;

  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Cache file ${filePath} is corrupt: ${causeMessage(cause)}`, {}, cause);
    this.name = 'CacheCorruptError';
  }
}

/**
 * HTTP status failure raised by the network layer, kept separate so the
 * retry predicates can tell 4xx from 5xx.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export function isBrowserFetchError(value: unknown): value is BrowserFetchError {
  return value instanceof BrowserFetchError;
}

export function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * errno code of a filesystem or socket error ("ENOENT", "EEXIST", ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a network failure is worth another attempt: timeouts, transport
 * errors, 408/429 and server errors are; other HTTP statuses are not.
 */
export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  if (error instanceof BrowserFetchError) {
    return false;
  }
  return error instanceof Error;
}

/**
 * One-line rendering with browser, spec and platform, for CLI output.
 */
export function describeError(error: unknown): string {
  if (!isBrowserFetchError(error)) {
    return causeMessage(error);
  }
  const parts: string[] = [];
  if (error.context.browser) parts.push(`browser=${error.context.browser}`);
  if (error.context.versionSpec !== undefined) parts.push(`spec=${error.context.versionSpec}`);
  if (error.context.platform) parts.push(`platform=${formatPlatform(error.context.platform)}`);
  const suffix = parts.length > 0 ? ` [${parts.join(' ')}]` : '';
  return `${error.kind}: ${error.message}${suffix}`;
}

export function redactCredentials(url: string): string {
  return url.replace(/\/\/[^@/]*@/, '//***@');
}
