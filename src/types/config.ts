export interface IndexEndpoints {
  chromiumReleasesUrl: string;
  chromiumSnapshotsApiUrl: string;
  chromiumSnapshotsDownloadUrl: string;
  firefoxProductDetailsUrl: string;
  firefoxReleasesUrl: string;
}

export interface FetcherConfig {
  cacheDir: string;
  downloadDir: string;
  proxyUrl?: string;
  indexTimeoutMs: number;
  downloadTimeoutMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  latestTtlMs: number;
  prefixTtlMs: number;
  pinLatest: boolean;
  firefoxLocale: string;
  archFallback: boolean;
  endpoints: IndexEndpoints;
}
