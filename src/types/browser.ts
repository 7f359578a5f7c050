/**
 * Browser, platform and build descriptors shared by the resolver,
 * the index clients, the cache and the downloader.
 */

export enum Browser {
  CHROMIUM = 'chromium',
  FIREFOX = 'firefox',
}

export const OPERATING_SYSTEMS = ['windows', 'linux', 'mac'] as const;
export const ARCHITECTURES = ['x86', 'x64', 'arm64'] as const;
export const RELEASE_CHANNELS = ['stable', 'beta', 'dev', 'canary'] as const;

export type OperatingSystem = (typeof OPERATING_SYSTEMS)[number];
export type Architecture = (typeof ARCHITECTURES)[number];
export type ReleaseChannel = (typeof RELEASE_CHANNELS)[number];

export interface Platform {
  readonly os: OperatingSystem;
  readonly arch: Architecture;
}

export interface VersionQuery {
  readonly browser: Browser;
  readonly versionSpec: string;
  readonly platform: Platform;
  readonly channel: ReleaseChannel;
  readonly proxy?: string;
}

/**
 * One entry of a version index: an exact version and where its artifact lives
 */
export interface VersionCandidate {
  readonly fullVersion: string;
  readonly downloadUrl: string;
  /** ISO timestamp, used to break ties between numerically equal versions */
  readonly publishedAt?: string;
  readonly sizeHint?: number;
  /** Index-specific build id, such as a Chromium snapshot revision */
  readonly buildId?: string;
}

export interface ResolvedBuild {
  readonly browser: Browser;
  readonly fullVersion: string;
  readonly platform: Platform;
  readonly downloadUrl: string;
  readonly sizeHint?: number;
}

export interface DownloadResult {
  localPath: string;
  bytesWritten: number;
  verified: boolean;
  /** true when the artifact was already on disk and nothing was transferred */
  skipped: boolean;
}

export interface DownloadProgress {
  build: ResolvedBuild;
  percentage: number;
  downloadedBytes: number;
  totalBytes: number;
}

export function formatPlatform(platform: Platform): string {
  return `${platform.os}-${platform.arch}`;
}

export function createVersionQuery(
  browser: Browser,
  versionSpec: string,
  platform: Platform,
  options: { channel?: ReleaseChannel; proxy?: string } = {},
): VersionQuery {
  const query: VersionQuery = {
    browser,
    versionSpec,
    platform: Object.freeze({ os: platform.os, arch: platform.arch }),
    channel: options.channel ?? 'stable',
    ...(options.proxy ? { proxy: options.proxy } : {}),
  };
  return Object.freeze(query);
}

export function createResolvedBuild(
  browser: Browser,
  platform: Platform,
  candidate: VersionCandidate,
): ResolvedBuild {
  const build: ResolvedBuild = {
    browser,
    fullVersion: candidate.fullVersion,
    platform: Object.freeze({ os: platform.os, arch: platform.arch }),
    downloadUrl: candidate.downloadUrl,
    ...(candidate.sizeHint !== undefined ? { sizeHint: candidate.sizeHint } : {}),
  };
  return Object.freeze(build);
}

/**
 * Map the host's process.platform / process.arch to a Platform.
 * Returns undefined for hosts no browser family publishes builds for.
 */
export function detectPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
  nodeArch: string = process.arch,
): Platform | undefined {
  let os: OperatingSystem;
  switch (nodePlatform) {
    case 'win32':
      os = 'windows';
      break;
    case 'darwin':
      os = 'mac';
      break;
    case 'linux':
      os = 'linux';
      break;
    default:
      return undefined;
  }

  let arch: Architecture;
  switch (nodeArch) {
    case 'x64':
      arch = 'x64';
      break;
    case 'ia32':
      arch = 'x86';
      break;
    case 'arm64':
      arch = 'arm64';
      break;
    default:
      return undefined;
  }

  return { os, arch };
}
