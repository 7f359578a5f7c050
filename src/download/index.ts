/**
 * Download System - Main Entry Point
 * Exports all components of the resolution and download pipeline
 */

// Core components
export * from './core';

// Version index clients
export * from './providers';

// Cache
export { ArtifactCache, CACHE_FILE_NAME, serializeCacheKey } from './cache/ArtifactCache';
export type { ArtifactCacheOptions, CacheEntry, CacheKey } from './cache/ArtifactCache';
export { DefaultStalenessPolicy, DEFAULT_PREFIX_TTL_MS } from './cache/StalenessPolicy';
export type { StalenessOptions, StalenessPolicy } from './cache/StalenessPolicy';

// Proxy
export { ProxyConfigurator } from './proxy/ProxyConfigurator';
export type { DirectTransport, DnsResolution, SocksTransport, TransportConfig } from './proxy/ProxyConfigurator';

// Version matching
export {
    compareCandidatesDesc,
    compareParsedVersions,
    compareVersions,
    parseNumericVersion,
    parseVersion,
    parseVersionSpec,
    selectBestMatch,
} from './version/VersionMatcher';
export type {
    MatchKind,
    MatchOptions,
    ParsedVersion,
    ParsedVersionSpec,
    VersionMatch,
} from './version/VersionMatcher';
