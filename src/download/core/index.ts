/**
 * Core index - exports all core components
 */

export * from './types';
export { VersionResolver, toCacheKey } from './VersionResolver';
export type { Resolution, VersionResolverOptions, ResolverRequestOptions } from './VersionResolver';
export { Downloader, SizeMismatchError, artifactBaseName, artifactFileName, artifactExtension } from './Downloader';
export type { DownloaderOptions } from './Downloader';
export { ArchiveExtractor } from './ArchiveExtractor';
export type { ExtractResult } from './ArchiveExtractor';
export { FetchOrchestrator } from './FetchOrchestrator';
export type { FetchOrchestratorDeps, FetchOutcome, ResolveAndFetchOptions } from './FetchOrchestrator';
