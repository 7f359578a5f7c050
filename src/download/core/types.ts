/**
 * Core Types for the resolution and download pipeline
 * Contracts shared by the resolver, the index clients, the downloader and the orchestrator
 */

import {
    Browser,
    DownloadProgress,
    Platform,
    ReleaseChannel,
    ResolvedBuild,
    VersionCandidate,
} from '../../types';
import type { TransportConfig } from '../proxy/ProxyConfigurator';

// ============================================================================
// Index client contract
// ============================================================================

export interface ListCandidatesOptions {
    channel: ReleaseChannel;
    transport: TransportConfig;
    signal?: AbortSignal;
}

/**
 * One implementation per browser family. Fails with UnsupportedPlatformError
 * when the family has no builds for the platform and IndexUnavailableError
 * when the index cannot be reached or parsed.
 */
export interface IVersionIndexClient {
    readonly browser: Browser;
    supportsPlatform(platform: Platform, channel: ReleaseChannel): boolean;
    listCandidates(platform: Platform, options: ListCandidatesOptions): Promise<VersionCandidate[]>;
    /**
     * Final download URL and size of the chosen candidate.
     * Undefined when the build has no archive to download.
     */
    describeArtifact(
        candidate: VersionCandidate,
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate | undefined>;
}

export interface IndexClientOptions {
    timeout?: number;
    maxRetries?: number;
    retryBaseDelay?: number;
}

// ============================================================================
// Resolver & downloader options
// ============================================================================

export interface ResolveOptions {
    signal?: AbortSignal;
    /** Ignore any cached entry and query the index */
    refresh?: boolean;
}

export interface ArtifactFetchOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
    maxRetries?: number;
    baseDelayMs?: number;
    onProgress?: (progress: DownloadProgress) => void;
}

// ============================================================================
// Events
// ============================================================================

export type FetchEventType =
    | 'resolve:cache-hit'
    | 'resolve:completed'
    | 'download:skipped'
    | 'download:completed'
    | 'extract:completed'
    | 'fetch:failed';

export interface FetchEvent {
    type: FetchEventType;
    timestamp: Date;
    browser: Browser;
    versionSpec: string;
    platform: Platform;
    build?: ResolvedBuild;
    localPath?: string;
    error?: Error;
}

export type FetchEventHandler = (event: FetchEvent) => void;
