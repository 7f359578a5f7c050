/**
 * FetchOrchestrator - Main coordinator for resolving and downloading browser builds
 * Wires proxy, index clients, cache, resolver and downloader; emits lifecycle events
 */

import { EventEmitter } from 'events';
import {
    Browser,
    DownloadProgress,
    DownloadResult,
    FetcherConfig,
    Platform,
    ReleaseChannel,
    ResolvedBuild,
    VersionQuery,
    createVersionQuery,
} from '../../types';
import { DownloadFailedError, HttpStatusError, UnknownVersionError } from '../../utils/errors';
import { logError, logOperation, logger } from '../../utils/logger';
import { withFallback } from '../../utils/retryHelper';
import { ArtifactCache } from '../cache/ArtifactCache';
import { DefaultStalenessPolicy } from '../cache/StalenessPolicy';
import { ChromiumIndexClient, FirefoxIndexClient } from '../providers';
import { ProxyConfigurator, TransportConfig } from '../proxy/ProxyConfigurator';
import { ArchiveExtractor } from './ArchiveExtractor';
import { Downloader } from './Downloader';
import { FetchEvent, FetchEventHandler, IVersionIndexClient } from './types';
import { Resolution, VersionResolver } from './VersionResolver';

export interface FetchOrchestratorDeps {
    clients?: IVersionIndexClient[];
    cache?: ArtifactCache;
    downloader?: Downloader;
    extractor?: ArchiveExtractor;
    now?: () => Date;
}

export interface ResolveAndFetchOptions {
    channel?: ReleaseChannel;
    signal?: AbortSignal;
    /** Ignore cached resolutions */
    refresh?: boolean;
    /** Overrides the configured download directory */
    destinationDir?: string;
    /** Unpack zip artifacts into a directory beside the archive */
    extract?: boolean;
    onProgress?: (progress: DownloadProgress) => void;
}

export interface FetchOutcome {
    query: VersionQuery;
    build: ResolvedBuild;
    download: DownloadResult;
    /** Set when the artifact was unpacked */
    extractedPath?: string;
    fromCache: boolean;
}

export class FetchOrchestrator extends EventEmitter {
    private readonly config: FetcherConfig;
    private readonly cache: ArtifactCache;
    private readonly resolver: VersionResolver;
    private readonly downloader: Downloader;
    private readonly extractor: ArchiveExtractor;
    private eventHandlers: FetchEventHandler[] = [];

    constructor(config: FetcherConfig, deps: FetchOrchestratorDeps = {}) {
        super();
        this.config = config;

        this.cache =
            deps.cache ??
            new ArtifactCache(config.cacheDir, {
                stalenessPolicy: new DefaultStalenessPolicy({
                    latestTtlMs: config.latestTtlMs,
                    prefixTtlMs: config.prefixTtlMs,
                    pinLatest: config.pinLatest,
                }),
            });

        this.resolver = new VersionResolver({
            cache: this.cache,
            clients: deps.clients ?? this.createDefaultClients(),
            now: deps.now,
        });

        this.downloader =
            deps.downloader ??
            new Downloader({
                timeoutMs: config.downloadTimeoutMs,
                maxRetries: config.retryAttempts,
                baseDelayMs: config.retryBaseDelayMs,
            });

        this.extractor = deps.extractor ?? new ArchiveExtractor();
    }

    /**
     * One index client per browser family
     */
    private createDefaultClients(): IVersionIndexClient[] {
        const shared = {
            timeout: this.config.indexTimeoutMs,
            maxRetries: this.config.retryAttempts,
            retryBaseDelay: this.config.retryBaseDelayMs,
        };
        const { endpoints } = this.config;

        return [
            new ChromiumIndexClient({
                ...shared,
                releasesUrl: endpoints.chromiumReleasesUrl,
                snapshotsApiUrl: endpoints.chromiumSnapshotsApiUrl,
                snapshotsDownloadUrl: endpoints.chromiumSnapshotsDownloadUrl,
            }),
            new FirefoxIndexClient({
                ...shared,
                productDetailsUrl: endpoints.firefoxProductDetailsUrl,
                releasesUrl: endpoints.firefoxReleasesUrl,
                locale: this.config.firefoxLocale,
            }),
        ];
    }

    getCache(): ArtifactCache {
        return this.cache;
    }

    /**
     * Add event handler
     */
    onFetchEvent(handler: FetchEventHandler): void {
        this.eventHandlers.push(handler);
    }

    private emitEvent(type: FetchEvent['type'], query: VersionQuery, data: Partial<FetchEvent> = {}): void {
        const event: FetchEvent = {
            ...data,
            type,
            timestamp: new Date(),
            browser: query.browser,
            versionSpec: query.versionSpec,
            platform: query.platform,
        };

        this.emit(type, event);
        this.eventHandlers.forEach((handler) => handler(event));
    }

    /**
     * Resolve a version spec and download the build, returning the local artifact path
     */
    async resolveAndFetch(
        browser: Browser,
        versionSpec: string,
        platform: Platform,
        proxyUrl?: string,
        options: ResolveAndFetchOptions = {},
    ): Promise<string> {
        const query = createVersionQuery(browser, versionSpec, platform, {
            channel: options.channel,
            proxy: proxyUrl ?? this.config.proxyUrl,
        });
        const outcome = await this.fetchBuild(query, options);
        return outcome.extractedPath ?? outcome.download.localPath;
    }

    async fetchBuild(query: VersionQuery, options: ResolveAndFetchOptions = {}): Promise<FetchOutcome> {
        try {
            const transport = ProxyConfigurator.fromOptional(query.proxy);
            const destinationDir = options.destinationDir ?? this.config.downloadDir;
            const artifactOptions = { signal: options.signal, onProgress: options.onProgress };

            let resolution = await this.resolveWithFallback(query, transport, options);
            if (resolution.fromCache) {
                this.emitEvent('resolve:cache-hit', query, { build: resolution.build });
            }
            this.emitEvent('resolve:completed', query, { build: resolution.build });

            let download: DownloadResult;
            try {
                download = await this.downloader.fetch(resolution.build, destinationDir, transport, artifactOptions);
            } catch (error) {
                if (!this.isMissing64BitBuild(resolution.build, error)) {
                    throw error;
                }
                logger.info('No x64 download for this version, trying x86', {
                    browser: query.browser,
                    fullVersion: resolution.build.fullVersion,
                });
                resolution = await this.resolve32Bit(query, resolution, transport, options);
                this.emitEvent('resolve:completed', query, { build: resolution.build });
                download = await this.downloader.fetch(resolution.build, destinationDir, transport, artifactOptions);
            }

            this.emitEvent(download.skipped ? 'download:skipped' : 'download:completed', query, {
                build: resolution.build,
                localPath: download.localPath,
            });
            const extracted = options.extract
                ? await this.extractor.unpack(resolution.build, download.localPath)
                : undefined;
            if (extracted) {
                this.emitEvent('extract:completed', query, {
                    build: resolution.build,
                    localPath: extracted.directory,
                });
            }

            logOperation('Browser build ready', {
                browser: query.browser,
                versionSpec: query.versionSpec,
                fullVersion: resolution.build.fullVersion,
                path: extracted?.directory ?? download.localPath,
            });

            return {
                query,
                build: resolution.build,
                download,
                ...(extracted ? { extractedPath: extracted.directory } : {}),
                fromCache: resolution.fromCache,
            };
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.emitEvent('fetch:failed', query, { error: err });
            logError(err, { browser: query.browser, versionSpec: query.versionSpec });
            throw error;
        }
    }

    /**
     * Resolve only, without downloading
     */
    async resolve(query: VersionQuery, options: ResolveAndFetchOptions = {}): Promise<Resolution> {
        return this.resolveWithFallback(query, ProxyConfigurator.fromOptional(query.proxy), options);
    }

    /**
     * 64-bit Windows builds are missing for some older versions; retry as 32-bit
     * when the version is unknown for x64. The answer is also stored under the
     * x64 query so a repeat skips the x64 index.
     */
    private async resolveWithFallback(
        query: VersionQuery,
        transport: TransportConfig,
        options: ResolveAndFetchOptions,
    ): Promise<Resolution> {
        const requestOptions = { transport, signal: options.signal, refresh: options.refresh };
        const primary = () => this.resolver.resolveDetailed(query, requestOptions);

        if (!this.canFallBackTo32Bit(query.platform)) {
            return primary();
        }

        return withFallback(
            primary,
            async () => {
                logger.info('No x64 build found, trying x86', {
                    browser: query.browser,
                    versionSpec: query.versionSpec,
                });
                const resolution = await this.resolver.resolveDetailed(
                    as32BitQuery(query, query.versionSpec),
                    requestOptions,
                );
                await this.resolver.remember(query, resolution);
                return resolution;
            },
            `Resolve ${query.browser} ${query.versionSpec}`,
            (error) => error instanceof UnknownVersionError,
        );
    }

    /**
     * The index listed an x64 build whose archive is not there (old Firefox
     * releases have no win64 folder); resolve the same version for x86
     */
    private async resolve32Bit(
        query: VersionQuery,
        missing: Resolution,
        transport: TransportConfig,
        options: ResolveAndFetchOptions,
    ): Promise<Resolution> {
        const resolution = await this.resolver.resolveDetailed(
            as32BitQuery(query, missing.build.fullVersion),
            { transport, signal: options.signal, refresh: options.refresh },
        );
        await this.resolver.remember(query, { build: resolution.build, matchKind: missing.matchKind });
        return { ...resolution, matchKind: missing.matchKind };
    }

    private canFallBackTo32Bit(platform: Platform): boolean {
        return this.config.archFallback && platform.os === 'windows' && platform.arch === 'x64';
    }

    private isMissing64BitBuild(build: ResolvedBuild, error: unknown): boolean {
        return (
            this.canFallBackTo32Bit(build.platform) &&
            error instanceof DownloadFailedError &&
            error.cause instanceof HttpStatusError &&
            error.cause.status === 404
        );
    }
}

function as32BitQuery(query: VersionQuery, versionSpec: string): VersionQuery {
    return createVersionQuery(
        query.browser,
        versionSpec,
        { os: 'windows', arch: 'x86' },
        { channel: query.channel, proxy: query.proxy },
    );
}
