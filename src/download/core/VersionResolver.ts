/**
 * VersionResolver - turns a VersionQuery into one ResolvedBuild
 * Cache first; on a miss or a stale entry, query the family's index and match.
 */

import {
    Browser,
    ResolvedBuild,
    VersionCandidate,
    VersionQuery,
    createResolvedBuild,
    formatPlatform,
} from '../../types';
import { UnknownVersionError, UnsupportedPlatformError, causeMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { ArtifactCache, CacheKey } from '../cache/ArtifactCache';
import { ProxyConfigurator, TransportConfig } from '../proxy/ProxyConfigurator';
import { MatchKind, parseVersionSpec, selectBestMatch } from '../version/VersionMatcher';
import { IVersionIndexClient, ResolveOptions } from './types';

export interface Resolution {
    build: ResolvedBuild;
    matchKind: MatchKind;
    fromCache: boolean;
}

export interface VersionResolverOptions {
    cache: ArtifactCache;
    clients: readonly IVersionIndexClient[];
    now?: () => Date;
}

export interface ResolverRequestOptions extends ResolveOptions {
    /** Transport for index queries; defaults to the query's proxy */
    transport?: TransportConfig;
}

export class VersionResolver {
    private readonly cache: ArtifactCache;
    private readonly clients = new Map<Browser, IVersionIndexClient>();
    private readonly now: () => Date;

    constructor(options: VersionResolverOptions) {
        this.cache = options.cache;
        this.now = options.now ?? (() => new Date());
        for (const client of options.clients) {
            this.clients.set(client.browser, client);
        }
    }

    async resolve(query: VersionQuery, options: ResolverRequestOptions = {}): Promise<ResolvedBuild> {
        const resolution = await this.resolveDetailed(query, options);
        return resolution.build;
    }

    /**
     * Resolve and report where the answer came from
     */
    async resolveDetailed(query: VersionQuery, options: ResolverRequestOptions = {}): Promise<Resolution> {
        const spec = parseVersionSpec(query.versionSpec);
        if (!spec) {
            throw new UnknownVersionError(query.browser, query.versionSpec, query.platform);
        }

        const key = toCacheKey(query);

        if (!options.refresh) {
            const entry = await this.cache.get(key);
            if (entry && !this.cache.isStale(entry, this.now())) {
                logger.debug('Resolution cache hit', {
                    browser: query.browser,
                    versionSpec: query.versionSpec,
                    fullVersion: entry.resolvedBuild.fullVersion,
                });
                return { build: entry.resolvedBuild, matchKind: entry.matchKind, fromCache: true };
            }
        }

        const client = this.clients.get(query.browser);
        if (!client) {
            throw new UnsupportedPlatformError(query.browser, query.platform, 'no version index registered');
        }

        const listOptions = {
            channel: query.channel,
            transport: options.transport ?? ProxyConfigurator.fromOptional(query.proxy),
            signal: options.signal,
        };
        const candidates = await client.listCandidates(query.platform, listOptions);

        await this.invalidateVanished(query, candidates);

        const match = selectBestMatch(spec, candidates, {
            includePrereleases: query.channel !== 'stable',
        });
        if (!match) {
            throw new UnknownVersionError(query.browser, query.versionSpec, query.platform);
        }

        const artifact = await client.describeArtifact(match.candidate, query.platform, listOptions);
        if (!artifact) {
            logger.warn('Matched build has no downloadable archive', {
                browser: query.browser,
                fullVersion: match.candidate.fullVersion,
                platform: formatPlatform(query.platform),
            });
            throw new UnknownVersionError(query.browser, query.versionSpec, query.platform);
        }

        const build = createResolvedBuild(query.browser, query.platform, artifact);
        await this.remember(query, { build, matchKind: match.matchKind });

        logger.info('Version resolved', {
            browser: query.browser,
            versionSpec: query.versionSpec,
            platform: formatPlatform(query.platform),
            fullVersion: build.fullVersion,
            matchKind: match.matchKind,
        });

        return { build, matchKind: match.matchKind, fromCache: false };
    }

    /**
     * Store a resolution under the query's key. The build may be for another
     * platform than the query (32-bit fallback). A failed write is logged only.
     */
    async remember(query: VersionQuery, resolution: Pick<Resolution, 'build' | 'matchKind'>): Promise<void> {
        const key = toCacheKey(query);
        try {
            await this.cache.put(key, {
                key,
                resolvedBuild: resolution.build,
                resolvedAt: this.now().toISOString(),
                matchKind: resolution.matchKind,
            });
        } catch (error) {
            logger.warn('Failed to store resolution', {
                key,
                error: causeMessage(error),
            });
        }
    }

    /**
     * Drop cached resolutions whose version the index no longer lists.
     * Entries are matched on the platform of the cached build, not of the key.
     */
    private async invalidateVanished(
        query: VersionQuery,
        candidates: readonly VersionCandidate[],
    ): Promise<void> {
        if (candidates.length === 0) {
            return;
        }
        const listed = new Set(candidates.map((c) => c.fullVersion));
        try {
            await this.cache.invalidate(
                (entry) =>
                    entry.key.browser === query.browser &&
                    entry.key.channel === query.channel &&
                    entry.resolvedBuild.platform.os === query.platform.os &&
                    entry.resolvedBuild.platform.arch === query.platform.arch &&
                    !listed.has(entry.resolvedBuild.fullVersion),
            );
        } catch (error) {
            logger.warn('Failed to invalidate cache entries', {
                error: causeMessage(error),
            });
        }
    }
}

export function toCacheKey(query: VersionQuery): CacheKey {
    return {
        browser: query.browser,
        versionSpec: query.versionSpec,
        platform: { os: query.platform.os, arch: query.platform.arch },
        channel: query.channel,
    };
}
