/**
 * ArtifactCache - persistent map from a resolution query to the build it resolved to
 *
 * Stored as a single JSON document. Readers never take the lock: the document is
 * only ever replaced by rename. Writers re-read, modify and replace it under an
 * exclusive lock file. A missing, empty or corrupt document reads as an empty cache.
 */

import path from 'path';
import { z } from 'zod';
import {
    ARCHITECTURES,
    Browser,
    OPERATING_SYSTEMS,
    Platform,
    RELEASE_CHANNELS,
    ReleaseChannel,
    ResolvedBuild,
} from '../../types';
import { CacheCorruptError } from '../../utils/errors';
import { FileManager } from '../../utils/FileManager';
import { withFileLock } from '../../utils/FileLock';
import { logger } from '../../utils/logger';
import { MatchKind } from '../version/VersionMatcher';
import { DefaultStalenessPolicy, StalenessPolicy } from './StalenessPolicy';

export interface CacheKey {
    readonly browser: Browser;
    readonly versionSpec: string;
    readonly platform: Platform;
    readonly channel: ReleaseChannel;
}

export interface CacheEntry {
    key: CacheKey;
    resolvedBuild: ResolvedBuild;
    /** ISO timestamp */
    resolvedAt: string;
    matchKind: MatchKind;
}

export interface ArtifactCacheOptions {
    stalenessPolicy?: StalenessPolicy;
    fileManager?: FileManager;
    lockTimeoutMs?: number;
    lockStaleMs?: number;
}

export const CACHE_FILE_NAME = 'resolutions.json';
const CACHE_FORMAT_VERSION = 1;

// ============================================================================
// Schemas
// ============================================================================

const PlatformSchema = z.object({
    os: z.enum(OPERATING_SYSTEMS),
    arch: z.enum(ARCHITECTURES),
});

const CacheKeySchema = z.object({
    browser: z.nativeEnum(Browser),
    versionSpec: z.string(),
    platform: PlatformSchema,
    channel: z.enum(RELEASE_CHANNELS),
});

const ResolvedBuildSchema = z.object({
    browser: z.nativeEnum(Browser),
    fullVersion: z.string().min(1),
    platform: PlatformSchema,
    downloadUrl: z.string().url(),
    sizeHint: z.number().int().nonnegative().optional(),
});

const CacheEntrySchema = z.object({
    key: CacheKeySchema,
    resolvedBuild: ResolvedBuildSchema,
    resolvedAt: z.string(),
    matchKind: z.enum(['latest', 'prefix', 'exact']),
});

const CacheDocumentSchema = z.object({
    version: z.literal(CACHE_FORMAT_VERSION),
    entries: z.record(z.unknown()),
});

interface CacheDocument {
    version: typeof CACHE_FORMAT_VERSION;
    entries: Record<string, CacheEntry>;
}

export function serializeCacheKey(key: CacheKey): string {
    return [key.browser, key.channel, key.platform.os, key.platform.arch, key.versionSpec].join('|');
}

export class ArtifactCache {
    readonly filePath: string;
    private readonly lockPath: string;
    private readonly policy: StalenessPolicy;
    private readonly fileManager: FileManager;
    private readonly lockTimeoutMs: number;
    private readonly lockStaleMs: number;

    constructor(cacheDir: string, options: ArtifactCacheOptions = {}) {
        this.filePath = path.join(cacheDir, CACHE_FILE_NAME);
        this.lockPath = `${this.filePath}.lock`;
        this.policy = options.stalenessPolicy ?? new DefaultStalenessPolicy();
        this.fileManager = options.fileManager ?? new FileManager();
        this.lockTimeoutMs = options.lockTimeoutMs ?? 10000;
        this.lockStaleMs = options.lockStaleMs ?? 30000;
    }

    /**
     * Look up the entry for a key. The returned entry is a private copy.
     */
    async get(key: CacheKey): Promise<CacheEntry | undefined> {
        const document = await this.load();
        const entry = document.entries[serializeCacheKey(key)];
        return entry ? copyEntry(entry) : undefined;
    }

    /**
     * Store an entry, replacing any previous value for the key
     */
    async put(key: CacheKey, entry: CacheEntry): Promise<void> {
        const stored = copyEntry({ ...entry, key });
        await this.update((entries) => {
            entries[serializeCacheKey(key)] = stored;
            return true;
        });
        logger.debug('Resolution cached', {
            key: serializeCacheKey(key),
            fullVersion: stored.resolvedBuild.fullVersion,
        });
    }

    isStale(entry: CacheEntry, now: Date = new Date()): boolean {
        return this.policy.isStale(entry, now);
    }

    async delete(key: CacheKey): Promise<boolean> {
        let removed = false;
        await this.update((entries) => {
            const serialized = serializeCacheKey(key);
            removed = serialized in entries;
            delete entries[serialized];
            return removed;
        });
        return removed;
    }

    /**
     * Remove every entry the predicate accepts, returning how many went
     */
    async invalidate(predicate: (entry: CacheEntry) => boolean): Promise<number> {
        let removed = 0;
        await this.update((entries) => {
            for (const [serialized, entry] of Object.entries(entries)) {
                if (predicate(entry)) {
                    delete entries[serialized];
                    removed++;
                }
            }
            return removed > 0;
        });
        if (removed > 0) {
            logger.info('Cache entries invalidated', { removed });
        }
        return removed;
    }

    async clear(): Promise<void> {
        await this.update((entries) => {
            for (const serialized of Object.keys(entries)) {
                delete entries[serialized];
            }
            return true;
        });
    }

    /**
     * Read-modify-write under the exclusive lock. `mutate` reports whether it changed anything.
     */
    private async update(mutate: (entries: Record<string, CacheEntry>) => boolean): Promise<void> {
        await this.fileManager.ensureDir(path.dirname(this.filePath));
        await withFileLock(
            this.lockPath,
            async () => {
                const document = await this.load();
                if (!mutate(document.entries)) {
                    return;
                }
                await this.fileManager.writeFileAtomic(
                    this.filePath,
                    JSON.stringify(document, null, 2),
                );
            },
            { timeoutMs: this.lockTimeoutMs, staleMs: this.lockStaleMs },
        );
    }

    private async load(): Promise<CacheDocument> {
        try {
            return await this.readDocument();
        } catch (error) {
            if (error instanceof CacheCorruptError) {
                logger.warn('Ignoring corrupt resolution cache', {
                    path: this.filePath,
                    error: error.message,
                });
                return emptyDocument();
            }
            throw error;
        }
    }

    private async readDocument(): Promise<CacheDocument> {
        let contents: string | undefined;
        try {
            contents = await this.fileManager.readFileIfExists(this.filePath);
        } catch (error) {
            throw new CacheCorruptError(this.filePath, error);
        }
        if (contents === undefined || contents.trim().length === 0) {
            return emptyDocument();
        }

        let raw: unknown;
        try {
            raw = JSON.parse(contents);
        } catch (error) {
            throw new CacheCorruptError(this.filePath, error);
        }

        const parsed = CacheDocumentSchema.safeParse(raw);
        if (!parsed.success) {
            throw new CacheCorruptError(this.filePath, parsed.error);
        }

        const document = emptyDocument();
        for (const [serialized, value] of Object.entries(parsed.data.entries)) {
            const entry = CacheEntrySchema.safeParse(value);
            if (entry.success && serializeCacheKey(entry.data.key) === serialized) {
                document.entries[serialized] = entry.data;
            } else {
                logger.debug('Dropping invalid cache entry', { key: serialized });
            }
        }
        return document;
    }
}

function emptyDocument(): CacheDocument {
    return { version: CACHE_FORMAT_VERSION, entries: {} };
}

function copyEntry(entry: CacheEntry): CacheEntry {
    const platform = { os: entry.key.platform.os, arch: entry.key.platform.arch };
    const build = entry.resolvedBuild;
    return {
        key: { ...entry.key, platform },
        resolvedBuild: Object.freeze({
            ...build,
            platform: Object.freeze({ os: build.platform.os, arch: build.platform.arch }),
        }),
        resolvedAt: entry.resolvedAt,
        matchKind: entry.matchKind,
    };
}
