import type { CacheEntry } from './ArtifactCache';

/**
 * Decides whether a cached resolution may be trusted without asking the index again
 */
export interface StalenessPolicy {
    isStale(entry: CacheEntry, now: Date): boolean;
}

export interface StalenessOptions {
    /** How long a "latest" resolution is trusted. 0 re-queries every time. */
    latestTtlMs?: number;
    /** How long a prefix resolution such as "98" is trusted */
    prefixTtlMs?: number;
    /** Trust "latest" resolutions indefinitely */
    pinLatest?: boolean;
}

export const DEFAULT_PREFIX_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Exact versions never go stale: a published build does not move.
 * "latest" and prefix specs track a moving target and expire by TTL.
 */
export class DefaultStalenessPolicy implements StalenessPolicy {
    private readonly latestTtlMs: number;
    private readonly prefixTtlMs: number;
    private readonly pinLatest: boolean;

    constructor(options: StalenessOptions = {}) {
        this.latestTtlMs = options.latestTtlMs ?? 0;
        this.prefixTtlMs = options.prefixTtlMs ?? DEFAULT_PREFIX_TTL_MS;
        this.pinLatest = options.pinLatest ?? false;
    }

    isStale(entry: CacheEntry, now: Date): boolean {
        if (entry.matchKind === 'exact') {
            return false;
        }
        if (entry.matchKind === 'latest' && this.pinLatest) {
            return false;
        }

        const resolvedAt = Date.parse(entry.resolvedAt);
        const age = now.getTime() - resolvedAt;
        if (Number.isNaN(resolvedAt) || age < 0) {
            return true;
        }

        const ttl = entry.matchKind === 'latest' ? this.latestTtlMs : this.prefixTtlMs;
        return age >= ttl;
    }
}
