/**
 * ChromiumIndexClient - Chromium versions from Chromium Dash release history,
 * mapped to continuous builds in the chromium-browser-snapshots bucket.
 *
 * A release names its branch position; the closest snapshot at or just above
 * that position is the build we download.
 */

import { z } from 'zod';
import { Browser, Platform, ReleaseChannel, VersionCandidate } from '../../types';
import { DEFAULT_ENDPOINTS } from '../../utils/config';
import { logger } from '../../utils/logger';
import { IndexClientOptions, ListCandidatesOptions } from '../core/types';
import { BaseIndexClient } from './BaseIndexClient';

export interface SnapshotFolder {
    folder: string;
    /** Archive names in order of preference; older Win builds only ship chrome-win32.zip */
    archives: readonly string[];
    dashPlatform: 'Windows' | 'Mac' | 'Linux';
}

const WINDOWS_ARCHIVES = ['chrome-win.zip', 'chrome-win32.zip'] as const;

const SNAPSHOT_FOLDERS: Record<string, SnapshotFolder> = {
    'windows-x64': { folder: 'Win_x64', archives: WINDOWS_ARCHIVES, dashPlatform: 'Windows' },
    'windows-x86': { folder: 'Win', archives: WINDOWS_ARCHIVES, dashPlatform: 'Windows' },
    'linux-x64': { folder: 'Linux_x64', archives: ['chrome-linux.zip'], dashPlatform: 'Linux' },
    'mac-x64': { folder: 'Mac', archives: ['chrome-mac.zip'], dashPlatform: 'Mac' },
    'mac-arm64': { folder: 'Mac_Arm', archives: ['chrome-mac.zip'], dashPlatform: 'Mac' },
};

const DASH_CHANNELS: Record<ReleaseChannel, string> = {
    stable: 'Stable',
    beta: 'Beta',
    dev: 'Dev',
    canary: 'Canary',
};

// Snapshots are not taken for every commit; a build this far past the branch point is still the same release
const MAX_REVISION_DISTANCE = 120;

const ReleaseHistorySchema = z.array(
    z
        .object({
            version: z.string(),
            time: z.number().optional(),
            chromium_main_branch_position: z.number().nullable().optional(),
        })
        .passthrough(),
);

const SnapshotPageSchema = z.object({
    prefixes: z.array(z.string()).default([]),
    nextPageToken: z.string().optional(),
});

// Storage JSON API reports sizes as decimal strings
const BuildObjectsSchema = z.object({
    items: z
        .array(
            z.object({
                name: z.string(),
                size: z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).optional(),
            }),
        )
        .default([]),
});

export interface ChromiumIndexClientOptions extends IndexClientOptions {
    releasesUrl?: string;
    snapshotsApiUrl?: string;
    snapshotsDownloadUrl?: string;
    historyLimit?: number;
    maxRevisionDistance?: number;
    maxPages?: number;
}

export class ChromiumIndexClient extends BaseIndexClient {
    public readonly browser = Browser.CHROMIUM;

    private readonly releasesUrl: string;
    private readonly snapshotsApiUrl: string;
    private readonly snapshotsDownloadUrl: string;
    private readonly historyLimit: number;
    private readonly maxRevisionDistance: number;
    private readonly maxPages: number;

    constructor(options: ChromiumIndexClientOptions = {}) {
        super(options);
        this.releasesUrl = trimSlash(options.releasesUrl ?? DEFAULT_ENDPOINTS.chromiumReleasesUrl);
        this.snapshotsApiUrl = trimSlash(options.snapshotsApiUrl ?? DEFAULT_ENDPOINTS.chromiumSnapshotsApiUrl);
        this.snapshotsDownloadUrl = trimSlash(
            options.snapshotsDownloadUrl ?? DEFAULT_ENDPOINTS.chromiumSnapshotsDownloadUrl,
        );
        this.historyLimit = options.historyLimit ?? 1000;
        this.maxRevisionDistance = options.maxRevisionDistance ?? MAX_REVISION_DISTANCE;
        this.maxPages = options.maxPages ?? 500;
    }

    supportsPlatform(platform: Platform): boolean {
        return getSnapshotFolder(platform) !== undefined;
    }

    protected async fetchCandidates(
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate[]> {
        const snapshot = getSnapshotFolder(platform);
        if (!snapshot) {
            return [];
        }

        const history = await this.fetchReleaseHistory(snapshot, options, platform);
        const revisions = await this.fetchSnapshotRevisions(snapshot, options, platform);

        const candidates: VersionCandidate[] = [];
        for (const release of history) {
            const position = release.chromium_main_branch_position;
            if (position === undefined || position === null) {
                logger.debug(`[${this.browser}] ${release.version}: no branch position`);
                continue;
            }

            const revision = findNearestRevision(revisions, position, this.maxRevisionDistance);
            if (revision === undefined) {
                logger.debug(`[${this.browser}] ${release.version}: no snapshot near position ${position}`);
                continue;
            }

            candidates.push({
                fullVersion: release.version,
                downloadUrl: `${this.snapshotsDownloadUrl}/${snapshot.folder}/${revision}/${snapshot.archives[0]}`,
                buildId: String(revision),
                ...(release.time !== undefined ? { publishedAt: new Date(release.time).toISOString() } : {}),
            });
        }

        return candidates;
    }

    /**
     * List the objects of the chosen snapshot and pick its archive by preference.
     * The object size becomes the size hint.
     */
    async describeArtifact(
        candidate: VersionCandidate,
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate | undefined> {
        const snapshot = getSnapshotFolder(platform);
        if (!snapshot || candidate.buildId === undefined) {
            return candidate;
        }

        const prefix = `${snapshot.folder}/${candidate.buildId}/`;
        const params = new URLSearchParams({ delimiter: '/', prefix, fields: 'items(name,size)' });
        const url = `${this.snapshotsApiUrl}/b/chromium-browser-snapshots/o?${params.toString()}`;
        const objects = await this.fetchJson(url, BuildObjectsSchema, options, platform);

        for (const archive of snapshot.archives) {
            const item = objects.items.find((object) => object.name === `${prefix}${archive}`);
            if (!item) {
                continue;
            }
            return {
                ...candidate,
                downloadUrl: `${this.snapshotsDownloadUrl}/${item.name}`,
                ...(item.size !== undefined ? { sizeHint: Number(item.size) } : {}),
            };
        }

        logger.debug(`[${this.browser}] No archive in ${prefix}`, {
            objects: objects.items.map((object) => object.name),
        });
        return undefined;
    }

    /**
     * Release history for one platform and channel
     */
    private async fetchReleaseHistory(
        snapshot: SnapshotFolder,
        options: ListCandidatesOptions,
        platform: Platform,
    ) {
        const url =
            `${this.releasesUrl}/fetch_releases?channel=${DASH_CHANNELS[options.channel]}` +
            `&platform=${snapshot.dashPlatform}&num=${this.historyLimit}`;
        return this.fetchJson(url, ReleaseHistorySchema, options, platform);
    }

    /**
     * All snapshot revisions in the platform folder, ascending
     */
    private async fetchSnapshotRevisions(
        snapshot: SnapshotFolder,
        options: ListCandidatesOptions,
        platform: Platform,
    ): Promise<number[]> {
        const revisions: number[] = [];
        let pageToken: string | undefined;
        let pages = 0;

        do {
            const params = new URLSearchParams({
                delimiter: '/',
                prefix: `${snapshot.folder}/`,
                fields: 'prefixes,nextPageToken',
            });
            if (pageToken) {
                params.set('pageToken', pageToken);
            }
            const url = `${this.snapshotsApiUrl}/b/chromium-browser-snapshots/o?${params.toString()}`;
            const page = await this.fetchJson(url, SnapshotPageSchema, options, platform);

            for (const prefix of page.prefixes) {
                const revision = parseRevisionPrefix(prefix, snapshot.folder);
                if (revision !== undefined) {
                    revisions.push(revision);
                }
            }

            pageToken = page.nextPageToken;
            pages++;
        } while (pageToken && pages < this.maxPages);

        if (pageToken) {
            logger.warn(`[${this.browser}] Snapshot listing truncated`, { pages });
        }

        return revisions.sort((a, b) => a - b);
    }
}

export function getSnapshotFolder(platform: Platform): SnapshotFolder | undefined {
    return SNAPSHOT_FOLDERS[`${platform.os}-${platform.arch}`];
}

/**
 * "Win_x64/1000027/" -> 1000027, undefined for anything else
 */
export function parseRevisionPrefix(prefix: string, folder: string): number | undefined {
    const parts = prefix.split('/');
    if (parts.length !== 3 || parts[0] !== folder || parts[2] !== '' || !/^\d+$/.test(parts[1])) {
        return undefined;
    }
    return Number.parseInt(parts[1], 10);
}

/**
 * First revision at or above `position`, within `maxDistance` of it.
 * `revisions` must be sorted ascending.
 */
export function findNearestRevision(
    revisions: readonly number[],
    position: number,
    maxDistance: number,
): number | undefined {
    let low = 0;
    let high = revisions.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (revisions[mid] < position) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    const revision = revisions[low];
    if (revision === undefined || revision - position > maxDistance) {
        return undefined;
    }
    return revision;
}

function trimSlash(url: string): string {
    return url.replace(/\/+$/, '');
}
