/**
 * FirefoxIndexClient - Firefox versions from Mozilla product-details,
 * downloads from the release archive
 */

import { z } from 'zod';
import { Browser, Platform, ReleaseChannel, VersionCandidate } from '../../types';
import { DEFAULT_ENDPOINTS } from '../../utils/config';
import { IndexClientOptions, ListCandidatesOptions } from '../core/types';
import { BaseIndexClient } from './BaseIndexClient';

export type InstallerKind = 'windows' | 'mac' | 'linux';

const ARCHIVE_FOLDERS: Record<string, { folder: string; installer: InstallerKind }> = {
    'windows-x64': { folder: 'win64', installer: 'windows' },
    'windows-x86': { folder: 'win32', installer: 'windows' },
    'windows-arm64': { folder: 'win64-aarch64', installer: 'windows' },
    'linux-x64': { folder: 'linux-x86_64', installer: 'linux' },
    'linux-x86': { folder: 'linux-i686', installer: 'linux' },
    'linux-arm64': { folder: 'linux-aarch64', installer: 'linux' },
    'mac-x64': { folder: 'mac', installer: 'mac' },
    'mac-arm64': { folder: 'mac', installer: 'mac' },
};

// product-details categories per channel
const CHANNEL_CATEGORIES: Partial<Record<ReleaseChannel, readonly string[]>> = {
    stable: ['major', 'stability', 'esr'],
    beta: ['dev'],
    dev: ['dev'],
};

// Linux tarballs switched from bzip2 to xz with this release
const FIRST_XZ_MAJOR = 135;

const ProductDetailsSchema = z.object({
    releases: z.record(
        z
            .object({
                version: z.string(),
                date: z.string().optional(),
                category: z.string(),
            })
            .passthrough(),
    ),
});

export interface FirefoxIndexClientOptions extends IndexClientOptions {
    productDetailsUrl?: string;
    releasesUrl?: string;
    locale?: string;
}

export class FirefoxIndexClient extends BaseIndexClient {
    public readonly browser = Browser.FIREFOX;

    private readonly productDetailsUrl: string;
    private readonly releasesUrl: string;
    private readonly locale: string;

    constructor(options: FirefoxIndexClientOptions = {}) {
        super(options);
        this.productDetailsUrl = options.productDetailsUrl ?? DEFAULT_ENDPOINTS.firefoxProductDetailsUrl;
        this.releasesUrl = (options.releasesUrl ?? DEFAULT_ENDPOINTS.firefoxReleasesUrl).replace(/\/+$/, '');
        this.locale = options.locale ?? 'en-US';
    }

    supportsPlatform(platform: Platform, channel: ReleaseChannel): boolean {
        return (
            ARCHIVE_FOLDERS[`${platform.os}-${platform.arch}`] !== undefined &&
            CHANNEL_CATEGORIES[channel] !== undefined
        );
    }

    protected async fetchCandidates(
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate[]> {
        const categories = CHANNEL_CATEGORIES[options.channel] ?? [];
        const details = await this.fetchJson(this.productDetailsUrl, ProductDetailsSchema, options, platform);

        return Object.values(details.releases)
            .filter((release) => categories.includes(release.category))
            .map((release) => ({
                fullVersion: release.version,
                downloadUrl: this.buildDownloadUrl(release.version, platform),
                ...(release.date ? { publishedAt: release.date } : {}),
            }));
    }

    /**
     * Archive URL of the installer/package for one version and platform
     */
    buildDownloadUrl(version: string, platform: Platform): string {
        const target = ARCHIVE_FOLDERS[`${platform.os}-${platform.arch}`];
        if (!target) {
            throw new Error(`No Firefox archive folder for ${platform.os}-${platform.arch}`);
        }
        const file = installerFileName(version, target.installer);
        return [
            this.releasesUrl,
            encodeURIComponent(version),
            target.folder,
            encodeURIComponent(this.locale),
            encodeURIComponent(file),
        ].join('/');
    }
}

export function installerFileName(version: string, installer: InstallerKind): string {
    switch (installer) {
        case 'windows':
            return `Firefox Setup ${version}.exe`;
        case 'mac':
            return `Firefox ${version}.dmg`;
        case 'linux': {
            const major = Number.parseInt(version, 10);
            const extension = !Number.isNaN(major) && major >= FIRST_XZ_MAJOR ? 'tar.xz' : 'tar.bz2';
            return `firefox-${version}.${extension}`;
        }
    }
}
