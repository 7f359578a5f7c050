/**
 * ArchiveExtractor - unpacks downloaded zip artifacts next to the archive
 *
 * The target directory is named after the artifact without its extension.
 * Entries are written to a temporary sibling directory that is renamed into
 * place, so the target is either complete or absent. A single top-level folder
 * in the archive (chrome-linux/, chrome-win32/) is dropped.
 */

import AdmZip from 'adm-zip';
import path from 'path';
import { ResolvedBuild } from '../../types';
import { DownloadFailedError, errorCode } from '../../utils/errors';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { artifactBaseName } from './Downloader';

export interface ExtractResult {
    directory: string;
    /** true when the directory was already there */
    skipped: boolean;
}

export class ArchiveExtractor {
    private readonly fileManager: FileManager;

    constructor(fileManager: FileManager = new FileManager()) {
        this.fileManager = fileManager;
    }

    supports(archivePath: string): boolean {
        return path.extname(archivePath).toLowerCase() === '.zip';
    }

    /**
     * Unpack `archivePath`. Undefined for formats that are kept as downloaded
     * (installers, disk images, tarballs).
     */
    async unpack(build: ResolvedBuild, archivePath: string): Promise<ExtractResult | undefined> {
        if (!this.supports(archivePath)) {
            logger.warn('Artifact format is not unpacked', { path: archivePath });
            return undefined;
        }

        const directory = path.join(path.dirname(archivePath), artifactBaseName(build));
        if (await this.fileManager.isDirectory(directory)) {
            logger.info('Artifact already unpacked', { path: directory });
            return { directory, skipped: true };
        }

        const workDir = this.fileManager.createTempPath(directory, 'unpack');
        try {
            new AdmZip(archivePath).extractAllTo(workDir, true, true);
            const root = await this.singleRootFolder(workDir);
            await this.fileManager.moveIntoPlace(root ?? workDir, directory);
        } catch (error) {
            const code = errorCode(error);
            if ((code === 'ENOTEMPTY' || code === 'EEXIST') && (await this.fileManager.isDirectory(directory))) {
                // another process unpacked the same artifact first
                return { directory, skipped: true };
            }
            // a corrupt archive must not be reused on the next run
            await this.fileManager.deleteFile(archivePath);
            throw new DownloadFailedError(
                { browser: build.browser, platform: build.platform, url: build.downloadUrl },
                error,
            );
        } finally {
            await this.fileManager.removeDir(workDir);
        }

        logger.info('Artifact unpacked', { path: directory });
        return { directory, skipped: false };
    }

    private async singleRootFolder(dir: string): Promise<string | undefined> {
        const entries = await this.fileManager.listDir(dir);
        if (entries.length !== 1) {
            return undefined;
        }
        const root = path.join(dir, entries[0]);
        return (await this.fileManager.isDirectory(root)) ? root : undefined;
    }
}
