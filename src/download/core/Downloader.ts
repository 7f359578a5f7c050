/**
 * Downloader - streams a resolved build to disk
 *
 * Bytes go to a unique .part file next to the target and are checked against the
 * size hint and Content-Length before the rename. Nothing reaches the final path
 * any other way, so a file there is a complete artifact.
 */

import fs from 'fs';
import type { Agent } from 'http';
import fetch from 'node-fetch';
import path from 'path';
import { Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadProgress, DownloadResult, ResolvedBuild } from '../../types';
import { createRequestSignal } from '../../utils/abort';
import { DownloadFailedError, HttpStatusError, isTransientNetworkError } from '../../utils/errors';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { ProxyConfigurator, TransportConfig } from '../proxy/ProxyConfigurator';
import { ArtifactFetchOptions } from './types';

const ARCHIVE_EXTENSION = /\.(tar\.(?:bz2|xz|gz)|zip|exe|dmg|msi|pkg)$/i;
const PROGRESS_INTERVAL_MS = 200;

export interface DownloaderOptions {
    fileManager?: FileManager;
    timeoutMs?: number;
    maxRetries?: number;
    baseDelayMs?: number;
    /** Leftover .part files older than this are removed before a download */
    partialMaxAgeMinutes?: number;
}

export class SizeMismatchError extends Error {
    constructor(
        public readonly expected: number,
        public readonly received: number,
        source: 'size hint' | 'Content-Length',
    ) {
        super(`Received ${received} bytes, ${source} says ${expected}`);
        this.name = 'SizeMismatchError';
    }
}

export class Downloader {
    private readonly fileManager: FileManager;
    private readonly timeoutMs: number;
    private readonly maxRetries: number;
    private readonly baseDelayMs: number;
    private readonly partialMaxAgeMinutes: number;

    constructor(options: DownloaderOptions = {}) {
        this.fileManager = options.fileManager ?? new FileManager();
        this.timeoutMs = options.timeoutMs ?? 600000;
        this.maxRetries = options.maxRetries ?? 3;
        this.baseDelayMs = options.baseDelayMs ?? 1000;
        this.partialMaxAgeMinutes = options.partialMaxAgeMinutes ?? 60;
    }

    async fetch(
        build: ResolvedBuild,
        destinationDir: string,
        transport: TransportConfig,
        options: ArtifactFetchOptions = {},
    ): Promise<DownloadResult> {
        await this.fileManager.ensureDir(destinationDir);
        await this.fileManager.cleanupPartialFiles(destinationDir, this.partialMaxAgeMinutes);
        const finalPath = path.join(destinationDir, artifactFileName(build));

        const existing = await this.fileManager.getFileSize(finalPath);
        if (existing !== undefined) {
            if (build.sizeHint === undefined || existing === build.sizeHint) {
                logger.info('Artifact already downloaded', { path: finalPath });
                return { localPath: finalPath, bytesWritten: 0, verified: true, skipped: true };
            }
            logger.warn('Existing artifact has the wrong size, downloading again', {
                path: finalPath,
                size: existing,
                sizeHint: build.sizeHint,
            });
            await this.fileManager.deleteFile(finalPath);
        }

        const agent = ProxyConfigurator.createAgent(transport);
        const context = {
            browser: build.browser,
            platform: build.platform,
            url: build.downloadUrl,
        };

        try {
            const result = await retryWithBackoff(
                () => this.transfer(build, finalPath, agent, options),
                options.maxRetries ?? this.maxRetries,
                options.baseDelayMs ?? this.baseDelayMs,
                `Download ${build.browser} ${build.fullVersion}`,
                (error) => !options.signal?.aborted && isTransientNetworkError(error),
            );
            logger.info('Artifact downloaded', {
                path: result.localPath,
                bytes: result.bytesWritten,
                verified: result.verified,
            });
            return result;
        } catch (error) {
            throw new DownloadFailedError(context, error);
        }
    }

    /**
     * One attempt: request, stream to a temp file, verify, rename
     */
    private async transfer(
        build: ResolvedBuild,
        finalPath: string,
        agent: Agent | undefined,
        options: ArtifactFetchOptions,
    ): Promise<DownloadResult> {
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;
        const tempPath = this.fileManager.createTempPath(finalPath);
        const request = createRequestSignal(timeoutMs, options.signal);

        try {
            const response = await fetch(build.downloadUrl, {
                agent,
                signal: request.signal,
                headers: { 'User-Agent': 'browser-fetcher/0.1' },
            });

            if (!response.ok) {
                throw new HttpStatusError(response.status, build.downloadUrl);
            }

            // node-fetch decodes gzip/deflate bodies; Content-Length then counts the encoded bytes
            const contentLength = isContentEncoded(response.headers.get('content-encoding'))
                ? undefined
                : parseContentLength(response.headers.get('content-length'));
            const totalBytes = build.sizeHint ?? contentLength ?? 0;

            let downloadedBytes = 0;
            let lastProgressUpdate = 0;
            const counter = new Transform({
                transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
                    downloadedBytes += chunk.length;

                    // Throttle progress updates
                    const now = Date.now();
                    if (options.onProgress && now - lastProgressUpdate > PROGRESS_INTERVAL_MS) {
                        lastProgressUpdate = now;
                        options.onProgress(progressOf(build, downloadedBytes, totalBytes));
                    }
                    callback(null, chunk);
                },
            });

            await pipeline(response.body, counter, fs.createWriteStream(tempPath));

            if (contentLength !== undefined && downloadedBytes !== contentLength) {
                throw new SizeMismatchError(contentLength, downloadedBytes, 'Content-Length');
            }
            if (build.sizeHint !== undefined && downloadedBytes !== build.sizeHint) {
                throw new SizeMismatchError(build.sizeHint, downloadedBytes, 'size hint');
            }

            await this.fileManager.moveIntoPlace(tempPath, finalPath);
            options.onProgress?.(progressOf(build, downloadedBytes, downloadedBytes));

            return {
                localPath: finalPath,
                bytesWritten: downloadedBytes,
                verified: contentLength !== undefined || build.sizeHint !== undefined,
                skipped: false,
            };
        } catch (error) {
            await this.fileManager.deleteFile(tempPath);
            if (request.timedOut()) {
                throw new Error(`Download timed out after ${timeoutMs}ms`);
            }
            throw error;
        } finally {
            request.dispose();
        }
    }
}

/**
 * "{browser}-{version}-{os}-{arch}{ext}", extension taken from the download URL
 */
export function artifactFileName(build: ResolvedBuild): string {
    return `${artifactBaseName(build)}${artifactExtension(build.downloadUrl)}`;
}

export function artifactBaseName(build: ResolvedBuild): string {
    const version = build.fullVersion.replace(/[^\w.-]/g, '_');
    return `${build.browser}-${version}-${build.platform.os}-${build.platform.arch}`;
}

export function artifactExtension(downloadUrl: string): string {
    let fileName: string;
    try {
        fileName = decodeURIComponent(new URL(downloadUrl).pathname.split('/').pop() ?? '');
    } catch {
        return '';
    }
    const match = ARCHIVE_EXTENSION.exec(fileName);
    return match ? `.${match[1].toLowerCase()}` : '';
}

function isContentEncoded(header: string | null): boolean {
    return header !== null && header.trim() !== '' && header.trim().toLowerCase() !== 'identity';
}

function parseContentLength(header: string | null): number | undefined {
    if (!header) return undefined;
    const value = Number.parseInt(header, 10);
    return Number.isNaN(value) || value < 0 ? undefined : value;
}

function progressOf(build: ResolvedBuild, downloadedBytes: number, totalBytes: number): DownloadProgress {
    return {
        build,
        downloadedBytes,
        totalBytes,
        percentage: totalBytes > 0 ? Math.min(100, (downloadedBytes / totalBytes) * 100) : 0,
    };
}
