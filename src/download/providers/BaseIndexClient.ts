/**
 * BaseIndexClient - Abstract base class for the per-browser version indexes
 * Owns the request plumbing only: timeout, retry, proxy agent, response validation
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import {
    Browser,
    Platform,
    ReleaseChannel,
    VersionCandidate,
} from '../../types';
import { createRequestSignal } from '../../utils/abort';
import {
    HttpStatusError,
    IndexUnavailableError,
    UnsupportedPlatformError,
    isTransientNetworkError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { IndexClientOptions, IVersionIndexClient, ListCandidatesOptions } from '../core/types';
import { ProxyConfigurator } from '../proxy/ProxyConfigurator';

const USER_AGENT = 'browser-fetcher/0.1';

export abstract class BaseIndexClient implements IVersionIndexClient {
    abstract readonly browser: Browser;

    protected readonly timeout: number;
    protected readonly maxRetries: number;
    protected readonly retryBaseDelay: number;

    constructor(options: IndexClientOptions = {}) {
        this.timeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.retryBaseDelay = options.retryBaseDelay ?? 1000;
    }

    abstract supportsPlatform(platform: Platform, channel: ReleaseChannel): boolean;

    /**
     * Fetch and map the family's index - implemented by subclass
     */
    protected abstract fetchCandidates(
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate[]>;

    async listCandidates(
        platform: Platform,
        options: ListCandidatesOptions,
    ): Promise<VersionCandidate[]> {
        if (!this.supportsPlatform(platform, options.channel)) {
            throw new UnsupportedPlatformError(this.browser, platform, `channel ${options.channel}`);
        }

        const startTime = Date.now();
        const candidates = await this.fetchCandidates(platform, options);

        logger.debug(`[${this.browser}] Version index loaded`, {
            platform,
            channel: options.channel,
            candidates: candidates.length,
            responseTime: Date.now() - startTime,
        });

        return candidates;
    }

    /**
     * Listed candidates are downloadable as they are unless a family says otherwise
     */
    async describeArtifact(
        candidate: VersionCandidate,
        _platform: Platform,
        _options: ListCandidatesOptions,
    ): Promise<VersionCandidate | undefined> {
        return candidate;
    }

    /**
     * GET a JSON document and validate it against a schema
     */
    protected async fetchJson<T>(
        url: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options: ListCandidatesOptions,
        platform: Platform,
    ): Promise<T> {
        const body = await this.fetchText(url, options, platform);

        let raw: unknown;
        try {
            raw = JSON.parse(body);
        } catch (error) {
            throw new IndexUnavailableError(this.browser, url, error, platform);
        }

        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            throw new IndexUnavailableError(
                this.browser,
                url,
                new Error(`unexpected index format: ${parsed.error.issues[0]?.message ?? 'invalid'}`),
                platform,
            );
        }
        return parsed.data;
    }

    /**
     * GET a text body, retrying transient failures with backoff
     */
    protected async fetchText(
        url: string,
        options: ListCandidatesOptions,
        platform: Platform,
    ): Promise<string> {
        const agent = ProxyConfigurator.createAgent(options.transport);

        try {
            return await retryWithBackoff(
                async () => {
                    const request = createRequestSignal(this.timeout, options.signal);
                    try {
                        const response = await fetch(url, {
                            agent,
                            signal: request.signal,
                            headers: {
                                'User-Agent': USER_AGENT,
                                Accept: 'application/json, text/plain, */*',
                            },
                        });
                        if (!response.ok) {
                            throw new HttpStatusError(response.status, url);
                        }
                        return await response.text();
                    } catch (error) {
                        if (request.timedOut()) {
                            throw new Error(`Request timed out after ${this.timeout}ms`);
                        }
                        throw error;
                    } finally {
                        request.dispose();
                    }
                },
                this.maxRetries,
                this.retryBaseDelay,
                `[${this.browser}] index request`,
                (error) => !options.signal?.aborted && isTransientNetworkError(error),
            );
        } catch (error) {
            throw new IndexUnavailableError(this.browser, url, error, platform);
        }
    }
}
