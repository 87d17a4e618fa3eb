/**
 * Network Manager for manga-harvester
 * Handles HTTP requests with retry logic and exponential backoff
 */

import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { Readable } from 'node:stream';
import { dirname } from 'node:path';
import * as cheerio from 'cheerio';

import { HEADERS, NETWORK } from '../config/constants';
import { ensureDir, removeFile } from '../utils/fs';
import { logger } from '../utils/logger';
import type { FetchLike, FetchOptions, NetworkOptions } from '../types';

/**
 * Raised when a request fails for good: retries exhausted,
 * a non-retryable status, or the manager was closed
 */
export class NetworkError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly attempts: number,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'NetworkError';
    }
}

/**
 * A failed attempt and whether another attempt may fix it
 */
interface AttemptFailure {
    retryable: boolean;
    reason: string;
    status?: number;
}

/**
 * Consumes a successful response within its attempt; must settle once `signal` aborts
 */
export type ReadBody<T> = (response: Response, signal: AbortSignal) => Promise<T>;

/**
 * Settles with `work`, or rejects as soon as `signal` aborts
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

/**
 * NetworkManager handles all HTTP operations with built-in resilience features:
 * - Bounded retries for 500/502/504 responses and connection failures
 * - Exponential backoff: backoffFactor * 2^(attempt - 1) seconds
 * - Immediate failure on any other error status
 * - Stream downloads for images
 *
 * One instance is meant to be shared by every scraper in the process; fetch
 * pools connections underneath, so concurrent calls need no locking.
 */
export class NetworkManager {
    private requestCount: number = 0;
    private closed: boolean = false;
    private readonly headers: Record<string, string>;
    private readonly timeout: number;
    private readonly maxRetries: number;
    private readonly backoffFactor: number;
    private readonly retryStatuses: ReadonlySet<number>;
    private readonly fetchImpl: FetchLike;
    private readonly sleepImpl: (ms: number) => Promise<void>;

    /**
     * @param options - Optional overrides of the defaults in NETWORK
     */
    constructor(options?: NetworkOptions) {
        this.headers = { ...HEADERS, ...options?.headers };
        this.timeout = options?.timeout ?? NETWORK.TIMEOUT;
        this.maxRetries = Math.max(1, options?.maxRetries ?? NETWORK.MAX_RETRIES);
        this.backoffFactor = options?.backoffFactor ?? NETWORK.BACKOFF_FACTOR;
        this.retryStatuses = new Set(options?.retryStatuses ?? NETWORK.RETRY_STATUSES);
        this.fetchImpl = options?.fetch ?? ((url, init) => fetch(url, init));
        this.sleepImpl = options?.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    }

    /**
     * Builds the request URL with query parameters appended
     */
    buildUrl(url: string, params?: FetchOptions['params']): string {
        if (!params || Object.keys(params).length === 0) {
            return url;
        }
        const target = new URL(url);
        for (const [key, value] of Object.entries(params)) {
            target.searchParams.set(key, String(value));
        }
        return target.toString();
    }

    /**
     * Delay in milliseconds before the attempt following `attempt` (1-based)
     */
    backoffDelay(attempt: number): number {
        return Math.round(this.backoffFactor * Math.pow(2, attempt - 1) * 1000);
    }

    /**
     * Fetches a URL with retry logic and exponential backoff.
     * The body is left unread; only the headers are covered by the timeout.
     *
     * @param url - The URL to fetch
     * @param options - Optional query params, headers and timeout
     * @returns The successful Response
     * @throws NetworkError once the request cannot succeed
     */
    fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
        return this.request(url, async (response) => response, options);
    }

    /**
     * Runs one request per attempt and hands each successful response to
     * `read` while the attempt's timeout is still armed. A body that stalls,
     * or a connection that drops while `read` runs, fails the attempt like a
     * failed fetch and is retried.
     *
     * @throws NetworkError once the request cannot succeed
     */
    async request<T>(url: string, read: ReadBody<T>, options?: FetchOptions): Promise<T> {
        const target = this.buildUrl(url, options?.params);
        if (this.closed) {
            throw new NetworkError(`Network manager is closed, cannot fetch ${target}`, target, 0);
        }

        const timeout = options?.timeout ?? this.timeout;
        const headers = { ...this.headers, ...options?.headers };

        let failure: AttemptFailure = { retryable: true, reason: 'no attempt made' };
        let attempt = 0;

        while (attempt < this.maxRetries) {
            attempt++;
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await this.fetchImpl(target, {
                    headers,
                    signal: controller.signal,
                });
                this.requestCount++;

                if (response.ok) {
                    return await read(response, controller.signal);
                }

                await response.body?.cancel();
                failure = {
                    retryable: this.retryStatuses.has(response.status),
                    reason: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
                    status: response.status,
                };
            } catch (error) {
                const aborted = controller.signal.aborted;
                failure = {
                    retryable: true,
                    reason: aborted
                        ? `timed out after ${timeout}ms`
                        : error instanceof Error ? error.message : String(error),
                };
            } finally {
                clearTimeout(timeoutId);
            }

            if (!failure.retryable) {
                break;
            }

            if (attempt < this.maxRetries) {
                const delay = this.backoffDelay(attempt);
                logger.debug(`Retrying ${target} in ${delay}ms (${failure.reason}, attempt ${attempt}/${this.maxRetries})`);
                await this.sleepImpl(delay);
            }
        }

        throw new NetworkError(
            `Failed to fetch ${target} after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${failure.reason}`,
            target,
            attempt,
            failure.status
        );
    }

    /**
     * Fetches the raw body of a URL
     */
    fetchBytes(url: string, options?: FetchOptions): Promise<Buffer> {
        return this.request(
            url,
            async (response, signal) => Buffer.from(await untilAborted(response.arrayBuffer(), signal)),
            options
        );
    }

    /**
     * Fetches and parses an HTML page
     */
    async fetchDocument(url: string, options?: FetchOptions): Promise<cheerio.CheerioAPI> {
        const body = await this.fetchBytes(url, options);
        return cheerio.load(body.toString('utf-8'));
    }

    /**
     * Downloads a file from URL to disk using streaming.
     * A partially written file is removed before the attempt is retried
     * or the error propagates.
     *
     * @param url - The URL to download from
     * @param savePath - The local path to save the file
     */
    async downloadToFile(url: string, savePath: string, options?: FetchOptions): Promise<void> {
        await ensureDir(dirname(savePath));

        await this.request(
            url,
            async (response, signal) => {
                if (!response.body) {
                    throw new Error('empty response body');
                }
                try {
                    const readable = Readable.fromWeb(response.body as import('stream/web').ReadableStream);
                    await pipeline(readable, createWriteStream(savePath), { signal });
                } catch (error) {
                    await removeFile(savePath);
                    throw error;
                }
            },
            options
        );
    }

    /**
     * Refuses further requests. In-flight requests finish on their own timeout.
     */
    close(): void {
        this.closed = true;
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Gets the number of responses received
     */
    getRequestCount(): number {
        return this.requestCount;
    }
}

let shared: NetworkManager | null = null;

/**
 * Returns the process-wide NetworkManager, creating it on first use.
 * Options only apply to that first call.
 */
export function getNetworkManager(options?: NetworkOptions): NetworkManager {
    if (!shared || shared.isClosed()) {
        shared = new NetworkManager(options);
    }
    return shared;
}

/**
 * Closes the process-wide NetworkManager; the next getNetworkManager() builds a new one
 */
export function closeNetworkManager(): void {
    shared?.close();
    shared = null;
}
