/**
 * Latest chapter link shown on a search result
 */
export interface ChapterLatest {
    readonly url: string;
    readonly title: string;
}

/**
 * A chapter of a manga; orderNo 1 is the oldest chapter
 */
export interface ChapterDetailed {
    readonly orderNo: number;
    readonly url: string;
    readonly title: string;
}

/**
 * One page image of a chapter, in display order starting at 1
 */
export interface ChapterImage {
    readonly orderNo: number;
    readonly url: string;
}

/**
 * A single entry of the search results listing
 */
export interface MangaSearchResult {
    readonly url: string;
    readonly title: string;
    readonly poster: string;
    readonly genres: readonly string[];
    readonly status: string;
    /** Free-form text as shown by the site, not necessarily numeric */
    readonly rate: string;
    readonly latestChapter: ChapterLatest;
}

/**
 * Full metadata and chapter list of one manga
 */
export interface MangaDetails {
    readonly url: string;
    readonly title: string;
    readonly poster: string;
    readonly description: string;
    readonly genres: readonly string[];
    readonly status: string;
    readonly rate: string;
    readonly chapters: readonly ChapterDetailed[];
}

/**
 * One page of search results
 */
export interface SearchPage {
    readonly query: string;
    readonly page: number;
    readonly resultCount: number;
    readonly pages: number;
    readonly results: readonly MangaSearchResult[];
}

/**
 * Contents of metadata.json written by the downloader
 */
export interface MangaMetadata extends MangaDetails {
    readonly downloadedAt: string;
    readonly chapterFiles: readonly string[];
}

/**
 * Outcome of downloading a set of chapters
 */
export interface DownloadSummary {
    downloaded: number;
    skipped: number;
    failed: { url: string; error: string }[];
}

/**
 * An expected markup element that was missing; the field falls back to an empty value
 */
export interface ParseWarning {
    readonly scope: 'search' | 'details' | 'chapter' | 'catalog';
    readonly field: string;
    readonly selector: string;
    readonly url: string;
}

export type WarningHandler = (warning: ParseWarning) => void;

/**
 * Minimal fetch signature so tests can serve responses in-process
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Options for network fetch operations
 */
export interface FetchOptions {
    params?: Record<string, string | number>;
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * Options for creating a NetworkManager
 */
export interface NetworkOptions {
    /** Default request timeout in milliseconds */
    timeout?: number;
    /** Total attempts per request */
    maxRetries?: number;
    backoffFactor?: number;
    retryStatuses?: readonly number[];
    headers?: Record<string, string>;
    fetch?: FetchLike;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (current: number, total: number) => void;
