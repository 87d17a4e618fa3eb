/**
 * Constants for manga-harvester
 */

/**
 * Root of the catalog site
 */
export const BASE_URL = 'https://azoramoon.com';

/**
 * HTTP headers sent with every request
 */
export const HEADERS: Record<string, string> = {
    'User-Agent': 'manga-harvester/1.0 (+https://example.com)',
    Referer: `${BASE_URL}/`,
};

/**
 * Network configuration
 */
export const NETWORK = {
    /** Total attempts per request, the first one included */
    MAX_RETRIES: 3,
    /** Delay before attempt k+1 is BACKOFF_FACTOR * 2^(k-1) seconds */
    BACKOFF_FACTOR: 0.3,
    /** Statuses that are retried; any other failing status is final */
    RETRY_STATUSES: [500, 502, 504],
    /** Page request timeout in milliseconds */
    TIMEOUT: 10000,
    /** Image request timeout in milliseconds */
    IMAGE_TIMEOUT: 15000,
} as const;

export const SEARCH = {
    RESULTS_PER_PAGE: 12,
    POST_TYPE: 'wp-manga',
} as const;

export const CATALOG = {
    /** Upper bound on catalog pages fetched at the same time */
    MAX_WORKERS: 5,
    RESULTS_PER_PAGE: 12,
} as const;

export const DOWNLOAD = {
    /** Upper bound on images of one chapter downloaded at the same time */
    IMAGE_WORKERS: 6,
    TEMP_PREFIX: 'manga-harvester-',
} as const;

/**
 * CSS selectors for the site's Madara theme markup
 */
export const SELECTORS = {
    search: {
        count: 'h1',
        item: 'div.row.c-tabs-item__content',
        link: 'div.c-image-hover a',
        poster: 'img',
        genres: 'div.mg_genres div.summary-content a',
        status: 'div.mg_status div.summary-content',
        rate: 'span.total_votes',
        latestChapter: 'div.latest-chap a',
    },
    details: {
        title: 'h1',
        poster: 'div.summary_image a img.img-responsive',
        description: 'div.manga-summary',
        genres: 'div.genres-content a',
        status: 'div.summary-content div.tags-content',
        rate: 'span#averagerate',
        chapterRow: 'li.wp-manga-chapter',
        chapterLink: 'a',
    },
    chapter: {
        image: 'img.wp-manga-chapter-img',
    },
    catalog: {
        link: 'h3 a',
        lastPage: 'a.last',
        pageLinks: '.wp-pagenavi a, .nav-links a.page-numbers',
        count: 'div.h4',
    },
} as const;

/**
 * Directory paths for downloaded data
 */
export const PATHS = {
    /** Default directory for downloaded manga */
    DATA_DIR: 'data',
    /** Metadata file written beside the chapter PDFs */
    METADATA_FILE: 'metadata.json',
} as const;
