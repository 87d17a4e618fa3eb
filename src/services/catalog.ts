/**
 * Catalog Walker for manga-harvester
 * Enumerates every manga URL listed in the site's paginated series index
 */

import type { CheerioAPI } from 'cheerio';

import { BASE_URL, CATALOG, SELECTORS } from '../config/constants';
import { runPool } from '../utils/pool';
import { parseLeadingInt, resolveUrl } from '../utils/text';
import { logger } from '../utils/logger';
import { NetworkManager } from './network';
import type { ProgressCallback } from '../types';

export interface CatalogOptions {
    baseUrl?: string;
    /** Catalog pages fetched at the same time */
    maxWorkers?: number;
}

/**
 * Failure of one catalog page during a walk
 */
export interface PageFailure {
    page: number;
    error: Error;
}

/**
 * Page number encoded in a pagination link, e.g. `/series/page/37/` gives 37
 */
export function pageFromHref(href: string): number | undefined {
    const match = href.match(/\/page\/(\d+)/) ?? href.match(/[?&]paged?=(\d+)/);
    return match?.[1] ? parseInt(match[1], 10) : undefined;
}

/**
 * Reads the number of the last catalog page from a listing page
 */
export function parseTotalPages($: CheerioAPI): number {
    const { lastPage, pageLinks, count } = SELECTORS.catalog;

    const lastHref = $(lastPage).first().attr('href');
    const fromLast = lastHref ? pageFromHref(lastHref) : undefined;
    if (fromLast !== undefined) {
        return fromLast;
    }

    let highest = 0;
    for (const node of $(pageLinks).toArray()) {
        const link = $(node);
        const page = pageFromHref(link.attr('href') ?? '') ?? parseLeadingInt(link.text());
        if (page !== undefined && page > highest) {
            highest = page;
        }
    }
    if (highest > 0) {
        return highest;
    }

    const total = parseLeadingInt($(count).first().text());
    if (total !== undefined) {
        return Math.max(1, Math.ceil(total / CATALOG.RESULTS_PER_PAGE));
    }

    return 1;
}

/**
 * CatalogWalker fetches catalog pages through a fixed-size worker pool.
 * A page that fails after the network retries contributes no links;
 * the walk itself never fails because of one page.
 */
export class CatalogWalker {
    private readonly baseUrl: string;
    private readonly maxWorkers: number;
    private failures: PageFailure[] = [];

    constructor(
        private readonly network: NetworkManager,
        options?: CatalogOptions
    ) {
        this.baseUrl = options?.baseUrl ?? BASE_URL;
        this.maxWorkers = options?.maxWorkers ?? CATALOG.MAX_WORKERS;
    }

    pageUrl(page: number): string {
        return `${this.baseUrl}/series/page/${page}/`;
    }

    /**
     * Number of catalog pages, read from page 1
     *
     * @throws NetworkError if page 1 cannot be fetched
     */
    async getTotalPages(): Promise<number> {
        const $ = await this.network.fetchDocument(this.pageUrl(1));
        return parseTotalPages($);
    }

    /**
     * Manga URLs listed on one catalog page, without duplicates, in page order
     *
     * @throws NetworkError if the page cannot be fetched
     */
    async getLinks(page: number): Promise<string[]> {
        const url = this.pageUrl(page);
        const $ = await this.network.fetchDocument(url);

        const links = new Set<string>();
        for (const node of $(SELECTORS.catalog.link).toArray()) {
            const href = resolveUrl(url, $(node).attr('href') ?? '');
            if (href) {
                links.add(href);
            }
        }
        return [...links];
    }

    /**
     * Fetches pages 1..pagesToFetch and merges their links once every page
     * has settled. Failed pages are logged and available from getFailures().
     */
    async start(pagesToFetch: number, onProgress?: ProgressCallback): Promise<Set<string>> {
        const pages = Array.from({ length: Math.max(0, Math.floor(pagesToFetch)) }, (_, i) => i + 1);
        let done = 0;

        const settled = await runPool(pages, this.maxWorkers, async (page) => {
            try {
                return await this.getLinks(page);
            } finally {
                done++;
                onProgress?.(done, pages.length);
            }
        });

        const links = new Set<string>();
        const failures: PageFailure[] = [];
        settled.forEach((result, index) => {
            const page = index + 1;
            if (result.ok) {
                result.value.forEach((link) => links.add(link));
            } else {
                logger.error(`Error fetching catalog page ${page}: ${result.error.message}`);
                failures.push({ page, error: result.error });
            }
        });

        this.failures = failures;
        logger.debug(`Catalog walk: ${links.size} links from ${pages.length - failures.length}/${pages.length} pages`);
        return links;
    }

    /**
     * Pages that failed during the last start()
     */
    getFailures(): readonly PageFailure[] {
        return this.failures;
    }
}
