/**
 * Search Scraper for manga-harvester
 * Turns a query into one page of typed search results
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';

import { BASE_URL, SEARCH, SELECTORS } from '../config/constants';
import { FieldReader } from '../utils/dom';
import { parseLeadingInt } from '../utils/text';
import { logger } from '../utils/logger';
import { NetworkManager } from './network';
import type { MangaSearchResult, SearchPage, WarningHandler } from '../types';

export interface SearchOptions {
    baseUrl?: string;
    onWarning?: WarningHandler;
}

/**
 * Number of result pages for a result count; zero results means zero pages
 */
export function countPages(resultCount: number, perPage: number = SEARCH.RESULTS_PER_PAGE): number {
    return Math.ceil(resultCount / perPage);
}

/**
 * SearchScraper fetches and parses the site's search listing.
 * Only the requested page is fetched; `pages` tells the caller how many exist.
 */
export class SearchScraper {
    private readonly baseUrl: string;
    private readonly onWarning?: WarningHandler;

    constructor(
        private readonly network: NetworkManager,
        options?: SearchOptions
    ) {
        this.baseUrl = options?.baseUrl ?? BASE_URL;
        this.onWarning = options?.onWarning;
    }

    /**
     * URL of a search page; page 1 is the site root
     */
    pageUrl(page: number): string {
        return page <= 1 ? `${this.baseUrl}/` : `${this.baseUrl}/page/${page}/`;
    }

    /**
     * Searches the catalog
     *
     * @param query - Free-text query
     * @param page - 1-based result page
     * @throws NetworkError if the page cannot be fetched
     */
    async search(query: string, page: number = 1): Promise<SearchPage> {
        if (!Number.isInteger(page) || page < 1) {
            throw new RangeError(`Search page must be a positive integer, got ${page}`);
        }

        const url = this.pageUrl(page);
        const $ = await this.network.fetchDocument(url, {
            params: { s: query, post_type: SEARCH.POST_TYPE },
        });

        const result = this.parseFromHtml($, url, query, page);
        logger.debug(`Search "${query}" page ${page}: ${result.results.length} of ${result.resultCount} results`);
        return result;
    }

    /**
     * Parses an already loaded search page (useful for testing)
     */
    parseFromHtml($: CheerioAPI, url: string, query: string, page: number = 1): SearchPage {
        const reader = new FieldReader('search', url, this.onWarning);
        const root = $.root();

        const heading = reader.text(root, 'resultCount', SELECTORS.search.count);
        const count = parseLeadingInt(heading);
        if (heading && count === undefined) {
            reader.warn('resultCount', SELECTORS.search.count);
        }
        const resultCount = count ?? 0;

        const results = $(SELECTORS.search.item)
            .toArray()
            .map((node) => this.parseResult($(node), reader));

        return {
            query,
            page,
            resultCount,
            pages: countPages(resultCount),
            results,
        };
    }

    /**
     * Maps one result node to a record; missing parts become empty values
     */
    private parseResult<T extends AnyNode>(node: Cheerio<T>, reader: FieldReader): MangaSearchResult {
        const { link, poster, genres, status, rate, latestChapter } = SELECTORS.search;

        const title =
            reader.attr(node, link, ['title']) || reader.text(node, 'title', link);

        return {
            url: reader.link(node, 'url', link),
            title,
            poster: reader.link(node, 'poster', `${link} ${poster}`, ['src', 'data-src']),
            genres: reader.list(node, 'genres', genres),
            status: reader.text(node, 'status', status),
            rate: reader.text(node, 'rate', rate),
            latestChapter: {
                url: reader.link(node, 'latestChapter.url', latestChapter),
                title: reader.text(node, 'latestChapter.title', latestChapter),
            },
        };
    }
}
