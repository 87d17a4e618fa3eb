/**
 * Manga Details Scraper for manga-harvester
 * Extracts metadata and the chapter list from a manga page
 */

import type { CheerioAPI } from 'cheerio';

import { SELECTORS } from '../config/constants';
import { FieldReader } from '../utils/dom';
import { NetworkManager } from './network';
import type { ChapterDetailed, MangaDetails, WarningHandler } from '../types';

export interface DetailsOptions {
    onWarning?: WarningHandler;
}

/**
 * Parses the chapter rows of a manga page.
 * The site lists the newest chapter first; rows are reversed so that
 * orderNo 1 is the oldest chapter. Rows without a link are skipped.
 */
export function parseChapters($: CheerioAPI, reader: FieldReader): ChapterDetailed[] {
    const { chapterRow, chapterLink } = SELECTORS.details;
    const chapters: ChapterDetailed[] = [];

    const rows = $(chapterRow).toArray().reverse();
    for (const row of rows) {
        const node = $(row);
        const url = reader.attr(node, chapterLink, ['href']);
        if (!url) {
            reader.warn('chapter.url', `${chapterRow} ${chapterLink}`);
            continue;
        }
        chapters.push({
            orderNo: chapters.length + 1,
            url: reader.link(node, 'chapter.url', chapterLink),
            title: reader.text(node, 'chapter.title', chapterLink),
        });
    }

    return chapters;
}

/**
 * MangaDetailsScraper exposes each field of a manga page.
 * The page is fetched on first access and kept for the lifetime of the
 * scraper, so reading several fields costs a single request.
 */
export class MangaDetailsScraper {
    private page: Promise<CheerioAPI> | null = null;
    private readonly reader: FieldReader;

    constructor(
        readonly url: string,
        private readonly network: NetworkManager,
        options?: DetailsOptions
    ) {
        this.reader = new FieldReader('details', url, options?.onWarning);
    }

    /**
     * Fetches the page once; later and concurrent calls share the result.
     * A failed fetch is not cached, so the next call tries again.
     *
     * @throws NetworkError if the page cannot be fetched
     */
    loadPage(): Promise<CheerioAPI> {
        if (!this.page) {
            this.page = this.network.fetchDocument(this.url).catch((error: unknown) => {
                this.page = null;
                throw error;
            });
        }
        return this.page;
    }

    async getTitle(): Promise<string> {
        const $ = await this.loadPage();
        return this.reader.text($.root(), 'title', SELECTORS.details.title);
    }

    async getPoster(): Promise<string> {
        const $ = await this.loadPage();
        return this.reader.link($.root(), 'poster', SELECTORS.details.poster, ['src', 'data-src']);
    }

    async getDescription(): Promise<string> {
        const $ = await this.loadPage();
        return this.reader.text($.root(), 'description', SELECTORS.details.description);
    }

    async getGenres(): Promise<string[]> {
        const $ = await this.loadPage();
        return this.reader.list($.root(), 'genres', SELECTORS.details.genres);
    }

    async getStatus(): Promise<string> {
        const $ = await this.loadPage();
        return this.reader.text($.root(), 'status', SELECTORS.details.status);
    }

    async getRate(): Promise<string> {
        const $ = await this.loadPage();
        return this.reader.text($.root(), 'rate', SELECTORS.details.rate);
    }

    /**
     * Chapters in ascending order, oldest first
     */
    async getChapters(): Promise<ChapterDetailed[]> {
        const $ = await this.loadPage();
        return parseChapters($, this.reader);
    }

    /**
     * All fields as one record
     */
    async getDetails(): Promise<MangaDetails> {
        const [title, poster, description, genres, status, rate, chapters] = await Promise.all([
            this.getTitle(),
            this.getPoster(),
            this.getDescription(),
            this.getGenres(),
            this.getStatus(),
            this.getRate(),
            this.getChapters(),
        ]);

        return { url: this.url, title, poster, description, genres, status, rate, chapters };
    }
}
