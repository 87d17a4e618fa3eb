/**
 * Tests for SearchScraper
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SearchScraper, countPages } from '../../src/services/search';
import type { ParseWarning } from '../../src/types';
import { fakeSite, fixture, testNetwork } from '../helpers/fake-site';

describe('SearchScraper', () => {
    describe('countPages', () => {
        it('is the smallest page count that holds every result', () => {
            fc.assert(
                fc.property(fc.integer({ min: 0, max: 10000 }), (count) => {
                    const pages = countPages(count);
                    expect(pages * 12).toBeGreaterThanOrEqual(count);
                    expect(Math.max(0, pages - 1) * 12).toBeLessThan(Math.max(count, 1));
                }),
                { numRuns: 200 }
            );
        });

        it('gives zero pages for zero results', () => {
            expect(countPages(0)).toBe(0);
            expect(countPages(12)).toBe(1);
            expect(countPages(13)).toBe(2);
        });
    });

    it('extracts every result of the first page', async () => {
        const site = fakeSite({ 'https://azoramoon.com/': await fixture('search.html') });
        const { network } = testNetwork(site.fetch);
        const warnings: ParseWarning[] = [];

        const page = await new SearchScraper(network, { onWarning: (w) => warnings.push(w) }).search('moon');

        expect(site.calls).toEqual(['https://azoramoon.com/?s=moon&post_type=wp-manga']);
        expect(page).toEqual({
            query: 'moon',
            page: 1,
            resultCount: 14,
            pages: 2,
            results: [
                {
                    url: 'https://azoramoon.com/series/moonlit-garden/',
                    title: 'Moonlit Garden',
                    poster: 'https://azoramoon.com/wp-content/uploads/moonlit-garden-193x278.jpg',
                    genres: ['Fantasy', 'Romance'],
                    status: 'OnGoing',
                    rate: '4.5',
                    latestChapter: {
                        url: 'https://azoramoon.com/series/moonlit-garden/chapter-5/',
                        title: 'Chapter 5',
                    },
                },
                {
                    url: 'https://azoramoon.com/series/moon-courier/',
                    title: 'Moon Courier',
                    poster: 'https://azoramoon.com/wp-content/uploads/moon-courier-193x278.jpg',
                    genres: [],
                    status: 'Completed',
                    rate: '',
                    latestChapter: { url: '', title: '' },
                },
            ],
        });
        expect(warnings.map((w) => w.field)).toEqual(['genres', 'rate', 'latestChapter.url', 'latestChapter.title']);
        expect(warnings[0]).toEqual({
            scope: 'search',
            field: 'genres',
            selector: 'div.mg_genres div.summary-content a',
            url: 'https://azoramoon.com/',
        });
        expect(warnings[1]).toEqual({
            scope: 'search',
            field: 'rate',
            selector: 'span.total_votes',
            url: 'https://azoramoon.com/',
        });
    });

    it('requests later pages under /page/n/', async () => {
        const site = fakeSite({ 'https://azoramoon.com/page/2/': await fixture('search-empty.html') });
        const { network } = testNetwork(site.fetch);

        const page = await new SearchScraper(network).search('moon', 2);

        expect(site.calls).toEqual(['https://azoramoon.com/page/2/?s=moon&post_type=wp-manga']);
        expect(page.page).toBe(2);
    });

    it('returns an empty page for a query without matches', async () => {
        const site = fakeSite({ 'https://azoramoon.com/': await fixture('search-empty.html') });
        const { network } = testNetwork(site.fetch);

        const page = await new SearchScraper(network).search('zzz');

        expect(page).toEqual({ query: 'zzz', page: 1, resultCount: 0, pages: 0, results: [] });
    });

    it('treats a page without a result counter as zero results', async () => {
        const site = fakeSite({ 'https://azoramoon.com/': '<html><body><p>Nothing</p></body></html>' });
        const { network } = testNetwork(site.fetch);
        const warnings: ParseWarning[] = [];

        const page = await new SearchScraper(network, { onWarning: (w) => warnings.push(w) }).search('x');

        expect(page.resultCount).toBe(0);
        expect(page.pages).toBe(0);
        expect(warnings.map((w) => w.field)).toEqual(['resultCount']);
    });

    it('rejects a page number below one', async () => {
        const { network } = testNetwork(fakeSite({}).fetch);

        await expect(new SearchScraper(network).search('moon', 0)).rejects.toThrow(RangeError);
    });
});
