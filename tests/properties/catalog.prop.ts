/**
 * Tests for CatalogWalker
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import * as cheerio from 'cheerio';

import { CatalogWalker, pageFromHref, parseTotalPages } from '../../src/services/catalog';
import { fakeSite, fixture, html, testNetwork, type Handler } from '../helpers/fake-site';

const seriesUrl = (n: number) => `https://azoramoon.com/series/m${n}/`;
const pageUrl = (page: number) => `https://azoramoon.com/series/page/${page}/`;

function listing(ids: readonly number[]): string {
    return ids.map((n) => `<h3 class="h5"><a href="${seriesUrl(n)}">M${n}</a></h3>`).join('\n');
}

describe('CatalogWalker', () => {
    describe('parseTotalPages', () => {
        it('reads the last page link', async () => {
            expect(parseTotalPages(cheerio.load(await fixture('catalog-page.html')))).toBe(4);
        });

        it('falls back to the highest numbered page link', () => {
            const $ = cheerio.load(`
                <div class="wp-pagenavi">
                    <span class="current">1</span>
                    <a href="${pageUrl(2)}">2</a>
                    <a href="${pageUrl(7)}">7</a>
                </div>`);
            expect(parseTotalPages($)).toBe(7);
        });

        it('reads page numbers from link text when hrefs carry none', () => {
            const $ = cheerio.load('<div class="nav-links"><a class="page-numbers" href="#">3</a></div>');
            expect(parseTotalPages($)).toBe(3);
        });

        it('falls back to the result counter', () => {
            expect(parseTotalPages(cheerio.load('<div class="h4">42 results</div>'))).toBe(4);
        });

        it('assumes a single page without any indicator', () => {
            expect(parseTotalPages(cheerio.load('<p>empty</p>'))).toBe(1);
        });
    });

    describe('pageFromHref', () => {
        it('reads /page/n/ and ?paged=n links', () => {
            expect(pageFromHref(pageUrl(12))).toBe(12);
            expect(pageFromHref('https://azoramoon.com/series/?paged=5')).toBe(5);
            expect(pageFromHref('#')).toBeUndefined();
        });
    });

    it('reads the total page count from page 1', async () => {
        const site = fakeSite({ [pageUrl(1)]: await fixture('catalog-page.html') });
        const { network } = testNetwork(site.fetch);

        expect(await new CatalogWalker(network).getTotalPages()).toBe(4);
        expect(site.calls).toEqual([pageUrl(1)]);
    });

    it('lists the links of a page once each, resolved and in order', async () => {
        const site = fakeSite({ [pageUrl(1)]: await fixture('catalog-page.html') });
        const { network } = testNetwork(site.fetch);

        expect(await new CatalogWalker(network).getLinks(1)).toEqual([
            'https://azoramoon.com/series/moonlit-garden/',
            'https://azoramoon.com/series/moon-courier/',
        ]);
    });

    it('merges the links of every successful page into one set', async () => {
        await fc.assert(
            fc.asyncProperty(
                fc.array(
                    fc.record({
                        ids: fc.array(fc.integer({ min: 0, max: 9 }), { maxLength: 6 }),
                        fails: fc.boolean(),
                    }),
                    { minLength: 1, maxLength: 8 }
                ),
                fc.integer({ min: 1, max: 4 }),
                async (pages, maxWorkers) => {
                    const routes: Record<string, Handler> = {};
                    pages.forEach((page, index) => {
                        routes[pageUrl(index + 1)] = page.fails
                            ? () => new Response('Bad Gateway', { status: 502 })
                            : listing(page.ids);
                    });
                    const { network } = testNetwork(fakeSite(routes).fetch);
                    const walker = new CatalogWalker(network, { maxWorkers });

                    const links = await walker.start(pages.length);

                    const expected = new Set(pages.filter((p) => !p.fails).flatMap((p) => p.ids.map(seriesUrl)));
                    expect([...links].sort()).toEqual([...expected].sort());
                    expect(walker.getFailures().map((f) => f.page)).toEqual(
                        pages.flatMap((p, index) => (p.fails ? [index + 1] : []))
                    );
                }
            ),
            { numRuns: 40 }
        );
    });

    it('keeps overlapping links once and drops failed pages', async () => {
        const site = fakeSite({
            [pageUrl(1)]: listing([1, 2, 3]),
            [pageUrl(2)]: listing([3, 4]),
            [pageUrl(4)]: listing([5]),
        });
        const { network, sleeps } = testNetwork(site.fetch);
        const walker = new CatalogWalker(network);
        const progress: number[] = [];

        const links = await walker.start(4, (current) => progress.push(current));

        expect(links).toEqual(new Set([1, 2, 3, 4, 5].map(seriesUrl)));
        expect(walker.getFailures()).toHaveLength(1);
        expect(walker.getFailures()[0]).toMatchObject({ page: 3, error: { name: 'NetworkError', status: 404 } });
        expect(progress).toEqual([1, 2, 3, 4]);
        expect(sleeps).toEqual([]);
    });

    it('never fetches more pages at once than the worker limit', async () => {
        let active = 0;
        let peak = 0;
        const routes: Record<string, Handler> = {};
        for (let page = 1; page <= 9; page++) {
            routes[pageUrl(page)] = async () => {
                active++;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setTimeout(resolve, 2));
                active--;
                return html(listing([page]));
            };
        }
        const { network } = testNetwork(fakeSite(routes).fetch);

        const links = await new CatalogWalker(network, { maxWorkers: 3 }).start(9);

        expect(links.size).toBe(9);
        expect(peak).toBe(3);
    });

    it('finishes the walk when page bodies stall', async () => {
        const stalled = () =>
            new Response(
                new ReadableStream<Uint8Array>({
                    start(controller) {
                        controller.enqueue(new TextEncoder().encode('<h3>'));
                    },
                })
            );
        const { network } = testNetwork(fakeSite({ [pageUrl(1)]: stalled, [pageUrl(2)]: stalled }).fetch, {
            timeout: 20,
            maxRetries: 1,
        });
        const walker = new CatalogWalker(network);

        const links = await walker.start(2);

        expect(links).toEqual(new Set());
        expect(walker.getFailures().map((f) => f.page)).toEqual([1, 2]);
        expect(walker.getFailures()[0]?.error.message).toBe(
            `Failed to fetch ${pageUrl(1)} after 1 attempt: timed out after 20ms`
        );
    });

    it('returns an empty set for zero pages', async () => {
        const site = fakeSite({});
        const { network } = testNetwork(site.fetch);

        expect(await new CatalogWalker(network).start(0)).toEqual(new Set());
        expect(site.calls).toEqual([]);
    });
});
