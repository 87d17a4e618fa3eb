/**
 * In-process stand-in for the catalog site
 */

import { readFile } from 'node:fs/promises';

import { NetworkManager } from '../../src/services/network';
import type { FetchLike, NetworkOptions } from '../../src/types';

export type Handler = string | ((url: URL, init: RequestInit) => Response | Promise<Response>);

export interface FakeSite {
    fetch: FetchLike;
    /** Every requested URL, query string included */
    calls: string[];
}

export function html(body: string, status: number = 200): Response {
    return new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });
}

/**
 * Serves routes keyed by origin + pathname; anything else is a 404
 */
export function fakeSite(routes: Record<string, Handler>): FakeSite {
    const calls: string[] = [];
    const fetch: FetchLike = async (url, init) => {
        calls.push(url);
        const parsed = new URL(url);
        const handler = routes[parsed.origin + parsed.pathname];
        if (handler === undefined) {
            return new Response('Not Found', { status: 404, statusText: 'Not Found' });
        }
        return typeof handler === 'string' ? html(handler) : handler(parsed, init);
    };
    return { fetch, calls };
}

/**
 * NetworkManager over a fake fetch that records backoff delays instead of sleeping
 */
export function testNetwork(
    fetch: FetchLike,
    options?: NetworkOptions
): { network: NetworkManager; sleeps: number[] } {
    const sleeps: number[] = [];
    const network = new NetworkManager({
        fetch,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
        ...options,
    });
    return { network, sleeps };
}

export function fixture(name: string): Promise<string> {
    return readFile(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}
