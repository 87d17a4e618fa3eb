/**
 * Fixed-size worker pool
 */

export type Settled<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };

/**
 * Runs `worker` over every item with at most `limit` calls in flight.
 *
 * Runners pull the next index from a shared cursor until the items run out.
 * The returned promise resolves once every item has settled, never earlier,
 * and never rejects: each slot of the result holds that item's value or error.
 */
export async function runPool<I, O>(
    items: readonly I[],
    limit: number,
    worker: (item: I, index: number) => Promise<O>
): Promise<Settled<O>[]> {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new RangeError(`Pool limit must be a positive integer, got ${limit}`);
    }

    const results: Settled<O>[] = new Array(items.length);
    let cursor = 0;

    const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
        while (cursor < items.length) {
            const current = cursor;
            const item = items[current];
            cursor += 1;
            try {
                results[current] = { ok: true, value: await worker(item, current) };
            } catch (error) {
                results[current] = {
                    ok: false,
                    error: error instanceof Error ? error : new Error(String(error)),
                };
            }
        }
    });

    await Promise.all(runners);
    return results;
}
