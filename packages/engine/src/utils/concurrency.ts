/**
 * @fileoverview Bounded concurrency helper
 *
 * @module @ontocheck/engine/utils/concurrency
 */

/**
 * Map items through an async function with at most `limit` calls in flight.
 *
 * Results keep input order. The first rejection rejects the whole call;
 * workers stop picking up new items once one has failed.
 *
 * @param items - Inputs
 * @param limit - Maximum concurrent calls (at least 1)
 * @param fn - Async mapper
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
    let next = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
        while (!failed && next < items.length) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            }
            catch (error) {
                failed = true;
                throw error;
            }
        }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results;
}
