/**
 * Maps items through an async function with at most `limit` calls in flight.
 * Results keep the input order. The first failure rejects the whole call and
 * stops workers from picking up further items.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let nextIndex = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
        while (!failed && nextIndex < items.length) {
            const index = nextIndex++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                failed = true;
                throw error;
            }
        }
    };

    const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
}

/**
 * Splits items into consecutive batches of `size`.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    const step = Math.max(1, Math.floor(size));
    for (let i = 0; i < items.length; i += step) {
        batches.push(items.slice(i, i + step));
    }
    return batches;
}

/**
 * Resolves after `ms` milliseconds.
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
