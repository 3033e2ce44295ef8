import { chunk, delay, mapWithConcurrency } from '../../../src/application/pipelines/Concurrency';

describe('Concurrency', () => {
    describe('mapWithConcurrency', () => {
        it('should keep results in input order', async () => {
            const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
                await delay(ms);
                return index;
            });

            expect(results).toEqual([0, 1, 2]);
        });

        it('should never run more than the limit at once', async () => {
            let running = 0;
            let peak = 0;

            await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
                running++;
                peak = Math.max(peak, running);
                await delay(5);
                running--;
            });

            expect(peak).toBe(3);
        });

        it('should reject with the first failure and start no further items', async () => {
            const started: number[] = [];

            await expect(
                mapWithConcurrency([1, 2, 3, 4, 5], 1, async (item) => {
                    started.push(item);
                    if (item === 2) {
                        throw new Error('panel 2 failed');
                    }
                    return item;
                })
            ).rejects.toThrow('panel 2 failed');
            expect(started).toEqual([1, 2]);
        });

        it('should handle an empty list', async () => {
            await expect(mapWithConcurrency([], 4, async (item) => item)).resolves.toEqual([]);
        });
    });

    describe('chunk', () => {
        it('should split into consecutive batches', () => {
            expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        });

        it('should treat sizes below one as one', () => {
            expect(chunk([1, 2], 0)).toEqual([[1], [2]]);
        });
    });
});
