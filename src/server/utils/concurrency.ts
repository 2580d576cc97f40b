/**
 * A concurrency limiter: runs thunks so at most `concurrency` of them are in flight
 */
export interface Limiter {
    run<T>(fn: () => Promise<T>): Promise<T>;
    readonly activeCount: number;
    readonly pendingCount: number;
}

/**
 * pLimit
 *
 * Limits the concurrency of async operations. Queued thunks start in FIFO order.
 *
 * @param concurrency - Max number of concurrent operations
 */
export function pLimit(concurrency: number): Limiter {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    const run = async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };

    return {
        run,
        get activeCount() {
            return activeCount;
        },
        get pendingCount() {
            return queue.length;
        },
    };
}

/**
 * Map items through an async function with bounded concurrency.
 * The output array lines up with the input array whatever order the calls finish in.
 *
 * @param items - Items to process
 * @param limit - Maximum number of concurrent operations
 * @param fn - Async function to process each item
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const limiter = pLimit(limit);
    const results = new Array<R>(items.length);
    await Promise.all(
        items.map((item, index) =>
            limiter.run(async () => {
                results[index] = await fn(item, index);
            })
        )
    );
    return results;
}
