import { JobCancelledError } from './errors';

export interface PoolOptions {
    signal?: AbortSignal;
    /** Called after each item settles successfully, in completion order */
    onSettled?: (done: number, total: number) => void;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results come back in
 * input order regardless of completion order. Scheduling stops on the first failure or
 * on cancellation; in-flight work is awaited before the error propagates.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
    opts: PoolOptions = {}
): Promise<R[]> {
    const limit = Math.max(1, Math.floor(concurrency) || 1);
    const results: R[] = new Array(items.length);
    const active: Promise<void>[] = [];
    const state: { failure?: { error: unknown } } = {};
    let done = 0;

    async function runOne(idx: number) {
        try {
            results[idx] = await worker(items[idx], idx);
            done += 1;
            opts.onSettled?.(done, items.length);
        } catch (e) {
            if (!state.failure) state.failure = { error: e };
        }
    }

    let idx = 0;
    while (idx < items.length && !state.failure) {
        while (active.length < limit && idx < items.length && !state.failure) {
            if (opts.signal?.aborted) {
                state.failure = { error: new JobCancelledError() };
                break;
            }
            const p: Promise<void> = runOne(idx).finally(() => {
                const pos = active.indexOf(p);
                if (pos >= 0) active.splice(pos, 1);
            });
            active.push(p);
            idx++;
        }
        if (active.length) await Promise.race(active);
    }
    await Promise.all(active);

    if (state.failure) throw state.failure.error;
    return results;
}
