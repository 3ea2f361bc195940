/**
 * src/utils/concurrency.ts
 *
 * A small FIFO task pool: at most `concurrency` tasks run at once, the rest
 * wait in a queue and are pumped in as slots free up. Used for detail-page
 * fetches within one listing page and for aggregation API calls per term.
 */

import { log } from 'crawlee';
import type { DelayRange } from '../config/settings.js';

type PoolTask = () => Promise<void>;

export interface TaskPool {
    /** Queues a task; the returned promise settles with the task's own result. */
    run<T>(task: () => Promise<T>): Promise<T>;
}

export function createTaskPool(concurrency: number, label = 'TaskPool'): TaskPool {
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
        throw new RangeError(`[${label}] concurrency must be a positive integer, got ${concurrency}`);
    }

    const queuedTasks: PoolTask[] = [];
    let activeTasks = 0;

    function pumpQueue(): void {
        while (activeTasks < concurrency && queuedTasks.length > 0) {
            const task = queuedTasks.shift();
            if (!task) break;

            activeTasks++;

            Promise.resolve()
                .then(task)
                .finally(() => {
                    activeTasks = Math.max(0, activeTasks - 1);
                    pumpQueue();
                })
                .catch((err: unknown) => {
                    log.error(`[${label}] Pool bookkeeping failed: ${err instanceof Error ? err.message : String(err)}`);
                });
        }
    }

    return {
        run<T>(task: () => Promise<T>): Promise<T> {
            return new Promise<T>((resolve, reject) => {
                // The wrapper never rejects, even when `task` throws before returning
                // a promise; the caller sees the task's outcome.
                queuedTasks.push(() => Promise.resolve().then(task).then(resolve, reject));
                pumpQueue();
            });
        },
    };
}

/**
 * Runs `worker` over every item with at most `concurrency` in flight.
 * Results come back in input order as settled outcomes; one rejection never
 * stops its siblings.
 */
export async function mapSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
    const pool = createTaskPool(concurrency);
    return Promise.allSettled(items.map((item, index) => pool.run(() => worker(item, index))));
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Sleeps for a random duration within the range. A [0, 0] range returns immediately. */
export async function randomDelay([min, max]: DelayRange): Promise<void> {
    if (max <= 0) return;
    const ms = min + Math.floor(Math.random() * (max - min + 1));
    await sleep(ms);
}
