// ─── Semaphore-based concurrency limiter ────────────────────────────────────
// Bounds the number of judgment-service calls in flight.  Algorithmic work
// never goes through here; it is cheap and synchronous.

export interface Limiter {
    run<T>(task: () => Promise<T>): Promise<T>;
    stats(): { activeJobs: number; waitingJobs: number };
}

export function createLimiter(maxConcurrent: number): Limiter {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
        throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    let activeJobs = 0;
    const waitQueue: Array<() => void> = [];

    function acquire(): Promise<void> {
        if (activeJobs < maxConcurrent) {
            activeJobs++;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            waitQueue.push(resolve);
        });
    }

    function release(): void {
        const next = waitQueue.shift();
        if (next) {
            next(); // Don't decrement activeJobs — the next job takes over the slot
        } else {
            activeJobs--;
        }
    }

    return {
        async run<T>(task: () => Promise<T>): Promise<T> {
            await acquire();
            try {
                return await task();
            } finally {
                release();
            }
        },
        stats() {
            return { activeJobs, waitingJobs: waitQueue.length };
        },
    };
}
