import { ParlorError } from "../errors";

/**
 * Lock abstraction used for race-sensitive operations.
 *
 * `withLock` holds every key in `keys` for the duration of `fn`. Implementations
 * must acquire multiple keys in a consistent order so two callers locking
 * overlapping key sets cannot deadlock.
 */
export interface LockProvider {
    withLock<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T>;
}

export type KeyedLockProviderOptions = {
    acquireTimeoutMs?: number; // default 5000
};

type Waiter = {
    grant: () => void;
    granted: boolean;
};

type KeyState = {
    held: boolean;
    queue: Waiter[];
};

const DEFAULT_ACQUIRE_TIMEOUT_MS = 5000;

/**
 * In-process FIFO mutex per key. Unrelated keys never contend.
 */
export class KeyedLockProvider implements LockProvider {
    private readonly keys = new Map<string, KeyState>();
    private readonly acquireTimeoutMs: number;

    constructor(options?: KeyedLockProviderOptions) {
        this.acquireTimeoutMs = options?.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    }

    async withLock<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
        const ordered = [...new Set(keys)].sort();
        const acquired: string[] = [];

        try {
            for (const key of ordered) {
                await this.acquire(key);
                acquired.push(key);
            }
            return await fn();
        } finally {
            for (const key of acquired.reverse()) {
                this.release(key);
            }
        }
    }

    /**
     * Whether any caller currently holds `key`.
     */
    isLocked(key: string): boolean {
        return this.keys.get(key)?.held ?? false;
    }

    private acquire(key: string): Promise<void> {
        let state = this.keys.get(key);
        if (!state) {
            state = { held: false, queue: [] };
            this.keys.set(key, state);
        }

        if (!state.held) {
            state.held = true;
            return Promise.resolve();
        }

        const queued = state;
        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = {
                granted: false,
                grant: () => {
                    waiter.granted = true;
                    clearTimeout(timer);
                    resolve();
                },
            };

            const timer = setTimeout(() => {
                if (waiter.granted) return;
                const idx = queued.queue.indexOf(waiter);
                if (idx >= 0) queued.queue.splice(idx, 1);
                reject(
                    new ParlorError("LOCK_TIMEOUT", "Failed to acquire lock within timeout.", undefined, {
                        lockKey: key,
                        acquireTimeoutMs: this.acquireTimeoutMs,
                    })
                );
            }, this.acquireTimeoutMs);

            queued.queue.push(waiter);
        });
    }

    private release(key: string): void {
        const state = this.keys.get(key);
        if (!state) return;

        const next = state.queue.shift();
        if (next) {
            // ownership passes directly to the next waiter
            next.grant();
            return;
        }

        state.held = false;
        this.keys.delete(key);
    }
}
