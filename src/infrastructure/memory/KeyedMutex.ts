import type { SessionLock } from '../../core/ports/SessionLock.js';

/**
 * FIFO async mutex for one key.
 */
class Mutex {
    private locked = false;
    private readonly waiters: Array<() => void> = [];

    async acquire(): Promise<() => void> {
        if (this.locked) {
            // release() hands the lock straight to us, so no re-check is needed
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        } else {
            this.locked = true;
        }

        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.release();
        };
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
        } else {
            this.locked = false;
        }
    }

    isIdle(): boolean {
        return !this.locked && this.waiters.length === 0;
    }

    get queueLength(): number {
        return this.waiters.length;
    }
}

/**
 * One mutex per key, created on demand and dropped again once idle.
 * Serializes work on the same session inside this process only.
 */
export class KeyedMutex implements SessionLock {
    private readonly mutexes = new Map<string, Mutex>();

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        let mutex = this.mutexes.get(key);
        if (!mutex) {
            mutex = new Mutex();
            this.mutexes.set(key, mutex);
        }

        const release = await mutex.acquire();
        try {
            return await fn();
        } finally {
            release();
            if (mutex.isIdle()) {
                this.mutexes.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.mutexes.has(key);
    }

    /** Callers waiting behind the current holder of `key` */
    getQueueLength(key: string): number {
        return this.mutexes.get(key)?.queueLength ?? 0;
    }

    /** Keys with a holder or waiters */
    get size(): number {
        return this.mutexes.size;
    }
}
