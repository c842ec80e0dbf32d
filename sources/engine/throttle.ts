/**
 * Self-throttling for transport calls
 *
 * Keeps a minimum delay between consecutive operations, grows the delay
 * exponentially on failure and shrinks it gradually on success.
 */

import type { BackoffConfig } from './config';
import { SyncError, throwIfAborted } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout-based sleep that rejects with `cancelled` when the signal aborts
 */
export const defaultSleep: Sleep = (ms, signal) => {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new SyncError('cancelled', 'Operation was cancelled'));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new SyncError('cancelled', 'Operation was cancelled'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
};

export interface ThrottleOptions {
    minDelayMs: number;
    backoff: BackoffConfig;
    sleep?: Sleep;
    now?: () => number;
}

export class Throttle {
    private readonly minDelayMs: number;
    private readonly backoff: BackoffConfig;
    private readonly sleep: Sleep;
    private readonly now: () => number;
    private currentDelayMs: number;
    private lastOperationAt: number | null = null;

    constructor(options: ThrottleOptions) {
        this.minDelayMs = options.minDelayMs;
        this.backoff = options.backoff;
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? Date.now;
        this.currentDelayMs = options.minDelayMs;
    }

    /**
     * Delay that will separate the next operation from the previous one
     */
    get delayMs(): number {
        return this.currentDelayMs;
    }

    /**
     * Wait until the next operation may start
     */
    async wait(signal?: AbortSignal): Promise<void> {
        throwIfAborted(signal);
        if (this.lastOperationAt !== null) {
            const elapsed = this.now() - this.lastOperationAt;
            const remaining = this.currentDelayMs - elapsed;
            if (remaining > 0) {
                await this.sleep(remaining, signal);
            }
        }
        this.lastOperationAt = this.now();
    }

    /**
     * Grow the delay after a failure
     * A larger server-suggested delay takes precedence
     */
    recordFailure(retryAfterMs?: number): number {
        const grown = this.currentDelayMs <= this.minDelayMs
            ? Math.max(this.backoff.initialDelayMs, this.minDelayMs)
            : this.currentDelayMs * this.backoff.multiplier;
        let next = Math.min(grown, this.backoff.maxDelayMs);
        if (retryAfterMs !== undefined && retryAfterMs > next) {
            next = retryAfterMs;
        }
        this.currentDelayMs = Math.max(next, this.minDelayMs);
        return this.currentDelayMs;
    }

    /**
     * Shrink the delay after a success, down to the minimum
     */
    recordSuccess(): void {
        if (this.currentDelayMs <= this.minDelayMs) return;
        const shrunk = Math.floor(this.currentDelayMs / this.backoff.recoveryFactor);
        this.currentDelayMs = Math.max(shrunk, this.minDelayMs);
    }
}
