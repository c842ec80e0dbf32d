/**
 * Per-zone mutual exclusion
 *
 * At most one fetch or send runs against a zone at a time; later callers
 * queue behind the current holder in arrival order.
 */

import type { ZoneName } from './types';

export class ZoneLock {
    private tails = new Map<ZoneName, Promise<void>>();

    /**
     * Run `task` while holding the locks of all given zones
     * Zones are locked in sorted order so overlapping callers cannot deadlock
     */
    async run<T>(zones: Iterable<ZoneName>, task: () => Promise<T>): Promise<T> {
        const ordered = Array.from(new Set(zones)).sort();
        const releases: Array<() => void> = [];
        try {
            for (const zone of ordered) {
                releases.push(await this.acquire(zone));
            }
            return await task();
        } finally {
            for (const release of releases.reverse()) {
                release();
            }
        }
    }

    /**
     * Whether any caller currently holds or waits for the zone
     */
    isLocked(zone: ZoneName): boolean {
        return this.tails.has(zone);
    }

    private async acquire(zone: ZoneName): Promise<() => void> {
        const previous = this.tails.get(zone) ?? Promise.resolve();
        let release: () => void = () => {};
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(zone, tail);
        await previous;
        return () => {
            release();
            if (this.tails.get(zone) === tail) {
                this.tails.delete(zone);
            }
        };
    }
}
