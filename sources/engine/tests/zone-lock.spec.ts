/**
 * Tests for per-zone mutual exclusion
 */

import { describe, it, expect } from 'vitest';
import { ZoneLock } from '../zone-lock';

function deferred() {
    let resolve: () => void = () => {};
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('ZoneLock', () => {
    it('should run tasks on the same zone one at a time', async () => {
        const lock = new ZoneLock();
        const events: string[] = [];
        const gate = deferred();

        const first = lock.run(['notes'], async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
        });
        const second = lock.run(['notes'], async () => {
            events.push('second:start');
        });

        await new Promise(resolve => setTimeout(resolve, 0));
        expect(events).toEqual(['first:start']);
        expect(lock.isLocked('notes')).toBe(true);

        gate.resolve();
        await Promise.all([first, second]);

        expect(events).toEqual(['first:start', 'first:end', 'second:start']);
        expect(lock.isLocked('notes')).toBe(false);
    });

    it('should let different zones run concurrently', async () => {
        const lock = new ZoneLock();
        const gate = deferred();
        let otherRan = false;

        const blocked = lock.run(['notes'], () => gate.promise);
        await lock.run(['inbox'], async () => {
            otherRan = true;
        });

        expect(otherRan).toBe(true);
        gate.resolve();
        await blocked;
    });

    it('should release the lock when a task throws', async () => {
        const lock = new ZoneLock();

        await expect(lock.run(['notes'], async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(lock.run(['notes'], async () => 'next')).resolves.toBe('next');
        expect(lock.isLocked('notes')).toBe(false);
    });

    it('should lock overlapping zone sets without deadlock', async () => {
        const lock = new ZoneLock();
        const results = await Promise.all([
            lock.run(['a', 'b'], async () => 1),
            lock.run(['b', 'a'], async () => 2),
        ]);

        expect(results).toEqual([1, 2]);
    });
});
