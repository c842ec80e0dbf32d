/**
 * Level 3: Pending Change Queue
 * Tests for keyed replacement, confirmation and serialization
 */

import { describe, it, expect } from 'vitest';
import { PendingChangeQueue, SyncError, type SyncRecord } from '../index';

function record(recordName: string, fields: SyncRecord['fields'], changeTag: string | null = null): SyncRecord {
    return { zone: 'notes', recordName, recordType: 'Note', fields, changeTag };
}

describe('PendingChangeQueue', () => {
    describe('enqueueSave()', () => {
        it('should keep one entry per record', () => {
            const queue = new PendingChangeQueue();

            const first = queue.enqueueSave(record('a', { title: 'One' }), ['title']);
            const second = queue.enqueueSave(record('a', { title: 'One', body: 'Two' }), ['body']);

            expect(queue.size).toBe(1);
            expect(queue.has({ zone: 'notes', recordName: 'a' })).toBe(true);
            expect(queue.has({ zone: 'notes', recordName: 'b' })).toBe(false);
            expect(second.id).not.toBe(first.id);
            expect(queue.entries[0]).toBe(second);
        });

        it('should accumulate changed fields across saves', () => {
            const queue = new PendingChangeQueue();

            queue.enqueueSave(record('a', { title: 'One' }), ['title']);
            const entry = queue.enqueueSave(record('a', { title: 'One', body: 'Two' }), ['body']);

            expect([...entry.changedFields].sort()).toEqual(['body', 'title']);
        });

        it('should default changed fields to every field', () => {
            const queue = new PendingChangeQueue();
            const entry = queue.enqueueSave(record('a', { title: 'One', done: false }));

            expect(entry.changedFields).toEqual(['title', 'done']);
        });

        it('should move a re-saved record to the back of the queue', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { n: 1 }));
            queue.enqueueSave(record('b', { n: 1 }));
            queue.enqueueSave(record('a', { n: 2 }));

            expect(queue.entries.map(e => e.recordId.recordName)).toEqual(['b', 'a']);
        });

        it('should keep records whose zone and name only differ by a separator apart', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave({ zone: 'a/b', recordName: 'c', recordType: 'Note', fields: { n: 1 }, changeTag: null });
            queue.enqueueSave({ zone: 'a', recordName: 'b/c', recordType: 'Note', fields: { n: 2 }, changeTag: null });

            expect(queue.size).toBe(2);
            expect(queue.entries.map(e => e.recordId)).toEqual([
                { zone: 'a/b', recordName: 'c' },
                { zone: 'a', recordName: 'b/c' },
            ]);
            expect(queue.get({ zone: 'a/b', recordName: 'c' })?.kind).toBe('save');
            expect(queue.get({ zone: 'a', recordName: 'b/c' })?.kind).toBe('save');
        });
    });

    describe('enqueueDelete()', () => {
        it('should drop an unsent save of a record the server never saw', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { title: 'Draft' }));

            const entry = queue.enqueueDelete({ zone: 'notes', recordName: 'a' }, null);

            expect(entry).toBeUndefined();
            expect(queue.size).toBe(0);
        });

        it('should queue a delete once the save may have reached the server', () => {
            const queue = new PendingChangeQueue();
            const save = queue.enqueueSave(record('a', { title: 'Draft' }));
            queue.markAttempt([save.id]);

            const entry = queue.enqueueDelete({ zone: 'notes', recordName: 'a' }, null);

            expect(entry?.kind).toBe('delete');
            expect(queue.size).toBe(1);
        });

        it('should replace a queued save of a known record', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { title: 'Edit' }, 'tag-1'));

            const entry = queue.enqueueDelete({ zone: 'notes', recordName: 'a' }, 'tag-1');

            expect(entry).toMatchObject({ kind: 'delete', changeTag: 'tag-1' });
            expect(queue.entries).toEqual([entry]);
        });
    });

    describe('confirm()', () => {
        it('should remove only the confirmed entry', () => {
            const queue = new PendingChangeQueue();
            const old = queue.enqueueSave(record('a', { n: 1 }));
            const newer = queue.enqueueSave(record('a', { n: 2 }));

            // The older write was in flight when the newer one replaced it
            expect(queue.confirm([old.id])).toEqual([]);
            expect(queue.entries).toEqual([newer]);

            expect(queue.confirm([newer.id])).toEqual([newer]);
            expect(queue.size).toBe(0);
        });

        it('should ignore unknown IDs', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { n: 1 }));

            expect(queue.confirm(['nope'])).toEqual([]);
            expect(queue.size).toBe(1);
        });
    });

    describe('peekBatch()', () => {
        it('should return the oldest entries up to the limit', () => {
            const queue = new PendingChangeQueue();
            for (const name of ['a', 'b', 'c']) {
                queue.enqueueSave(record(name, { n: 1 }));
            }

            expect(queue.peekBatch(2).map(e => e.recordId.recordName)).toEqual(['a', 'b']);
            expect(queue.size).toBe(3);
        });

        it('should skip filtered entries without counting them', () => {
            const queue = new PendingChangeQueue();
            const a = queue.enqueueSave(record('a', { n: 1 }));
            queue.enqueueSave(record('b', { n: 1 }));
            queue.enqueueSave(record('c', { n: 1 }));

            const batch = queue.peekBatch(2, entry => entry.id !== a.id);
            expect(batch.map(e => e.recordId.recordName)).toEqual(['b', 'c']);
        });
    });

    describe('replace() and rebaseOnto()', () => {
        it('should replace an entry in place', () => {
            const queue = new PendingChangeQueue();
            const a = queue.enqueueSave(record('a', { n: 1 }, 'tag-1'));
            queue.enqueueSave(record('b', { n: 1 }));

            const replaced = queue.replace({ ...a, record: { ...a.record, changeTag: 'tag-2' } });

            expect(replaced).toBe(true);
            expect(queue.entries.map(e => e.recordId.recordName)).toEqual(['a', 'b']);
            const first = queue.entries[0];
            expect(first?.kind === 'save' ? first.record.changeTag : undefined).toBe('tag-2');
        });

        it('should not replace an entry superseded by a newer intent', () => {
            const queue = new PendingChangeQueue();
            const old = queue.enqueueSave(record('a', { n: 1 }));
            queue.enqueueSave(record('a', { n: 2 }));

            expect(queue.replace({ ...old, attempts: 5 })).toBe(false);
        });

        it('should move a newer save onto a confirmed change tag', () => {
            const queue = new PendingChangeQueue();
            const old = queue.enqueueSave(record('a', { n: 1 }));
            const newer = queue.enqueueSave(record('a', { n: 2 }));

            queue.rebaseOnto(record('a', { n: 1 }, 'tag-9'), old.id);

            const entry = queue.get(newer.recordId);
            expect(entry?.id).toBe(newer.id);
            expect(entry?.kind === 'save' ? entry.record.changeTag : undefined).toBe('tag-9');
        });
    });

    describe('dropZone()', () => {
        it('should drop entries of one zone only', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { n: 1 }));
            queue.enqueueSave({ ...record('b', { n: 1 }), zone: 'inbox' });

            const dropped = queue.dropZone('notes');

            expect(dropped.map(e => e.recordId.recordName)).toEqual(['a']);
            expect(queue.entries.map(e => e.recordId.zone)).toEqual(['inbox']);
        });
    });

    describe('Serialization', () => {
        it('should restore from JSON', () => {
            const queue = new PendingChangeQueue();
            queue.enqueueSave(record('a', { title: 'A', file: { type: 'blob', base64: 'AAEC' } }));
            queue.enqueueDelete({ zone: 'notes', recordName: 'b' }, 'tag-b');

            const restored = PendingChangeQueue.fromJSON(JSON.parse(JSON.stringify(queue)));

            expect(restored.entries).toEqual(queue.entries);
        });

        it('should reject malformed entries', () => {
            expect(() => PendingChangeQueue.fromJSON([{ kind: 'save', id: 'x' }])).toThrow(SyncError);
        });
    });
});
