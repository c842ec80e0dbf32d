/**
 * Pending change queue
 *
 * Durable ledger of local mutations that the server has not confirmed yet.
 * Entries are keyed by record identity: a newer intent for the same record
 * replaces the older one. Entries leave the queue only through `confirm`,
 * after the transport has reported success.
 */

import { createChangeId, recordIdOf, recordKey } from './helpers';
import { parsePendingChanges } from './schema';
import type {
    ChangeTag,
    PendingChange,
    PendingDelete,
    PendingSave,
    RecordId,
    SyncRecord,
    ZoneName,
} from './types';

export class PendingChangeQueue {
    // Insertion order is enqueue order
    private byRecord = new Map<string, PendingChange>();

    constructor(entries: readonly PendingChange[] = []) {
        for (const entry of entries) {
            this.byRecord.set(recordKey(entry.recordId), entry);
        }
    }

    /**
     * Restore a queue from `toJSON()` output
     */
    static fromJSON(data: unknown): PendingChangeQueue {
        return new PendingChangeQueue(parsePendingChanges(data));
    }

    get size(): number {
        return this.byRecord.size;
    }

    get entries(): ReadonlyArray<PendingChange> {
        return Array.from(this.byRecord.values());
    }

    has(id: RecordId): boolean {
        return this.byRecord.has(recordKey(id));
    }

    get(id: RecordId): PendingChange | undefined {
        return this.byRecord.get(recordKey(id));
    }

    /**
     * Queue a save
     * Replaces any earlier intent for the record; changed fields accumulate
     * across consecutive saves so a merge still sees every local edit.
     */
    enqueueSave(record: SyncRecord, changedFields: readonly string[] = Object.keys(record.fields)): PendingSave {
        const key = recordKey(recordIdOf(record));
        const previous = this.byRecord.get(key);
        const fields = new Set(changedFields);
        if (previous?.kind === 'save') {
            for (const name of previous.changedFields) {
                fields.add(name);
            }
        }
        const entry: PendingSave = {
            id: createChangeId(),
            kind: 'save',
            recordId: recordIdOf(record),
            record,
            changedFields: Array.from(fields),
            createdAt: Date.now(),
            attempts: 0,
        };
        this.byRecord.delete(key);
        this.byRecord.set(key, entry);
        return entry;
    }

    /**
     * Queue a delete
     * A record the server has never seen (no change tag, save never sent)
     * only needs its queued save dropped; returns undefined in that case.
     */
    enqueueDelete(id: RecordId, changeTag: ChangeTag | null): PendingDelete | undefined {
        const key = recordKey(id);
        const previous = this.byRecord.get(key);
        if (changeTag === null && previous?.kind === 'save' && previous.attempts === 0) {
            this.byRecord.delete(key);
            return undefined;
        }
        const entry: PendingDelete = {
            id: createChangeId(),
            kind: 'delete',
            recordId: { zone: id.zone, recordName: id.recordName },
            changeTag,
            createdAt: Date.now(),
            attempts: 0,
        };
        this.byRecord.delete(key);
        this.byRecord.set(key, entry);
        return entry;
    }

    /**
     * Oldest entries first, at most `limit`
     */
    peekBatch(limit: number, filter?: (entry: PendingChange) => boolean): PendingChange[] {
        const batch: PendingChange[] = [];
        for (const entry of this.byRecord.values()) {
            if (batch.length >= limit) break;
            if (filter && !filter(entry)) continue;
            batch.push(entry);
        }
        return batch;
    }

    /**
     * Remove confirmed entries
     * Only the exact entry is removed: a newer intent queued for the same
     * record while the old one was in flight stays.
     */
    confirm(changeIds: Iterable<string>): PendingChange[] {
        const ids = new Set(changeIds);
        const removed: PendingChange[] = [];
        for (const [key, entry] of this.byRecord) {
            if (ids.has(entry.id)) {
                this.byRecord.delete(key);
                removed.push(entry);
            }
        }
        return removed;
    }

    /**
     * Swap in an updated version of an entry, keeping its queue position
     * Ignored when the record's entry has since been replaced by a newer intent.
     */
    replace(entry: PendingChange): boolean {
        const key = recordKey(entry.recordId);
        const current = this.byRecord.get(key);
        if (!current || current.id !== entry.id) {
            return false;
        }
        this.byRecord.set(key, entry);
        return true;
    }

    /**
     * Move a queued save of the record onto a newly confirmed change tag
     * Used when an older write of ours was confirmed while a newer one waited.
     */
    rebaseOnto(record: SyncRecord, exceptChangeId: string): void {
        const key = recordKey(recordIdOf(record));
        const current = this.byRecord.get(key);
        if (!current || current.id === exceptChangeId) return;
        if (current.kind === 'save') {
            this.byRecord.set(key, { ...current, record: { ...current.record, changeTag: record.changeTag } });
        } else {
            this.byRecord.set(key, { ...current, changeTag: record.changeTag });
        }
    }

    markAttempt(changeIds: Iterable<string>): void {
        const ids = new Set(changeIds);
        for (const [key, entry] of this.byRecord) {
            if (ids.has(entry.id)) {
                this.byRecord.set(key, { ...entry, attempts: entry.attempts + 1 });
            }
        }
    }

    /**
     * Discard every entry of a zone
     */
    dropZone(zone: ZoneName): PendingChange[] {
        const dropped: PendingChange[] = [];
        for (const [key, entry] of this.byRecord) {
            if (entry.recordId.zone === zone) {
                this.byRecord.delete(key);
                dropped.push(entry);
            }
        }
        return dropped;
    }

    clone(): PendingChangeQueue {
        return new PendingChangeQueue(this.entries);
    }

    toJSON(): PendingChange[] {
        return Array.from(this.byRecord.values());
    }
}
