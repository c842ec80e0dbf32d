/**
 * Local store of the last-known server copy
 *
 * All operations are pure: they take a snapshot and return a new one produced
 * with Immer. A page of fetched changes and its change token land in the same
 * snapshot, so they are committed (and persisted) together or not at all.
 */

import { produce, type Draft } from 'immer';
import type {
    ChangeToken,
    RecordId,
    StoreSnapshot,
    SyncRecord,
    ZoneName,
    ZoneSnapshot,
} from './types';

export interface ZoneChanges {
    readonly modified: readonly SyncRecord[];
    readonly deleted: readonly RecordId[];
    readonly token: ChangeToken;
}

export function createEmptySnapshot(): StoreSnapshot {
    return { databaseToken: null, zones: {} };
}

const emptyZone = (): ZoneSnapshot => ({ token: null, records: {} });

function draftZone(draft: Draft<StoreSnapshot>, zone: ZoneName): Draft<ZoneSnapshot> {
    let target = draft.zones[zone];
    if (!target) {
        target = { token: null, records: {} };
        draft.zones[zone] = target;
    }
    return target;
}

/**
 * Remove a record and, recursively, every record naming it as parent
 */
function cascadeDelete(records: Draft<Record<string, SyncRecord>>, recordName: string): void {
    if (!(recordName in records)) return;
    delete records[recordName];
    for (const child of Object.values(records)) {
        if (child.parent === recordName) {
            cascadeDelete(records, child.recordName);
        }
    }
}

/**
 * Apply one page of server changes to a zone and advance its token
 */
export function applyZoneChanges(snapshot: StoreSnapshot, zone: ZoneName, changes: ZoneChanges): StoreSnapshot {
    return produce(snapshot, draft => {
        const target = draftZone(draft, zone);
        for (const record of changes.modified) {
            target.records[record.recordName] = record;
        }
        for (const id of changes.deleted) {
            cascadeDelete(target.records, id.recordName);
        }
        target.token = changes.token;
    });
}

/**
 * Replace a zone's contents with a complete listing from the server
 */
export function replaceZone(snapshot: StoreSnapshot, zone: ZoneName, records: readonly SyncRecord[], token: ChangeToken): StoreSnapshot {
    const byName: Record<string, SyncRecord> = {};
    for (const record of records) {
        byName[record.recordName] = record;
    }
    return produce(snapshot, draft => {
        draft.zones[zone] = { token, records: byName };
    });
}

export function ensureZone(snapshot: StoreSnapshot, zone: ZoneName): StoreSnapshot {
    if (snapshot.zones[zone]) return snapshot;
    return produce(snapshot, draft => {
        draft.zones[zone] = emptyZone();
    });
}

export function removeZone(snapshot: StoreSnapshot, zone: ZoneName): StoreSnapshot {
    if (!snapshot.zones[zone]) return snapshot;
    return produce(snapshot, draft => {
        delete draft.zones[zone];
    });
}

export function setDatabaseToken(snapshot: StoreSnapshot, token: ChangeToken): StoreSnapshot {
    if (snapshot.databaseToken === token) return snapshot;
    return produce(snapshot, draft => {
        draft.databaseToken = token;
    });
}

/**
 * Fold server-confirmed saves into the server copy
 * Leaves zone tokens untouched: confirmed writes do not advance the fetch cursor
 */
export function confirmSaved(snapshot: StoreSnapshot, records: readonly SyncRecord[]): StoreSnapshot {
    if (records.length === 0) return snapshot;
    return produce(snapshot, draft => {
        for (const record of records) {
            const target = draftZone(draft, record.zone);
            target.records[record.recordName] = record;
        }
    });
}

/**
 * Remove server-confirmed deletes (and their children) from the server copy
 */
export function confirmDeleted(snapshot: StoreSnapshot, ids: readonly RecordId[]): StoreSnapshot {
    if (ids.length === 0) return snapshot;
    return produce(snapshot, draft => {
        for (const id of ids) {
            const target = draft.zones[id.zone];
            if (target) {
                cascadeDelete(target.records, id.recordName);
            }
        }
    });
}

export function readRecord(snapshot: StoreSnapshot, id: RecordId): SyncRecord | undefined {
    return snapshot.zones[id.zone]?.records[id.recordName];
}

export function listRecords(snapshot: StoreSnapshot, zone: ZoneName): SyncRecord[] {
    const target = snapshot.zones[zone];
    return target ? Object.values(target.records) : [];
}

export function zoneToken(snapshot: StoreSnapshot, zone: ZoneName): ChangeToken {
    return snapshot.zones[zone]?.token ?? null;
}
