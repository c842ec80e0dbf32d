/**
 * Transport contract between the engine and a remote record service
 *
 * Whole-request failures reject with a SyncError; per-item failures of a
 * modify request are reported in its result map and never reject the request.
 */

import type { SyncError } from './errors';
import type { ChangeToken, PendingDelete, PendingSave, RecordId, SyncRecord, ZoneName } from './types';

export interface DatabaseChanges {
    readonly changedZones: readonly ZoneName[];
    readonly deletedZones: readonly ZoneName[];
    readonly token: ChangeToken;
}

export interface ZoneChangesPage {
    readonly modified: readonly SyncRecord[];
    readonly deleted: readonly RecordId[];
    /** Token covering everything up to and including this page */
    readonly token: ChangeToken;
    /** Another page follows */
    readonly moreComing: boolean;
}

export type ItemResult =
    | { readonly status: 'saved'; readonly record: SyncRecord }
    | { readonly status: 'deleted' }
    | { readonly status: 'failed'; readonly error: SyncError };

export interface ModifyRecordsRequest {
    readonly saves: readonly PendingSave[];
    readonly deletes: readonly PendingDelete[];
    /** All items succeed or none do */
    readonly atomic: boolean;
    readonly signal?: AbortSignal;
}

export interface ModifyRecordsResult {
    /** Keyed by pending change ID */
    readonly results: ReadonlyMap<string, ItemResult>;
}

export interface SyncTransport {
    fetchDatabaseChanges(request: { token: ChangeToken; signal?: AbortSignal }): Promise<DatabaseChanges>;

    fetchZoneChanges(request: {
        zone: ZoneName;
        token: ChangeToken;
        limit: number;
        signal?: AbortSignal;
    }): Promise<ZoneChangesPage>;

    modifyRecords(request: ModifyRecordsRequest): Promise<ModifyRecordsResult>;

    saveZone(request: { zone: ZoneName; signal?: AbortSignal }): Promise<void>;

    deleteZone(request: { zone: ZoneName; signal?: AbortSignal }): Promise<void>;
}
