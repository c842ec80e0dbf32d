/**
 * Core types for the sync engine
 */

// ============================================================================
// Core Types - Record Identity and Structure
// ============================================================================

/**
 * Name of a zone (a partition of records sharing one change token)
 */
export type ZoneName = string;

/**
 * Opaque cursor bounding a "changes since" query
 * null means "from the beginning"
 */
export type ChangeToken = string | null;

/**
 * Opaque per-record version marker assigned by the server
 * Changes on every successful server-side mutation of the record
 */
export type ChangeTag = string;

/**
 * Timestamp in milliseconds since epoch
 */
export type Timestamp = number;

/**
 * Identity of a record
 */
export interface RecordId {
    readonly zone: ZoneName;
    readonly recordName: string;
}

/**
 * Binary payload, base64-encoded so records stay JSON-serialisable
 */
export interface BlobValue {
    readonly type: 'blob';
    readonly base64: string;
}

export type FieldValue =
    | string
    | number
    | boolean
    | null
    | BlobValue
    | FieldValue[];

export type RecordFields = Record<string, FieldValue>;

/**
 * A record as known to the client
 *
 * changeTag is null for records the server has never confirmed.
 * A save must carry the change tag the record was last read with;
 * a mismatch on the server is a conflict.
 */
export interface SyncRecord {
    readonly recordName: string;
    readonly zone: ZoneName;
    readonly recordType: string;
    readonly fields: RecordFields;
    readonly changeTag: ChangeTag | null;
    /** Record name of the parent in the same zone; deleting the parent deletes this record */
    readonly parent?: string | null;
    readonly modifiedAt?: Timestamp;
}

// ============================================================================
// Pending Changes
// ============================================================================

export type PendingChangeKind = 'save' | 'delete';

interface PendingChangeBase {
    /** Unique change ID (CUID2 format) */
    readonly id: string;
    readonly recordId: RecordId;
    readonly createdAt: Timestamp;
    /** Number of times the change was handed to the transport */
    readonly attempts: number;
}

export interface PendingSave extends PendingChangeBase {
    readonly kind: 'save';
    readonly record: SyncRecord;
    /** Fields the local write touched, used by field-level merge */
    readonly changedFields: readonly string[];
}

export interface PendingDelete extends PendingChangeBase {
    readonly kind: 'delete';
    /** Change tag the delete was based on, null if unknown */
    readonly changeTag: ChangeTag | null;
}

/**
 * A locally queued mutation not yet confirmed by the server
 */
export type PendingChange = PendingSave | PendingDelete;

// ============================================================================
// Conflicts
// ============================================================================

/**
 * Divergence between the change tag a local write was based on
 * and the one the server currently holds
 */
export interface Conflict {
    readonly recordId: RecordId;
    readonly local: PendingSave;
    readonly server: SyncRecord;
    /** Last server copy the client had before the local write, if any */
    readonly ancestor: SyncRecord | null;
}

// ============================================================================
// Local Snapshot
// ============================================================================

/**
 * Last-known server copy of one zone
 */
export interface ZoneSnapshot {
    readonly token: ChangeToken;
    readonly records: Record<string, SyncRecord>;
}

/**
 * Last-known server copy of every zone plus the database-level token
 */
export interface StoreSnapshot {
    readonly databaseToken: ChangeToken;
    readonly zones: Record<ZoneName, ZoneSnapshot>;
}

// ============================================================================
// Persistence Types
// ============================================================================

/**
 * Serialized engine state
 * Contains the server snapshot and the pending queue needed to fully restore the engine
 */
export interface PersistedState {
    readonly version: 1;
    readonly snapshot: StoreSnapshot;
    readonly pending: PendingChange[];
}
