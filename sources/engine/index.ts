/**
 * Sync Engine - Export all public APIs
 */

// Types
export type {
    ZoneName,
    ChangeToken,
    ChangeTag,
    Timestamp,
    RecordId,
    BlobValue,
    FieldValue,
    RecordFields,
    SyncRecord,
    PendingChangeKind,
    PendingSave,
    PendingDelete,
    PendingChange,
    Conflict,
    ZoneSnapshot,
    StoreSnapshot,
    PersistedState,
} from './types';

// Helpers
export { recordKey, recordIdOf, sameRecordId, changedFieldNames } from './helpers';

// Errors
export { SyncError, classifyError, isSyncError, toSyncError } from './errors';
export type { SyncErrorCode, SyncErrorCategory, SyncErrorOptions } from './errors';

// Configuration
export { resolveConfig, syncConfigSchema, MAX_BATCH_SIZE } from './config';
export type { SyncConfig, SyncConfigInput, BackoffConfig, ConflictPolicy } from './config';

// Logging
export { createConsoleLogger, silentLogger } from './logger';
export type { Logger, LogLevel } from './logger';

// Local store
export {
    createEmptySnapshot,
    applyZoneChanges,
    replaceZone,
    confirmSaved,
    confirmDeleted,
    readRecord,
    listRecords,
    zoneToken,
} from './store';
export type { ZoneChanges } from './store';

// Pending change queue
export { PendingChangeQueue } from './queue';

// Conflict resolution
export {
    serverWins,
    clientWins,
    fieldMerge,
    counter,
    resolverForPolicy,
    createConflictResolver,
} from './conflict';
export type { Resolution, ConflictResolver, ResolverOptions } from './conflict';

// Throttling
export { Throttle, defaultSleep } from './throttle';
export type { Sleep, ThrottleOptions } from './throttle';

// Transport
export type {
    SyncTransport,
    DatabaseChanges,
    ZoneChangesPage,
    ItemResult,
    ModifyRecordsRequest,
    ModifyRecordsResult,
} from './transport';
export { MemoryTransport } from './memory-transport';
export type { MemoryTransportOptions, InjectedFailure, TransportOperation } from './memory-transport';

// Persistence
export { MemoryPersistence } from './persistence';
export type { SyncPersistence } from './persistence';
export { parsePersistedState, persistedStateSchema } from './schema';

// Sync Engine
export { syncEngine } from './engine';
export type {
    SyncEngine,
    SyncEngineOptions,
    SyncEngineInit,
    SyncEvent,
    SyncListener,
    SyncStatus,
    RecordInput,
    FetchResult,
    ZoneFetchResult,
    SendResult,
    ResolvedConflict,
    FailedChange,
} from './engine';
