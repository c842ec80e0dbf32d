import { resolveConfig, type SyncConfig, type SyncConfigInput } from './config';
import {
    createConflictResolver,
    rebaseOnServer,
    type ConflictResolver,
    type Resolution,
} from './conflict';
import { SyncError, throwIfAborted, toSyncError } from './errors';
import { changedFieldNames, recordKey, sameFields } from './helpers';
import { createConsoleLogger, type Logger } from './logger';
import type { SyncPersistence } from './persistence';
import { PendingChangeQueue } from './queue';
import { parsePersistedState } from './schema';
import {
    applyZoneChanges,
    confirmDeleted,
    confirmSaved,
    createEmptySnapshot,
    ensureZone,
    readRecord,
    removeZone,
    replaceZone,
    setDatabaseToken,
    zoneToken,
} from './store';
import { Throttle, type Sleep } from './throttle';
import type { DatabaseChanges, ItemResult, SyncTransport, ZoneChangesPage } from './transport';
import type {
    ChangeTag,
    PendingChange,
    PendingDelete,
    PendingSave,
    PersistedState,
    RecordId,
    StoreSnapshot,
    SyncRecord,
    ZoneName,
} from './types';
import { ZoneLock } from './zone-lock';

/**
 * Record as handed to `save()`
 * changeTag may be omitted: the engine uses the tag of the copy it last read.
 */
export type RecordInput = Omit<SyncRecord, 'changeTag' | 'modifiedAt'> & {
    readonly changeTag?: ChangeTag | null;
};

export type SyncStatus = 'idle' | 'fetching' | 'sending';

export interface ZoneFetchResult {
    readonly modified: SyncRecord[];
    readonly deleted: RecordId[];
}

export interface FetchResult {
    readonly zones: Record<ZoneName, ZoneFetchResult>;
    /** Zones whose token had expired and were listed again from scratch */
    readonly resynced: ZoneName[];
    /** Zones deleted on the server and dropped locally */
    readonly deletedZones: ZoneName[];
}

export interface ResolvedConflict {
    readonly recordId: RecordId;
    /** `confirmed`: the server already held the local fields (a replayed save) */
    readonly action: Resolution['action'] | 'confirmed';
}

export interface FailedChange {
    readonly change: PendingChange;
    readonly error: SyncError;
}

export interface SendResult {
    readonly saved: SyncRecord[];
    readonly deleted: RecordId[];
    readonly conflicts: ResolvedConflict[];
    readonly failed: FailedChange[];
}

export type SyncEvent =
    | { readonly type: 'changesFetched'; readonly zone: ZoneName; readonly modified: number; readonly deleted: number }
    | { readonly type: 'changesSent'; readonly saved: number; readonly deleted: number }
    | { readonly type: 'conflictResolved'; readonly recordId: RecordId; readonly action: ResolvedConflict['action'] }
    | { readonly type: 'zoneResynced'; readonly zone: ZoneName }
    | { readonly type: 'zoneDeleted'; readonly zone: ZoneName }
    | { readonly type: 'quotaExceeded'; readonly error: SyncError }
    | { readonly type: 'retryScheduled'; readonly delayMs: number; readonly attempt: number; readonly error: SyncError };

export type SyncListener = (event: SyncEvent) => void;

export interface SyncEngineOptions {
    transport: SyncTransport;
    config?: SyncConfigInput;
    /** Custom conflict resolvers per record type, taking precedence over configured policies */
    resolvers?: Record<string, ConflictResolver>;
    persistence?: SyncPersistence;
    logger?: Logger;
    /** Replaces setTimeout-based waiting (tests pass an instant sleep) */
    sleep?: Sleep;
}

/**
 * How to initialise the engine: empty, or from a `persist()` result
 */
export type SyncEngineInit =
    | { from: 'new' }
    | { from: 'restore'; data: unknown };

/**
 * Sync engine instance returned by syncEngine()
 */
export interface SyncEngine {
    /** Last-known server copy */
    readonly serverState: StoreSnapshot;

    /** Server copy with pending changes applied on top */
    readonly state: StoreSnapshot;

    /** Changes waiting for server confirmation, oldest first */
    readonly pendingChanges: ReadonlyArray<PendingChange>;

    readonly status: SyncStatus;

    readonly config: SyncConfig;

    /**
     * Queue a save and checkpoint the queue
     * The local state reflects the save immediately.
     */
    save(record: RecordInput): Promise<PendingSave>;

    /**
     * Queue a delete and checkpoint the queue
     * Returns undefined when the record never reached the server and the queued save was simply dropped.
     */
    delete(id: RecordId): Promise<PendingDelete | undefined>;

    /**
     * Read a record from the local state (pending changes applied)
     */
    read(id: RecordId): SyncRecord | undefined;

    createZone(zone: ZoneName, options?: { signal?: AbortSignal }): Promise<void>;

    /**
     * Delete a zone on the server, then drop its records and pending changes locally
     */
    deleteZone(zone: ZoneName, options?: { signal?: AbortSignal }): Promise<void>;

    /**
     * Fetch server changes since the stored tokens and apply them
     * Without `zones`, asks the server which zones changed first.
     */
    fetchChanges(options?: { zones?: ZoneName[]; signal?: AbortSignal }): Promise<FetchResult>;

    /**
     * Send pending changes in batches and reconcile each item's outcome
     */
    sendChanges(options?: { signal?: AbortSignal; atomic?: boolean }): Promise<SendResult>;

    /**
     * fetchChanges() followed by sendChanges()
     */
    sync(options?: { signal?: AbortSignal }): Promise<{ fetched: FetchResult; sent: SendResult }>;

    /**
     * Serializable state: server copy, tokens and pending queue
     */
    persist(): PersistedState;

    /**
     * Listen for engine events; returns an unsubscribe function
     */
    subscribe(listener: SyncListener): () => void;
}

const STATE_LOCK = 'state';

/**
 * Create a sync engine talking to the given transport
 */
export function syncEngine(options: SyncEngineOptions, init: SyncEngineInit = { from: 'new' }): SyncEngine {
    const config = resolveConfig(options.config);
    const transport = options.transport;
    const logger = options.logger ?? createConsoleLogger();
    const persistence = options.persistence;
    const resolve = createConflictResolver({
        policy: config.conflictPolicy,
        policies: config.conflictPolicies,
        custom: options.resolvers,
    });
    const throttle = new Throttle({
        minDelayMs: config.minOperationDelayMs,
        backoff: config.backoff,
        sleep: options.sleep,
    });
    const zoneLock = new ZoneLock();
    const stateLock = new ZoneLock();
    const listeners = new Set<SyncListener>();

    // Internal state
    let snapshot: StoreSnapshot;
    let queue: PendingChangeQueue;
    if (init.from === 'restore') {
        const restored = parsePersistedState(init.data);
        snapshot = restored.snapshot;
        queue = new PendingChangeQueue(restored.pending);
    } else {
        snapshot = createEmptySnapshot();
        queue = new PendingChangeQueue();
    }
    let state: StoreSnapshot = snapshot;
    let fetching = 0;
    let sending = 0;

    /**
     * Rebase state by applying all pending changes to the server copy
     */
    const rebaseState = (): void => {
        state = queue.entries.reduce(
            (current, change) => change.kind === 'save'
                ? confirmSaved(current, [change.record])
                : confirmDeleted(current, [change.recordId]),
            snapshot
        );
    };
    rebaseState();

    const emit = (event: SyncEvent): void => {
        for (const listener of listeners) {
            try {
                listener(event);
            } catch (error) {
                logger.error('Sync listener threw', { event: event.type, error });
            }
        }
    };

    /**
     * Apply a change to a staged copy of the snapshot and queue, checkpoint it,
     * and only then make it the engine's state
     */
    const commit = <T>(apply: (current: StoreSnapshot, staged: PendingChangeQueue) => [StoreSnapshot, T]): Promise<T> => {
        return stateLock.run([STATE_LOCK], async () => {
            const staged = queue.clone();
            const [next, value] = apply(snapshot, staged);
            if (persistence) {
                await persistence.save({ version: 1, snapshot: next, pending: staged.toJSON() });
            }
            snapshot = next;
            queue = staged;
            rebaseState();
            return value;
        });
    };

    /**
     * Run a transport call behind the throttle, retrying transient failures
     */
    const withRetry = async <T>(operation: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> => {
        for (let attempt = 0; ; attempt++) {
            await throttle.wait(signal);
            try {
                const result = await operation();
                throttle.recordSuccess();
                return result;
            } catch (caught) {
                const error = toSyncError(caught);
                if (!error.isRetryable || attempt >= config.maxRetries) {
                    if (error.isRetryable) {
                        logger.warn('Giving up after retries', { code: error.code, attempts: attempt + 1 });
                    }
                    throw error;
                }
                const delayMs = throttle.recordFailure(error.retryAfterMs);
                logger.info('Retrying after transient error', { code: error.code, attempt: attempt + 1, delayMs });
                emit({ type: 'retryScheduled', delayMs, attempt: attempt + 1, error });
            }
        }
    };

    const dropZoneLocally = async (zone: ZoneName): Promise<void> => {
        const dropped = await commit((current, staged) => [removeZone(current, zone), staged.dropZone(zone)]);
        if (dropped.length > 0) {
            logger.warn('Dropped pending changes of deleted zone', { zone, count: dropped.length });
        }
        emit({ type: 'zoneDeleted', zone });
    };

    // ------------------------------------------------------------------------
    // Fetch
    // ------------------------------------------------------------------------

    /**
     * List a zone from the beginning and swap it in at once
     */
    const resyncZone = async (zone: ZoneName, signal: AbortSignal | undefined): Promise<ZoneFetchResult> => {
        logger.warn('Change token expired, resynchronising zone', { zone });
        const records = new Map<string, SyncRecord>();
        let token: string | null = null;
        for (;;) {
            throwIfAborted(signal);
            const page = await withRetry(
                () => transport.fetchZoneChanges({ zone, token, limit: config.fetchPageSize, signal }),
                signal
            );
            for (const record of page.modified) {
                records.set(record.recordName, record);
            }
            for (const id of page.deleted) {
                records.delete(id.recordName);
            }
            token = page.token;
            if (!page.moreComing) break;
        }
        const listed = Array.from(records.values());
        const finalToken = token;
        const deleted = await commit((current, staged) => {
            const gone = Object.keys(current.zones[zone]?.records ?? {})
                .filter(name => !records.has(name))
                .map(recordName => ({ zone, recordName }));
            return [replaceZone(current, zone, listed, finalToken), gone];
        });
        emit({ type: 'zoneResynced', zone });
        return { modified: listed, deleted };
    };

    const fetchZone = async (zone: ZoneName, signal: AbortSignal | undefined): Promise<ZoneFetchResult | 'resynced'> => {
        const modified: SyncRecord[] = [];
        const deleted: RecordId[] = [];
        for (;;) {
            throwIfAborted(signal);
            const token = zoneToken(snapshot, zone);
            let page: ZoneChangesPage;
            try {
                page = await withRetry(
                    () => transport.fetchZoneChanges({ zone, token, limit: config.fetchPageSize, signal }),
                    signal
                );
            } catch (caught) {
                const error = toSyncError(caught);
                if (error.category === 'staleCursor' && token !== null) {
                    return 'resynced';
                }
                throw error;
            }
            // Records and token land in one snapshot
            const applied = page;
            await commit(current => [applyZoneChanges(current, zone, applied), undefined]);
            modified.push(...page.modified);
            deleted.push(...page.deleted);
            if (page.modified.length > 0 || page.deleted.length > 0) {
                emit({ type: 'changesFetched', zone, modified: page.modified.length, deleted: page.deleted.length });
            }
            if (!page.moreComing) break;
        }
        return { modified, deleted };
    };

    const fetchChanges: SyncEngine['fetchChanges'] = async (fetchOptions = {}) => {
        const { signal } = fetchOptions;
        fetching++;
        try {
            const zones: Record<ZoneName, ZoneFetchResult> = {};
            const resynced: ZoneName[] = [];
            const deletedZones: ZoneName[] = [];

            let targets: ZoneName[];
            let databaseToken: string | null | undefined;
            if (fetchOptions.zones) {
                targets = fetchOptions.zones;
            } else {
                let changes: DatabaseChanges;
                try {
                    changes = await withRetry(
                        () => transport.fetchDatabaseChanges({ token: snapshot.databaseToken, signal }),
                        signal
                    );
                } catch (caught) {
                    const error = toSyncError(caught);
                    if (error.category !== 'staleCursor' || snapshot.databaseToken === null) throw error;
                    logger.warn('Database change token expired, checking every zone');
                    changes = await withRetry(
                        () => transport.fetchDatabaseChanges({ token: null, signal }),
                        signal
                    );
                }
                for (const zone of changes.deletedZones) {
                    await zoneLock.run([zone], () => dropZoneLocally(zone));
                    deletedZones.push(zone);
                }
                targets = Array.from(changes.changedZones);
                databaseToken = changes.token;
            }

            for (const zone of targets) {
                throwIfAborted(signal);
                try {
                    const result = await zoneLock.run<{ resync: ZoneFetchResult } | { fetched: ZoneFetchResult }>([zone], async () => {
                        const fetched = await fetchZone(zone, signal);
                        return fetched === 'resynced' ? { resync: await resyncZone(zone, signal) } : { fetched };
                    });
                    if ('resync' in result) {
                        resynced.push(zone);
                        zones[zone] = result.resync;
                    } else {
                        zones[zone] = result.fetched;
                    }
                } catch (caught) {
                    const error = toSyncError(caught);
                    if (error.code !== 'zoneNotFound') throw error;
                    logger.warn('Zone no longer exists on the server', { zone });
                    await zoneLock.run([zone], () => dropZoneLocally(zone));
                    deletedZones.push(zone);
                }
            }

            // The database token only advances once every zone it reported is applied
            if (databaseToken !== undefined) {
                const token = databaseToken;
                await commit(current => [setDatabaseToken(current, token), undefined]);
            }
            return { zones, resynced, deletedZones };
        } finally {
            fetching--;
        }
    };

    // ------------------------------------------------------------------------
    // Send
    // ------------------------------------------------------------------------

    interface SendProgress {
        readonly result: {
            saved: SyncRecord[];
            deleted: RecordId[];
            conflicts: ResolvedConflict[];
            failed: FailedChange[];
        };
        /** Change IDs that failed for good in this call */
        readonly skipped: Set<string>;
        /** Conflict rounds per record */
        readonly rounds: Map<string, number>;
        /** Transient per-item failures per record */
        readonly retries: Map<string, number>;
    }

    /**
     * Send one batch and fold every item's outcome into staged state
     */
    const sendBatch = async (
        batch: PendingChange[],
        atomic: boolean,
        progress: SendProgress,
        signal: AbortSignal | undefined
    ): Promise<void> => {
        const ids = batch.map(change => change.id);
        // The attempt is durable before the request leaves
        await commit((current, staged) => {
            staged.markAttempt(ids);
            return [current, undefined];
        });

        let results: ReadonlyMap<string, ItemResult>;
        try {
            const response = await withRetry(() => transport.modifyRecords({
                saves: batch.filter((c): c is PendingSave => c.kind === 'save'),
                deletes: batch.filter((c): c is PendingDelete => c.kind === 'delete'),
                atomic,
                signal,
            }), signal);
            results = response.results;
        } catch (caught) {
            const error = toSyncError(caught);
            // Atomic batches are never split
            if (error.category === 'limit' && batch.length > 1 && !atomic) {
                const half = Math.ceil(batch.length / 2);
                logger.info('Batch too large, splitting', { size: batch.length });
                await sendBatch(batch.slice(0, half), atomic, progress, signal);
                await sendBatch(batch.slice(half), atomic, progress, signal);
                return;
            }
            if (error.category === 'limit') {
                logger.warn('Batch rejected as too large', { size: batch.length, atomic });
                for (const change of batch) {
                    progress.skipped.add(change.id);
                    progress.result.failed.push({ change, error });
                }
                return;
            }
            throw error;
        }

        const events: SyncEvent[] = [];

        const { halt, transientFailure } = await commit((current, staged) => {
            let next = current;
            let halt: SyncError | undefined;
            let transientFailure: { error: SyncError; attempt: number } | undefined;
            let saved = 0;
            let deleted = 0;
            const failedIds = new Set<string>();

            const fail = (change: PendingChange, error: SyncError) => {
                failedIds.add(change.id);
                progress.skipped.add(change.id);
                progress.result.failed.push({ change, error });
            };

            const countRound = (change: PendingChange): boolean => {
                const key = recordKey(change.recordId);
                const rounds = (progress.rounds.get(key) ?? 0) + 1;
                progress.rounds.set(key, rounds);
                return rounds <= config.maxConflictRounds;
            };

            const confirmSave = (change: PendingSave, record: SyncRecord) => {
                next = confirmSaved(next, [record]);
                staged.confirm([change.id]);
                staged.rebaseOnto(record, change.id);
                progress.result.saved.push(record);
                saved++;
            };

            const confirmDelete = (change: PendingDelete) => {
                next = confirmDeleted(next, [change.recordId]);
                staged.confirm([change.id]);
                progress.result.deleted.push(change.recordId);
                deleted++;
            };

            const resolveConflict = (change: PendingSave, server: SyncRecord, error: SyncError) => {
                const recordId = change.recordId;
                // A replayed save the server already holds
                if (
                    server.recordType === change.record.recordType &&
                    (server.parent ?? null) === (change.record.parent ?? null) &&
                    sameFields(server.fields, change.record.fields)
                ) {
                    confirmSave(change, server);
                    progress.result.conflicts.push({ recordId, action: 'confirmed' });
                    events.push({ type: 'conflictResolved', recordId, action: 'confirmed' });
                    return;
                }
                if (!countRound(change)) {
                    logger.warn('Record keeps conflicting, giving up for now', { record: recordKey(recordId) });
                    fail(change, error);
                    return;
                }
                const resolution = resolve({
                    recordId,
                    local: change,
                    server,
                    ancestor: readRecord(current, recordId) ?? null,
                });
                next = confirmSaved(next, [server]);
                if (resolution.action === 'useServer') {
                    staged.confirm([change.id]);
                } else {
                    staged.replace({ ...change, record: rebaseOnServer(change.record, server, resolution.fields) });
                }
                logger.info('Resolved conflict', { record: recordKey(recordId), action: resolution.action });
                progress.result.conflicts.push({ recordId, action: resolution.action });
                events.push({ type: 'conflictResolved', recordId, action: resolution.action });
            };

            for (const change of batch) {
                const outcome = results.get(change.id);
                if (!outcome) {
                    // No answer for this item: it stays queued for the next call
                    fail(change, new SyncError('internal', 'Transport returned no result for change', { recordId: change.recordId }));
                    continue;
                }
                if (outcome.status === 'saved' && change.kind === 'save') {
                    confirmSave(change, outcome.record);
                    continue;
                }
                if (outcome.status === 'deleted' && change.kind === 'delete') {
                    confirmDelete(change);
                    continue;
                }
                if (outcome.status !== 'failed') {
                    fail(change, new SyncError('internal', `Unexpected ${outcome.status} result for ${change.kind}`, { recordId: change.recordId }));
                    continue;
                }

                const error = outcome.error;
                switch (error.category) {
                    case 'missing': {
                        if (error.code === 'zoneNotFound') {
                            fail(change, error);
                        } else if (change.kind === 'delete') {
                            // Already gone on the server: the delete has happened
                            confirmDelete(change);
                        } else if (countRound(change)) {
                            // Deleted remotely while edited locally: the local edit recreates it
                            next = confirmDeleted(next, [change.recordId]);
                            staged.replace({ ...change, record: { ...change.record, changeTag: null } });
                        } else {
                            fail(change, error);
                        }
                        break;
                    }
                    case 'conflict': {
                        const server = error.serverRecord;
                        if (!server) {
                            fail(change, error);
                        } else if (change.kind === 'save') {
                            resolveConflict(change, server, error);
                        } else if (countRound(change)) {
                            staged.replace({ ...change, changeTag: server.changeTag });
                        } else {
                            fail(change, error);
                        }
                        break;
                    }
                    case 'transient': {
                        const key = recordKey(change.recordId);
                        const retries = (progress.retries.get(key) ?? 0) + 1;
                        progress.retries.set(key, retries);
                        if (retries > config.maxRetries) {
                            fail(change, error);
                        } else if (!transientFailure || retries > transientFailure.attempt) {
                            transientFailure = { error, attempt: retries };
                        }
                        break;
                    }
                    case 'quota': {
                        fail(change, error);
                        halt = halt ?? error;
                        break;
                    }
                    default: {
                        fail(change, error);
                        if (error.category === 'fatal') {
                            halt = halt ?? error;
                        }
                    }
                }
            }

            // One item failed for good: its atomic siblings must not go out without it
            if (atomic && failedIds.size > 0) {
                for (const change of batch) {
                    if (failedIds.has(change.id) || staged.get(change.recordId)?.id !== change.id) continue;
                    const outcome = results.get(change.id);
                    fail(change, outcome?.status === 'failed'
                        ? outcome.error
                        : new SyncError('batchRequestFailed', 'Another item in the atomic batch failed', { recordId: change.recordId }));
                }
                transientFailure = undefined;
            }

            if (saved > 0 || deleted > 0) {
                events.push({ type: 'changesSent', saved, deleted });
            }
            return [next, { halt, transientFailure }];
        });

        for (const event of events) {
            emit(event);
        }
        if (transientFailure) {
            const { error, attempt } = transientFailure;
            const delayMs = throttle.recordFailure(error.retryAfterMs);
            logger.info('Retrying items after transient error', { code: error.code, attempt, delayMs });
            emit({ type: 'retryScheduled', delayMs, attempt, error });
        }
        if (halt) {
            if (halt.category === 'quota') {
                logger.error('Storage quota exceeded', { message: halt.message });
                emit({ type: 'quotaExceeded', error: halt });
            }
            throw halt;
        }
    };

    const sendChanges: SyncEngine['sendChanges'] = async (sendOptions = {}) => {
        const { signal, atomic = false } = sendOptions;
        sending++;
        try {
            const progress: SendProgress = {
                result: { saved: [], deleted: [], conflicts: [], failed: [] },
                skipped: new Set(),
                rounds: new Map(),
                retries: new Map(),
            };
            for (;;) {
                throwIfAborted(signal);
                const batch = queue.peekBatch(config.batchSize, change => !progress.skipped.has(change.id));
                if (batch.length === 0) break;
                const zones = batch.map(change => change.recordId.zone);
                await zoneLock.run(zones, async () => {
                    // Re-read under the lock: a concurrent flow may have confirmed or replaced some of them
                    const fresh = batch.flatMap(change => {
                        const latest = queue.get(change.recordId);
                        return latest && latest.id === change.id ? [latest] : [];
                    });
                    if (fresh.length > 0) {
                        await sendBatch(fresh, atomic, progress, signal);
                    }
                });
            }
            return progress.result;
        } finally {
            sending--;
        }
    };

    // ------------------------------------------------------------------------
    // Local mutations
    // ------------------------------------------------------------------------

    const save: SyncEngine['save'] = (input) => {
        const id = { zone: input.zone, recordName: input.recordName };
        return commit((current, staged) => {
            const base = readRecord(current, id);
            const pending = staged.get(id);
            const changeTag = input.changeTag !== undefined
                ? input.changeTag
                : pending?.kind === 'save'
                    ? pending.record.changeTag
                    : base?.changeTag ?? null;
            const record: SyncRecord = {
                recordName: input.recordName,
                zone: input.zone,
                recordType: input.recordType,
                fields: input.fields,
                parent: input.parent ?? null,
                changeTag,
                modifiedAt: Date.now(),
            };
            const previous = pending?.kind === 'save' ? pending.record.fields : base?.fields;
            const entry = staged.enqueueSave(record, changedFieldNames(previous, record.fields));
            return [current, entry];
        });
    };

    const deleteRecord: SyncEngine['delete'] = (id) => {
        return commit((current, staged) => {
            const base = readRecord(current, id);
            const pending = staged.get(id);
            const changeTag = base?.changeTag
                ?? (pending?.kind === 'save' ? pending.record.changeTag : null);
            return [current, staged.enqueueDelete(id, changeTag)];
        });
    };

    return {
        get serverState() {
            return snapshot;
        },

        get state() {
            return state;
        },

        get pendingChanges() {
            return queue.entries;
        },

        get status(): SyncStatus {
            if (fetching > 0) return 'fetching';
            if (sending > 0) return 'sending';
            return 'idle';
        },

        config,

        save,

        delete: deleteRecord,

        read(id) {
            return readRecord(state, id);
        },

        async createZone(zone, zoneOptions = {}) {
            const { signal } = zoneOptions;
            await zoneLock.run([zone], async () => {
                await withRetry(() => transport.saveZone({ zone, signal }), signal);
                await commit(current => [ensureZone(current, zone), undefined]);
            });
        },

        async deleteZone(zone, zoneOptions = {}) {
            const { signal } = zoneOptions;
            await zoneLock.run([zone], async () => {
                try {
                    await withRetry(() => transport.deleteZone({ zone, signal }), signal);
                } catch (caught) {
                    const error = toSyncError(caught);
                    if (error.code !== 'zoneNotFound') throw error;
                }
                await dropZoneLocally(zone);
            });
        },

        fetchChanges,

        sendChanges,

        async sync(syncOptions = {}) {
            const fetched = await fetchChanges({ signal: syncOptions.signal });
            const sent = await sendChanges({ signal: syncOptions.signal });
            return { fetched, sent };
        },

        persist() {
            return { version: 1, snapshot, pending: queue.toJSON() };
        },

        subscribe(listener) {
            listeners.add(listener);
            return () => {
                listeners.delete(listener);
            };
        },
    };
}

