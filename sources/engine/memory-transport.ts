/**
 * In-memory record service implementing SyncTransport
 *
 * Keeps records per zone, assigns change tags, and records every mutation in a
 * per-zone change log so incremental fetches can be served from any token.
 * Useful for tests and for running the engine without a backend.
 */

import { SyncError, throwIfAborted, type SyncErrorCode } from './errors';
import type {
    DatabaseChanges,
    ItemResult,
    ModifyRecordsRequest,
    ModifyRecordsResult,
    SyncTransport,
    ZoneChangesPage,
} from './transport';
import type { ChangeToken, PendingDelete, PendingSave, RecordId, SyncRecord, ZoneName } from './types';

export type TransportOperation =
    | 'fetchDatabaseChanges'
    | 'fetchZoneChanges'
    | 'modifyRecords'
    | 'saveZone'
    | 'deleteZone';

export interface InjectedFailure {
    code: SyncErrorCode;
    /** Only fail this operation; any operation when omitted */
    operation?: TransportOperation;
    /** Number of calls to fail (default 1) */
    times?: number;
    retryAfterMs?: number;
    /** Perform the call, then fail as if the response was lost */
    afterApply?: boolean;
}

export interface MemoryTransportOptions {
    /** Largest modify batch accepted (default 400) */
    maxBatchSize?: number;
    /** Maximum total size of stored record fields, in JSON characters */
    quota?: number;
    now?: () => number;
}

interface ZoneLogEntry {
    readonly seq: number;
    readonly recordName: string;
    readonly deleted: boolean;
}

interface ServerZone {
    /** Bumped when tokens are expired; tokens from older generations are rejected */
    generation: number;
    readonly records: Map<string, SyncRecord>;
    readonly log: ZoneLogEntry[];
}

interface DatabaseLogEntry {
    readonly seq: number;
    readonly zone: ZoneName;
    readonly deleted: boolean;
}

type Operation =
    | { readonly type: 'save'; readonly change: PendingSave }
    | { readonly type: 'delete'; readonly change: PendingDelete };

/**
 * Outcome of checking one operation against current server state
 */
type Check =
    | { readonly ok: true }
    | { readonly ok: false; readonly error: SyncError };

export class MemoryTransport implements SyncTransport {
    private zones = new Map<ZoneName, ServerZone>();
    private databaseLog: DatabaseLogEntry[] = [];
    private seq = 0;
    /** Last generation of each deleted zone, so a recreated zone never accepts its old tokens */
    private retiredGenerations = new Map<ZoneName, number>();
    private tagCounter = 0;
    private failures: Array<InjectedFailure & { remaining: number }> = [];
    private readonly maxBatchSize: number;
    private readonly quota: number | undefined;
    private readonly now: () => number;

    /** Every call made, in order */
    readonly calls: TransportOperation[] = [];

    constructor(options: MemoryTransportOptions = {}) {
        this.maxBatchSize = options.maxBatchSize ?? 400;
        this.quota = options.quota;
        this.now = options.now ?? Date.now;
    }

    // ------------------------------------------------------------------------
    // Server-side controls
    // ------------------------------------------------------------------------

    /**
     * Fail upcoming calls with the given error
     */
    failNext(failure: InjectedFailure): void {
        this.failures.push({ ...failure, remaining: failure.times ?? 1 });
    }

    /**
     * Invalidate every token issued so far for the zone
     */
    expireTokens(zone: ZoneName): void {
        this.requireZone(zone).generation += 1;
    }

    /**
     * Current server copy of a zone's records
     */
    records(zone: ZoneName): SyncRecord[] {
        const target = this.zones.get(zone);
        return target ? Array.from(target.records.values()) : [];
    }

    record(id: RecordId): SyncRecord | undefined {
        return this.zones.get(id.zone)?.records.get(id.recordName);
    }

    hasZone(zone: ZoneName): boolean {
        return this.zones.has(zone);
    }

    /**
     * Write a record as another client would, bypassing change tag checks
     * Creates the zone if needed.
     */
    putRecord(record: Omit<SyncRecord, 'changeTag'>): SyncRecord {
        const target = this.zones.get(record.zone) ?? this.createZone(record.zone);
        return this.store(target, record);
    }

    /**
     * Delete a record as another client would
     */
    removeRecord(id: RecordId): void {
        const target = this.requireZone(id.zone);
        this.cascadeDelete(target, id.zone, id.recordName);
    }

    // ------------------------------------------------------------------------
    // SyncTransport
    // ------------------------------------------------------------------------

    async fetchDatabaseChanges(request: { token: ChangeToken; signal?: AbortSignal }): Promise<DatabaseChanges> {
        return this.call('fetchDatabaseChanges', request.signal, () => {
            const since = request.token === null ? 0 : this.parseDatabaseToken(request.token);
            const latest = new Map<ZoneName, boolean>();
            for (const entry of this.databaseLog) {
                if (entry.seq > since) {
                    latest.set(entry.zone, entry.deleted);
                }
            }
            const changedZones: ZoneName[] = [];
            const deletedZones: ZoneName[] = [];
            for (const [zone, deleted] of latest) {
                (deleted ? deletedZones : changedZones).push(zone);
            }
            return { changedZones, deletedZones, token: `db-${this.seq}` };
        });
    }

    async fetchZoneChanges(request: {
        zone: ZoneName;
        token: ChangeToken;
        limit: number;
        signal?: AbortSignal;
    }): Promise<ZoneChangesPage> {
        return this.call('fetchZoneChanges', request.signal, () => {
            const target = this.requireZone(request.zone);
            const since = request.token === null ? 0 : this.parseZoneToken(target, request.zone, request.token);

            // Latest log entry per record after the token, in log order
            const latest = new Map<string, ZoneLogEntry>();
            for (const entry of target.log) {
                if (entry.seq > since) {
                    latest.delete(entry.recordName);
                    latest.set(entry.recordName, entry);
                }
            }
            const pending = Array.from(latest.values());
            const page = pending.slice(0, Math.max(1, request.limit));
            const modified: SyncRecord[] = [];
            const deleted: RecordId[] = [];
            for (const entry of page) {
                const current = target.records.get(entry.recordName);
                if (entry.deleted || !current) {
                    deleted.push({ zone: request.zone, recordName: entry.recordName });
                } else {
                    modified.push(current);
                }
            }
            const last = page[page.length - 1];
            const head = last ? last.seq : since;
            return {
                modified,
                deleted,
                token: `${target.generation}:${head}`,
                moreComing: pending.length > page.length,
            };
        });
    }

    async modifyRecords(request: ModifyRecordsRequest): Promise<ModifyRecordsResult> {
        return this.call('modifyRecords', request.signal, () => {
            const count = request.saves.length + request.deletes.length;
            if (count > this.maxBatchSize) {
                throw new SyncError('limitExceeded', `Batch of ${count} exceeds limit of ${this.maxBatchSize}`);
            }

            const operations: Operation[] = [
                ...request.saves.map(change => ({ type: 'save' as const, change })),
                ...request.deletes.map(change => ({ type: 'delete' as const, change })),
            ];
            const results = new Map<string, ItemResult>();

            if (request.atomic) {
                let usage = this.usage();
                const checks = operations.map(operation => {
                    const check = this.check(operation, usage);
                    if (check.ok && operation.type === 'save') {
                        usage += this.sizeDelta(operation.change);
                    }
                    return check;
                });
                if (checks.some(check => !check.ok)) {
                    operations.forEach((operation, i) => {
                        const check = checks[i];
                        results.set(operation.change.id, {
                            status: 'failed',
                            error: check && !check.ok
                                ? check.error
                                : new SyncError('batchRequestFailed', 'Another item in the atomic batch failed', {
                                    recordId: operation.change.recordId,
                                }),
                        });
                    });
                    return { results };
                }
            }

            for (const operation of operations) {
                results.set(operation.change.id, this.applyOperation(operation));
            }
            return { results };
        });
    }

    async saveZone(request: { zone: ZoneName; signal?: AbortSignal }): Promise<void> {
        return this.call('saveZone', request.signal, () => {
            if (!this.zones.has(request.zone)) {
                this.createZone(request.zone);
            }
        });
    }

    async deleteZone(request: { zone: ZoneName; signal?: AbortSignal }): Promise<void> {
        return this.call('deleteZone', request.signal, () => {
            const target = this.requireZone(request.zone);
            this.retiredGenerations.set(request.zone, target.generation);
            this.zones.delete(request.zone);
            this.databaseLog.push({ seq: ++this.seq, zone: request.zone, deleted: true });
        });
    }

    // ------------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------------

    /**
     * Run one transport call, honouring cancellation and injected failures
     */
    private async call<T>(operation: TransportOperation, signal: AbortSignal | undefined, run: () => T): Promise<T> {
        throwIfAborted(signal);
        this.calls.push(operation);
        const failure = this.takeFailure(operation);
        if (failure && !failure.afterApply) {
            throw new SyncError(failure.code, `Injected ${failure.code}`, { retryAfterMs: failure.retryAfterMs });
        }
        const result = run();
        if (failure) {
            throw new SyncError(failure.code, `Injected ${failure.code} after apply`, { retryAfterMs: failure.retryAfterMs });
        }
        return result;
    }

    private takeFailure(operation: TransportOperation): InjectedFailure | undefined {
        const index = this.failures.findIndex(f => f.operation === undefined || f.operation === operation);
        if (index === -1) return undefined;
        const failure = this.failures[index];
        if (!failure) return undefined;
        failure.remaining -= 1;
        if (failure.remaining <= 0) {
            this.failures.splice(index, 1);
        }
        return failure;
    }

    private createZone(zone: ZoneName): ServerZone {
        const generation = (this.retiredGenerations.get(zone) ?? 0) + 1;
        const created: ServerZone = { generation, records: new Map(), log: [] };
        this.zones.set(zone, created);
        this.databaseLog.push({ seq: ++this.seq, zone, deleted: false });
        return created;
    }

    private requireZone(zone: ZoneName): ServerZone {
        const target = this.zones.get(zone);
        if (!target) {
            throw new SyncError('zoneNotFound', `Zone ${zone} does not exist`);
        }
        return target;
    }

    private parseZoneToken(target: ServerZone, zone: ZoneName, token: string): number {
        const match = /^(\d+):(\d+)$/.exec(token);
        if (!match || Number(match[1]) !== target.generation) {
            throw new SyncError('changeTokenExpired', `Change token for zone ${zone} has expired`);
        }
        return Number(match[2]);
    }

    private parseDatabaseToken(token: string): number {
        const match = /^db-(\d+)$/.exec(token);
        if (!match) {
            throw new SyncError('changeTokenExpired', 'Database change token has expired');
        }
        return Number(match[1]);
    }

    /**
     * Check an operation against current server state without applying it
     */
    private check(operation: Operation, usage: number): Check {
        const { recordId } = operation.change;
        const target = this.zones.get(recordId.zone);
        if (!target) {
            return { ok: false, error: new SyncError('zoneNotFound', `Zone ${recordId.zone} does not exist`, { recordId }) };
        }
        const existing = target.records.get(recordId.recordName);

        switch (operation.type) {
            case 'save': {
                const { record } = operation.change;
                if (record.changeTag === null && existing) {
                    return {
                        ok: false,
                        error: new SyncError('versionMismatch', 'Record already exists', { recordId, serverRecord: existing }),
                    };
                }
                if (record.changeTag !== null && !existing) {
                    return { ok: false, error: new SyncError('unknownItem', 'Record not found', { recordId }) };
                }
                if (existing && existing.changeTag !== record.changeTag) {
                    return {
                        ok: false,
                        error: new SyncError('versionMismatch', 'Record was changed on the server', { recordId, serverRecord: existing }),
                    };
                }
                if (this.quota !== undefined && usage + this.sizeDelta(operation.change) > this.quota) {
                    return { ok: false, error: new SyncError('quotaExceeded', 'Storage quota exceeded', { recordId }) };
                }
                return { ok: true };
            }

            case 'delete': {
                if (!existing) {
                    return { ok: false, error: new SyncError('unknownItem', 'Record not found', { recordId }) };
                }
                return { ok: true };
            }
        }
    }

    /**
     * Apply a single operation and return its result
     */
    private applyOperation(operation: Operation): ItemResult {
        const check = this.check(operation, this.usage());
        if (!check.ok) {
            return { status: 'failed', error: check.error };
        }
        const { recordId } = operation.change;
        const target = this.requireZone(recordId.zone);

        switch (operation.type) {
            case 'save':
                return { status: 'saved', record: this.store(target, operation.change.record) };
            case 'delete':
                this.cascadeDelete(target, recordId.zone, recordId.recordName);
                return { status: 'deleted' };
        }
    }

    private store(target: ServerZone, record: Omit<SyncRecord, 'changeTag'>): SyncRecord {
        const stored: SyncRecord = {
            recordName: record.recordName,
            zone: record.zone,
            recordType: record.recordType,
            fields: record.fields,
            parent: record.parent ?? null,
            changeTag: `ct-${++this.tagCounter}`,
            modifiedAt: this.now(),
        };
        target.records.set(record.recordName, stored);
        this.logChange(target, record.zone, record.recordName, false);
        return stored;
    }

    private cascadeDelete(target: ServerZone, zone: ZoneName, recordName: string): void {
        if (!target.records.delete(recordName)) return;
        this.logChange(target, zone, recordName, true);
        for (const child of Array.from(target.records.values())) {
            if (child.parent === recordName) {
                this.cascadeDelete(target, zone, child.recordName);
            }
        }
    }

    private logChange(target: ServerZone, zone: ZoneName, recordName: string, deleted: boolean): void {
        const seq = ++this.seq;
        target.log.push({ seq, recordName, deleted });
        this.databaseLog.push({ seq, zone, deleted: false });
    }

    private usage(): number {
        let total = 0;
        for (const target of this.zones.values()) {
            for (const record of target.records.values()) {
                total += JSON.stringify(record.fields).length;
            }
        }
        return total;
    }

    private sizeDelta(change: PendingSave): number {
        const existing = this.record(change.recordId);
        const before = existing ? JSON.stringify(existing.fields).length : 0;
        return JSON.stringify(change.record.fields).length - before;
    }
}

