/**
 * Error taxonomy for the sync engine
 *
 * Every failure reported by a transport or raised by the engine is a SyncError.
 * The error code decides how the engine reacts (see `category`):
 * - transient: retry with backoff, honouring retryAfterMs
 * - conflict: route to the conflict resolver
 * - fatal: halt automatic retry and surface to the caller
 * - quota: keep the queue, notify, surface to the caller
 * - limit: split the batch and retry
 * - staleCursor: discard the token and resync the zone
 * - missing: the item or zone is already gone
 * - cancelled: the caller aborted the operation
 */

import type { RecordId, SyncRecord } from './types';

export type SyncErrorCode =
    | 'networkUnavailable'
    | 'serviceUnavailable'
    | 'rateLimited'
    | 'zoneBusy'
    | 'batchRequestFailed'
    | 'versionMismatch'
    | 'notAuthenticated'
    | 'badConfiguration'
    | 'permissionFailure'
    | 'internal'
    | 'quotaExceeded'
    | 'limitExceeded'
    | 'changeTokenExpired'
    | 'unknownItem'
    | 'zoneNotFound'
    | 'cancelled';

export type SyncErrorCategory =
    | 'transient'
    | 'conflict'
    | 'fatal'
    | 'quota'
    | 'limit'
    | 'staleCursor'
    | 'missing'
    | 'cancelled';

const CATEGORIES: Record<SyncErrorCode, SyncErrorCategory> = {
    networkUnavailable: 'transient',
    serviceUnavailable: 'transient',
    rateLimited: 'transient',
    zoneBusy: 'transient',
    batchRequestFailed: 'transient',
    versionMismatch: 'conflict',
    notAuthenticated: 'fatal',
    badConfiguration: 'fatal',
    permissionFailure: 'fatal',
    internal: 'fatal',
    quotaExceeded: 'quota',
    limitExceeded: 'limit',
    changeTokenExpired: 'staleCursor',
    unknownItem: 'missing',
    zoneNotFound: 'missing',
    cancelled: 'cancelled',
};

export interface SyncErrorOptions {
    /** Server-suggested delay before retrying */
    retryAfterMs?: number;
    /** Current server copy, for versionMismatch */
    serverRecord?: SyncRecord;
    recordId?: RecordId;
    cause?: unknown;
}

export class SyncError extends Error {
    readonly code: SyncErrorCode;
    readonly retryAfterMs?: number;
    readonly serverRecord?: SyncRecord;
    readonly recordId?: RecordId;

    constructor(code: SyncErrorCode, message?: string, options: SyncErrorOptions = {}) {
        super(message ?? code, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'SyncError';
        this.code = code;
        this.retryAfterMs = options.retryAfterMs;
        this.serverRecord = options.serverRecord;
        this.recordId = options.recordId;
    }

    get category(): SyncErrorCategory {
        return classifyError(this.code);
    }

    get isRetryable(): boolean {
        return this.category === 'transient';
    }
}

export function classifyError(code: SyncErrorCode): SyncErrorCategory {
    return CATEGORIES[code];
}

export function isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
}

/**
 * Wrap anything thrown by foreign code as a SyncError
 * Abort errors become `cancelled`, everything else `internal`
 */
export function toSyncError(error: unknown): SyncError {
    if (error instanceof SyncError) {
        return error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
        return new SyncError('cancelled', error.message, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SyncError('internal', message, { cause: error });
}

/**
 * Throw `cancelled` if the signal has been aborted
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new SyncError('cancelled', 'Operation was cancelled');
    }
}
