/**
 * Conflict resolution
 *
 * A conflict arises when a pending save was based on a change tag the server
 * no longer holds. The resolver decides which fields survive; the engine then
 * either adopts the server record or resends on the server's change tag.
 */

import type { ConflictPolicy } from './config';
import { deepEqual } from './helpers';
import type { Conflict, FieldValue, RecordFields, SyncRecord } from './types';

export type Resolution =
    /** Discard the local change and keep the server record */
    | { readonly action: 'useServer' }
    /** Write these fields over the server record */
    | { readonly action: 'resend'; readonly fields: RecordFields };

export type ConflictResolver = (conflict: Conflict) => Resolution;

export interface ResolverOptions {
    policy: ConflictPolicy;
    /** Policy per record type */
    policies?: Record<string, ConflictPolicy>;
    /** Custom resolver per record type, taking precedence over policies */
    custom?: Record<string, ConflictResolver>;
}

export const serverWins: ConflictResolver = () => ({ action: 'useServer' });

export const clientWins: ConflictResolver = conflict => ({
    action: 'resend',
    fields: conflict.local.record.fields,
});

/**
 * Start from the server fields and overlay the fields the local write changed
 * Fields the local write removed are removed from the result.
 */
export const fieldMerge: ConflictResolver = conflict => {
    const local = conflict.local.record.fields;
    const merged: RecordFields = { ...conflict.server.fields };
    for (const name of conflict.local.changedFields) {
        const value: FieldValue | undefined = local[name];
        if (value === undefined) {
            delete merged[name];
        } else {
            merged[name] = value;
        }
    }
    if (deepEqual(merged, conflict.server.fields)) {
        return { action: 'useServer' };
    }
    return { action: 'resend', fields: merged };
};

/**
 * Compare an explicit edit counter; the higher one wins, ties go to the server
 * A record without a numeric counter counts as zero.
 */
export function counter(field: string): ConflictResolver {
    const read = (record: SyncRecord): number => {
        const value = record.fields[field];
        return typeof value === 'number' ? value : 0;
    };
    return conflict => {
        if (read(conflict.local.record) > read(conflict.server)) {
            return { action: 'resend', fields: conflict.local.record.fields };
        }
        return { action: 'useServer' };
    };
}

export function resolverForPolicy(policy: ConflictPolicy): ConflictResolver {
    if (typeof policy === 'object') {
        return counter(policy.counter);
    }
    switch (policy) {
        case 'serverWins':
            return serverWins;
        case 'clientWins':
            return clientWins;
        case 'fieldMerge':
            return fieldMerge;
    }
}

/**
 * Build a resolver that dispatches on record type
 */
export function createConflictResolver(options: ResolverOptions): ConflictResolver {
    const fallback = resolverForPolicy(options.policy);
    const byType = new Map<string, ConflictResolver>();
    for (const [recordType, policy] of Object.entries(options.policies ?? {})) {
        byType.set(recordType, resolverForPolicy(policy));
    }
    for (const [recordType, resolver] of Object.entries(options.custom ?? {})) {
        byType.set(recordType, resolver);
    }
    return conflict => {
        const resolver = byType.get(conflict.server.recordType) ?? fallback;
        return resolver(conflict);
    };
}

/**
 * Build the record to resend: resolved fields on the server's current change tag
 * Resending on any other tag would conflict again.
 */
export function rebaseOnServer(local: SyncRecord, server: SyncRecord, fields: RecordFields): SyncRecord {
    return {
        ...local,
        fields,
        changeTag: server.changeTag,
    };
}
