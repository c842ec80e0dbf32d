/**
 * Helper functions for the sync engine
 */

import { createId } from '@paralleldrive/cuid2';
import type { RecordFields, RecordId, SyncRecord } from './types';

/**
 * Create a new change ID
 */
export function createChangeId(): string {
    return createId();
}

/**
 * Stable string key for a record identity. Zone and record names may contain
 * any character, so both parts are encoded rather than joined.
 */
export function recordKey(id: RecordId): string {
    return JSON.stringify([id.zone, id.recordName]);
}

export function recordIdOf(record: Pick<SyncRecord, 'zone' | 'recordName'>): RecordId {
    return { zone: record.zone, recordName: record.recordName };
}

export function sameRecordId(a: RecordId, b: RecordId): boolean {
    return a.zone === b.zone && a.recordName === b.recordName;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Deep equality check for field values
 */
export function deepEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (!isObject(a) || !isObject(b)) return false;
    if (Array.isArray(a) !== Array.isArray(b)) return false;

    const keysA = Object.keys(a);
    const keysB = Object.keys(b);

    if (keysA.length !== keysB.length) return false;

    for (const key of keysA) {
        if (!keysB.includes(key)) return false;
        if (!deepEqual(a[key], b[key])) {
            return false;
        }
    }

    return true;
}

/**
 * Names of fields whose values differ between two field maps
 * Fields missing from one side count as changed
 */
export function changedFieldNames(before: RecordFields | undefined, after: RecordFields): string[] {
    if (!before) {
        return Object.keys(after);
    }
    const names = new Set<string>();
    for (const key of Object.keys(after)) {
        if (!deepEqual(before[key], after[key])) {
            names.add(key);
        }
    }
    for (const key of Object.keys(before)) {
        if (!(key in after)) {
            names.add(key);
        }
    }
    return Array.from(names);
}

/**
 * Check if two field maps hold the same values
 */
export function sameFields(a: RecordFields, b: RecordFields): boolean {
    return deepEqual(a, b);
}
