/**
 * Runtime schemas for everything the engine reads back from storage
 */

import { z } from 'zod';
import { SyncError } from './errors';
import type { FieldValue, PendingChange, PersistedState } from './types';

export const blobValueSchema = z.object({
    type: z.literal('blob'),
    base64: z.string(),
});

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        blobValueSchema,
        z.array(fieldValueSchema),
    ])
);

export const recordIdSchema = z.object({
    zone: z.string().min(1),
    recordName: z.string().min(1),
});

export const syncRecordSchema = z.object({
    recordName: z.string().min(1),
    zone: z.string().min(1),
    recordType: z.string().min(1),
    fields: z.record(z.string(), fieldValueSchema),
    changeTag: z.string().nullable(),
    parent: z.string().nullable().optional(),
    modifiedAt: z.number().optional(),
});

const pendingBase = {
    id: z.string().min(1),
    recordId: recordIdSchema,
    createdAt: z.number(),
    attempts: z.number().int().nonnegative(),
};

export const pendingChangeSchema = z.discriminatedUnion('kind', [
    z.object({
        ...pendingBase,
        kind: z.literal('save'),
        record: syncRecordSchema,
        changedFields: z.array(z.string()),
    }),
    z.object({
        ...pendingBase,
        kind: z.literal('delete'),
        changeTag: z.string().nullable(),
    }),
]);

export const zoneSnapshotSchema = z.object({
    token: z.string().nullable(),
    records: z.record(z.string(), syncRecordSchema),
});

export const storeSnapshotSchema = z.object({
    databaseToken: z.string().nullable(),
    zones: z.record(z.string(), zoneSnapshotSchema),
});

export const persistedStateSchema = z.object({
    version: z.literal(1),
    snapshot: storeSnapshotSchema,
    pending: z.array(pendingChangeSchema),
});

function parseOrThrow<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown issue';
        throw new SyncError('badConfiguration', `Invalid ${what}: ${where}`, { cause: parsed.error });
    }
    return parsed.data;
}

export function parsePersistedState(data: unknown): PersistedState {
    return parseOrThrow(persistedStateSchema, data, 'persisted state');
}

export function parsePendingChanges(data: unknown): PendingChange[] {
    return parseOrThrow(z.array(pendingChangeSchema), data, 'pending changes');
}
