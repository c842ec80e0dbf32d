/**
 * Engine configuration
 *
 * Validated with zod; every key has a default so `resolveConfig({})` is a complete config.
 */

import { z } from 'zod';
import { SyncError } from './errors';

/**
 * Largest batch a single modify request may carry
 */
export const MAX_BATCH_SIZE = 400;

export const conflictPolicySchema = z.union([
    z.literal('serverWins'),
    z.literal('clientWins'),
    z.literal('fieldMerge'),
    z.object({ counter: z.string().min(1) }).strict(),
]);

export type ConflictPolicy = z.infer<typeof conflictPolicySchema>;

export const backoffSchema = z.object({
    initialDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(60_000),
    multiplier: z.number().min(1).default(2),
    recoveryFactor: z.number().min(1).default(2),
}).strict().refine(b => b.maxDelayMs >= b.initialDelayMs, {
    message: 'maxDelayMs must be at least initialDelayMs',
    path: ['maxDelayMs'],
});

export const syncConfigSchema = z.object({
    batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE).default(MAX_BATCH_SIZE),
    fetchPageSize: z.number().int().min(1).default(200),
    minOperationDelayMs: z.number().int().nonnegative().default(0),
    maxRetries: z.number().int().nonnegative().default(5),
    maxConflictRounds: z.number().int().min(1).default(3),
    backoff: backoffSchema.default({}),
    conflictPolicy: conflictPolicySchema.default('serverWins'),
    /** Policy per record type, overriding conflictPolicy */
    conflictPolicies: z.record(z.string(), conflictPolicySchema).default({}),
}).strict();

export type SyncConfig = z.infer<typeof syncConfigSchema>;
export type SyncConfigInput = z.input<typeof syncConfigSchema>;
export type BackoffConfig = SyncConfig['backoff'];

/**
 * Parse and default a partial configuration
 * Throws SyncError('badConfiguration') listing every invalid key
 */
export function resolveConfig(input: SyncConfigInput = {}): SyncConfig {
    const parsed = syncConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new SyncError('badConfiguration', `Invalid sync configuration: ${issues}`, { cause: parsed.error });
    }
    return parsed.data;
}
