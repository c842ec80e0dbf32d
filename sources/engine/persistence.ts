/**
 * Durable storage for engine state
 */

import { parsePersistedState } from './schema';
import type { PersistedState } from './types';

/**
 * Where the engine checkpoints its state
 *
 * `save` is awaited before the engine commits a new state in memory; if it
 * rejects, the in-memory state is left as it was and the error propagates.
 */
export interface SyncPersistence {
    save(state: PersistedState): Promise<void>;
}

/**
 * Keeps the last saved state as a JSON string
 * Round-trips through JSON like a real store would, so tests see exactly what a restart would load.
 */
export class MemoryPersistence implements SyncPersistence {
    private saved: string | null = null;
    saveCount = 0;

    async save(state: PersistedState): Promise<void> {
        this.saved = JSON.stringify(state);
        this.saveCount += 1;
    }

    /**
     * Last saved state, or null if nothing was saved
     */
    load(): PersistedState | null {
        return this.saved === null ? null : parsePersistedState(JSON.parse(this.saved));
    }
}
