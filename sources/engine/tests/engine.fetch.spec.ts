/**
 * Level 5: Fetching Changes
 * Tests for incremental fetch, paging, token safety and resync
 */

import { describe, it, expect } from 'vitest';
import { MemoryPersistence, MemoryTransport, listRecords, zoneToken, type SyncEvent } from '../index';
import { FailingPersistence, note, setup } from './test-helpers';

function seed(transport: MemoryTransport, names: string[]) {
    for (const name of names) {
        transport.putRecord({ zone: 'notes', recordName: name, recordType: 'Note', fields: { title: name.toUpperCase() } });
    }
}

describe('Fetching Changes', () => {
    describe('Basic fetch', () => {
        it('should apply changed zones and advance both tokens', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);

            const result = await engine.fetchChanges();

            expect(result.zones['notes']?.modified.map(r => r.recordName)).toEqual(['a']);
            expect(engine.read({ zone: 'notes', recordName: 'a' })?.changeTag).toBe('ct-1');
            expect(zoneToken(engine.serverState, 'notes')).toBe('1:2');
            expect(engine.serverState.databaseToken).toBe('db-2');
        });

        it('should fetch nothing new on a second call', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges();

            const result = await engine.fetchChanges();

            expect(result.zones).toEqual({});
            expect(transport.calls.filter(c => c === 'fetchZoneChanges')).toHaveLength(1);
        });

        it('should not report a fetch that brought no changes', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges({ zones: ['notes'] });
            const events: SyncEvent[] = [];
            engine.subscribe(event => events.push(event));

            await engine.fetchChanges({ zones: ['notes'] });

            expect(events.filter(event => event.type === 'changesFetched')).toEqual([]);
            expect(transport.calls.filter(c => c === 'fetchZoneChanges')).toHaveLength(2);
        });

        it('should apply remote deletions', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a', 'b']);
            await engine.fetchChanges();

            transport.removeRecord({ zone: 'notes', recordName: 'a' });
            const result = await engine.fetchChanges();

            expect(result.zones['notes']?.deleted).toEqual([{ zone: 'notes', recordName: 'a' }]);
            expect(listRecords(engine.state, 'notes').map(r => r.recordName)).toEqual(['b']);
        });

        it('should keep pending local changes on top of fetched records', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges();
            await engine.save(note('a', { title: 'Local' }));

            transport.putRecord({ zone: 'notes', recordName: 'a', recordType: 'Note', fields: { title: 'Remote' } });
            await engine.fetchChanges();

            expect(engine.serverState.zones['notes']?.records['a']?.fields).toEqual({ title: 'Remote' });
            expect(engine.read({ zone: 'notes', recordName: 'a' })?.fields).toEqual({ title: 'Local' });
        });
    });

    describe('Paging', () => {
        it('should commit each page with its token', async () => {
            const { transport, engine } = setup({ config: { fetchPageSize: 2 } });
            seed(transport, ['a', 'b', 'c', 'd', 'e']);
            const tokens: (string | null)[] = [];
            engine.subscribe(event => {
                if (event.type === 'changesFetched') {
                    tokens.push(zoneToken(engine.serverState, 'notes'));
                }
            });

            const result = await engine.fetchChanges({ zones: ['notes'] });

            expect(tokens).toEqual(['1:3', '1:5', '1:6']);
            expect(result.zones['notes']?.modified).toHaveLength(5);
        });

        it('should never persist a token ahead of its records', async () => {
            const transport = new MemoryTransport();
            seed(transport, ['a', 'b', 'c', 'd', 'e']);
            const persistence = new FailingPersistence(2);
            const { engine } = setup({ transport, persistence, config: { fetchPageSize: 2 } });

            await expect(engine.fetchChanges({ zones: ['notes'] })).rejects.toThrow('disk full');

            // The second page was never committed
            expect(zoneToken(engine.serverState, 'notes')).toBe('1:3');
            expect(listRecords(engine.serverState, 'notes').map(r => r.recordName)).toEqual(['a', 'b']);
            const saved = persistence.load();
            expect(saved?.snapshot.zones['notes']?.token).toBe('1:3');
            expect(Object.keys(saved?.snapshot.zones['notes']?.records ?? {})).toEqual(['a', 'b']);

            // Resumes from the committed token
            await engine.fetchChanges({ zones: ['notes'] });
            expect(zoneToken(engine.serverState, 'notes')).toBe('1:6');
            expect(listRecords(engine.serverState, 'notes')).toHaveLength(5);
        });
    });

    describe('Cancellation', () => {
        it('should stop between pages and resume from the last committed page', async () => {
            const { transport, engine } = setup({ config: { fetchPageSize: 2 } });
            seed(transport, ['a', 'b', 'c', 'd', 'e']);
            const controller = new AbortController();
            const unsubscribe = engine.subscribe(event => {
                if (event.type === 'changesFetched') {
                    controller.abort();
                }
            });

            await expect(engine.fetchChanges({ zones: ['notes'], signal: controller.signal }))
                .rejects.toMatchObject({ code: 'cancelled' });
            expect(zoneToken(engine.serverState, 'notes')).toBe('1:3');
            expect(engine.status).toBe('idle');

            unsubscribe();
            const result = await engine.fetchChanges({ zones: ['notes'] });

            expect(result.zones['notes']?.modified.map(r => r.recordName)).toEqual(['c', 'd', 'e']);
            expect(listRecords(engine.serverState, 'notes')).toHaveLength(5);
        });
    });

    describe('Expired tokens', () => {
        it('should resync a zone from scratch when its token expires', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges({ zones: ['notes'] });

            seed(transport, ['b']);
            transport.removeRecord({ zone: 'notes', recordName: 'a' });
            transport.expireTokens('notes');
            const events: SyncEvent[] = [];
            engine.subscribe(event => events.push(event));

            const result = await engine.fetchChanges({ zones: ['notes'] });

            expect(result.resynced).toEqual(['notes']);
            expect(result.zones['notes']?.modified.map(r => r.recordName)).toEqual(['b']);
            expect(result.zones['notes']?.deleted).toEqual([{ zone: 'notes', recordName: 'a' }]);
            expect(listRecords(engine.serverState, 'notes').map(r => r.recordName)).toEqual(['b']);
            expect(zoneToken(engine.serverState, 'notes')).toBe('2:4');
            expect(events).toContainEqual({ type: 'zoneResynced', zone: 'notes' });
        });

        it('should keep pending changes across a resync', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges({ zones: ['notes'] });
            await engine.save(note('draft', { title: 'Draft' }));

            transport.expireTokens('notes');
            await engine.fetchChanges({ zones: ['notes'] });

            expect(engine.pendingChanges).toHaveLength(1);
            expect(engine.read({ zone: 'notes', recordName: 'draft' })?.fields).toEqual({ title: 'Draft' });
        });
    });

    describe('Deleted zones', () => {
        it('should drop zones the server reports deleted', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            await engine.fetchChanges();
            await engine.save(note('b', { title: 'B' }));

            await transport.deleteZone({ zone: 'notes' });
            const result = await engine.fetchChanges();

            expect(result.deletedZones).toEqual(['notes']);
            expect(engine.serverState.zones['notes']).toBeUndefined();
            expect(engine.pendingChanges).toEqual([]);
        });

        it('should drop a requested zone that no longer exists', async () => {
            const { engine } = setup();
            const events: SyncEvent[] = [];
            engine.subscribe(event => events.push(event));

            const result = await engine.fetchChanges({ zones: ['ghost'] });

            expect(result.deletedZones).toEqual(['ghost']);
            expect(events).toEqual([{ type: 'zoneDeleted', zone: 'ghost' }]);
        });
    });

    describe('Transient failures', () => {
        it('should retry a failed fetch', async () => {
            const { transport, engine } = setup();
            seed(transport, ['a']);
            transport.failNext({ code: 'networkUnavailable', operation: 'fetchZoneChanges' });

            const result = await engine.fetchChanges({ zones: ['notes'] });

            expect(result.zones['notes']?.modified).toHaveLength(1);
            expect(transport.calls).toEqual(['fetchZoneChanges', 'fetchZoneChanges']);
        });
    });
});
