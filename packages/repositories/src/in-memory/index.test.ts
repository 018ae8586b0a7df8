// Tests for the in-memory repository context
// Verifies transactional commit/rollback, uniqueness rules and ledger ordering.

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DuplicateValueError,
  OccupancyConflictError,
  type Device,
  type Resident,
} from '@careledger/protocol';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from './index.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';

function createResident(id: string, overrides: Partial<Resident> = {}): Resident {
  return {
    id,
    residenceId: 'residence-1',
    fullName: `Resident ${id}`,
    birthDate: '1940-05-01',
    sex: null,
    comments: null,
    status: 'active',
    statusChangedAt: null,
    bedId: null,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
    ...overrides,
  };
}

function createDevice(id: string, mac: string): Device {
  return {
    id,
    residenceId: 'residence-1',
    type: 'scale',
    name: `Scale ${id}`,
    mac,
    batteryPercent: 80,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

describe('createInMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('transaction', () => {
    it('commits changes when the function resolves', async () => {
      const result = await repos.transaction(async (tx) => {
        await tx.residents.insert(createResident('res-1'));
        return 'done';
      });

      expect(result).toBe('done');
      expect(await repos.residents.get('res-1')).toEqual(createResident('res-1'));
      expect(repos._data.residents.size).toBe(1);
    });

    it('discards every change when the function throws', async () => {
      await expect(
        repos.transaction(async (tx) => {
          await tx.residents.insert(createResident('res-1'));
          await tx.history.append({
            entityType: 'resident',
            entityId: 'res-1',
            changeKind: 'create',
            snapshot: { before: null, after: createResident('res-1') },
            actorUserId: null,
            at: T0,
          });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await repos.residents.get('res-1')).toBeNull();
      expect(await repos.history.listForEntity('resident', 'res-1')).toEqual([]);
    });

    it('hides uncommitted writes from readers outside the transaction', async () => {
      let seenOutside: Resident | null = createResident('placeholder');

      await repos.transaction(async (tx) => {
        await tx.residents.insert(createResident('res-1'));
        seenOutside = await repos.residents.get('res-1');
      });

      expect(seenOutside).toBeNull();
      expect(await repos.residents.get('res-1')).not.toBeNull();
    });

    it('runs concurrent transactions one after another', async () => {
      const order: string[] = [];
      const step = (name: string) =>
        repos.transaction(async (tx) => {
          order.push(`${name}:start`);
          await tx.residents.insert(createResident(name));
          await Promise.resolve();
          order.push(`${name}:end`);
        });

      await Promise.all([step('res-1'), step('res-2')]);

      expect(order).toEqual(['res-1:start', 'res-1:end', 'res-2:start', 'res-2:end']);
    });

    it('checks a concurrent placement against the committed occupant', async () => {
      const results = await Promise.allSettled([
        repos.transaction((tx) => tx.residents.insert(createResident('res-1', { bedId: 'bed-1' }))),
        repos.transaction((tx) => tx.residents.insert(createResident('res-2', { bedId: 'bed-1' }))),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(repos._data.residents.has('res-2')).toBe(false);
    });

    it('keeps working after a failed transaction', async () => {
      await expect(
        repos.transaction(async () => {
          throw new Error('first');
        })
      ).rejects.toThrow('first');

      await repos.transaction(async (tx) => {
        await tx.residents.insert(createResident('res-1'));
      });

      expect(repos._data.residents.size).toBe(1);
    });
  });

  describe('uniqueness rules', () => {
    it('rejects a second active resident in the same bed', async () => {
      await repos.residents.insert(createResident('res-1', { bedId: 'bed-1' }));

      const error = await repos.residents
        .insert(createResident('res-2', { bedId: 'bed-1' }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OccupancyConflictError);
      expect(error).toMatchObject({ code: 'OCCUPANCY_CONFLICT', bedId: 'bed-1' });
    });

    it('ignores residents outside the occupancy index', async () => {
      await repos.residents.insert(createResident('res-1', { bedId: 'bed-1' }));
      await repos.residents.insert(
        createResident('res-2', { bedId: 'bed-1', status: 'discharged' })
      );
      await repos.residents.insert(createResident('res-3', { bedId: 'bed-1', deletedAt: T0 }));

      expect(repos._data.residents.size).toBe(3);
    });

    it('lets a row keep its own key on update', async () => {
      await repos.residents.insert(createResident('res-1', { bedId: 'bed-1' }));

      const updated = await repos.residents.update(
        createResident('res-1', { bedId: 'bed-1', fullName: 'Renamed' })
      );

      expect(updated?.fullName).toBe('Renamed');
    });

    it('rejects a duplicate device MAC', async () => {
      await repos.devices.insert(createDevice('dev-1', 'AA:BB:CC:00:00:01'));

      await expect(
        repos.devices.insert(createDevice('dev-2', 'AA:BB:CC:00:00:01'))
      ).rejects.toMatchObject({ code: 'DUPLICATE_VALUE', constraint: 'device_mac_unique' });
    });

    it('rejects a duplicate primary key', async () => {
      await repos.residents.insert(createResident('res-1'));

      await expect(repos.residents.insert(createResident('res-1'))).rejects.toBeInstanceOf(
        DuplicateValueError
      );
    });
  });

  describe('record repositories', () => {
    it('returns null when updating or removing a missing row', async () => {
      expect(await repos.residents.update(createResident('missing'))).toBeNull();
      expect(await repos.residents.remove('missing')).toBeNull();
    });

    it('returns copies rather than stored rows', async () => {
      await repos.residents.insert(createResident('res-1'));

      const loaded = await repos.residents.get('res-1');
      if (loaded) loaded.fullName = 'Changed';

      expect((await repos.residents.get('res-1'))?.fullName).toBe('Resident res-1');
    });

    it('finds rows that reference an id, soft-deleted ones included', async () => {
      await repos.residents.insert(createResident('res-1', { bedId: 'bed-1', deletedAt: T0 }));

      expect(await repos.residents.hasReference('bedId', 'bed-1')).toBe(true);
      expect(await repos.residents.hasReference('bedId', 'bed-2')).toBe(false);
      expect(await repos.residents.hasReference('residenceId', 'residence-1')).toBe(true);
    });
  });

  describe('history', () => {
    it('numbers rows per entity type and lists them oldest first', async () => {
      const append = (entityId: string) =>
        repos.history.append({
          entityType: 'resident',
          entityId,
          changeKind: 'update',
          snapshot: { before: null, after: null },
          actorUserId: 'user-1',
          at: T0,
        });

      await append('res-1');
      await append('res-2');
      await append('res-1');
      const device = await repos.history.append({
        entityType: 'device',
        entityId: 'dev-1',
        changeKind: 'create',
        snapshot: { before: null, after: null },
        actorUserId: null,
        at: T0,
      });

      const rows = await repos.history.listForEntity('resident', 'res-1');

      expect(rows.map((r) => r.sequence)).toEqual([1, 3]);
      expect(device.sequence).toBe(1);
    });
  });

  describe('event log', () => {
    const append = (entityId: string, at: string, residenceId: string | null = 'residence-1') =>
      repos.events.append({
        actorUserId: 'user-1',
        residenceId,
        entityType: 'resident',
        entityId,
        action: 'update',
        at,
        payload: null,
      });

    it('lists a residence newest first, breaking ties by sequence', async () => {
      await append('res-1', '2024-01-01T10:00:00.000Z');
      await append('res-2', '2024-01-01T12:00:00.000Z');
      await append('res-3', '2024-01-01T10:00:00.000Z');
      await append('res-4', '2024-01-01T11:00:00.000Z', 'residence-2');

      const events = await repos.events.listForResidence('residence-1');

      expect(events.map((e) => e.entityId)).toEqual(['res-2', 'res-3', 'res-1']);
      expect(events.map((e) => e.sequence)).toEqual([2, 3, 1]);
    });

    it('applies since, until and limit', async () => {
      await append('res-1', '2024-01-01T09:00:00.000Z');
      await append('res-2', '2024-01-01T10:00:00.000Z');
      await append('res-3', '2024-01-01T11:00:00.000Z');
      await append('res-4', '2024-01-01T12:00:00.000Z');

      const windowed = await repos.events.listForResidence('residence-1', {
        since: '2024-01-01T10:00:00.000Z',
        until: '2024-01-01T11:00:00.000Z',
      });
      const limited = await repos.events.listForResidence('residence-1', { limit: 1 });

      expect(windowed.map((e) => e.entityId)).toEqual(['res-3', 'res-2']);
      expect(limited.map((e) => e.entityId)).toEqual(['res-4']);
    });

    it('lists one entity oldest first', async () => {
      await append('res-1', '2024-01-01T12:00:00.000Z');
      await append('res-2', '2024-01-01T10:00:00.000Z');
      await append('res-1', '2024-01-01T09:00:00.000Z');

      const events = await repos.events.listForEntity('resident', 'res-1');

      expect(events.map((e) => e.sequence)).toEqual([1, 3]);
    });
  });

  it('clear() empties every table', async () => {
    await repos.residents.insert(createResident('res-1'));
    repos.clear();

    expect(repos._data.residents.size).toBe(0);
    expect(await repos.residents.get('res-1')).toBeNull();
  });
});
