import { describe, it, expect } from 'vitest';
import type { Device } from '@careledger/protocol';
import { inMemory } from '@careledger/repositories';
import { recordHistory, snapshotFor } from './recorder.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';

function createMockDevice(batteryPercent: number): Device {
  return {
    id: 'dev-1',
    residenceId: 'residence-1',
    type: 'thermometer',
    name: 'Thermometer',
    mac: 'AA:BB:CC:00:00:09',
    batteryPercent,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

describe('snapshotFor', () => {
  const before = createMockDevice(90);
  const after = createMockDevice(80);

  it('keeps only the new row on create', () => {
    expect(snapshotFor('create', before, after)).toEqual({ before: null, after });
  });

  it('keeps both rows on update', () => {
    expect(snapshotFor('update', before, after)).toEqual({ before, after });
  });

  it('keeps only the removed row on delete', () => {
    expect(snapshotFor('delete', before, after)).toEqual({ before, after: null });
  });
});

describe('recordHistory', () => {
  it('stores full copies and returns the stored sequence', async () => {
    const repos = inMemory.createInMemoryRepositoryContext();
    const before = createMockDevice(90);
    const after = createMockDevice(80);

    await recordHistory(repos.history, {
      entityType: 'device',
      entityId: 'dev-1',
      changeKind: 'create',
      before: null,
      after: before,
      actor: { userId: 'user-1' },
      at: T0,
    });
    const entry = await recordHistory(repos.history, {
      entityType: 'device',
      entityId: 'dev-1',
      changeKind: 'update',
      before,
      after,
      actor: { userId: null },
      at: '2024-01-02T00:00:00.000Z',
    });

    expect(entry).toEqual({
      sequence: 2,
      entityType: 'device',
      entityId: 'dev-1',
      changeKind: 'update',
      snapshot: { before, after },
      actorUserId: null,
      at: '2024-01-02T00:00:00.000Z',
    });
    expect(await repos.history.listForEntity('device', 'dev-1')).toHaveLength(2);
  });
});
