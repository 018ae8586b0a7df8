// Tests for the bed assignment guard

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CrossTenantViolationError,
  ReferenceNotFoundError,
  type Bed,
  type Resident,
} from '@careledger/protocol';
import { inMemory } from '@careledger/repositories';
import { bedAssignmentGuard } from './bed-assignment.js';
import type { GuardContext } from './types.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';
const NOW = '2024-03-15T09:30:00.000Z';

function createBed(id: string, residenceId: string): Bed {
  return {
    id,
    residenceId,
    roomId: 'room-1',
    name: `Bed ${id}`,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

function createResident(overrides: Partial<Resident> = {}): Resident {
  return {
    id: 'res-1',
    residenceId: 'residence-1',
    fullName: 'Ana Ruiz',
    birthDate: '1938-02-11',
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

describe('bedAssignmentGuard', () => {
  let repos: inMemory.InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = inMemory.createInMemoryRepositoryContext();
    await repos.beds.insert(createBed('bed-1', 'residence-1'));
    await repos.beds.insert(createBed('bed-2', 'residence-1'));
    await repos.beds.insert(createBed('bed-x', 'residence-2'));
  });

  function context(
    record: Resident,
    prior: Resident | null = null
  ): GuardContext<'resident'> {
    return {
      entityType: 'resident',
      operation: prior ? 'update' : 'insert',
      record,
      prior,
      repos,
      now: NOW,
    };
  }

  it('accepts an active resident in a bed of their residence', async () => {
    const record = createResident({ bedId: 'bed-1' });

    const result = await bedAssignmentGuard(context(record));

    expect(result.record).toEqual(record);
    expect(result.events).toEqual([]);
  });

  it.each(['discharged', 'deceased'] as const)(
    'clears the bed and stamps status and deletion times for %s residents',
    async (status) => {
      const result = await bedAssignmentGuard(
        context(createResident({ status, bedId: 'bed-1' }))
      );

      expect(result.record).toMatchObject({
        status,
        bedId: null,
        statusChangedAt: NOW,
        deletedAt: NOW,
      });
    }
  );

  it('keeps status and deletion times that were already set', async () => {
    const result = await bedAssignmentGuard(
      context(
        createResident({
          status: 'discharged',
          statusChangedAt: '2024-02-01T00:00:00.000Z',
          deletedAt: '2024-02-02T00:00:00.000Z',
        })
      )
    );

    expect(result.record.statusChangedAt).toBe('2024-02-01T00:00:00.000Z');
    expect(result.record.deletedAt).toBe('2024-02-02T00:00:00.000Z');
  });

  it('does not validate the bed of a resident whose bed it clears', async () => {
    const result = await bedAssignmentGuard(
      context(createResident({ status: 'deceased', bedId: 'bed-x' }))
    );

    expect(result.record.bedId).toBeNull();
  });

  it('rejects a bed that does not exist', async () => {
    const error = await bedAssignmentGuard(
      context(createResident({ bedId: 'bed-missing' }))
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReferenceNotFoundError);
    expect(error).toMatchObject({ entityType: 'bed', entityId: 'bed-missing', field: 'bedId' });
  });

  it('rejects a bed in another residence', async () => {
    const error = await bedAssignmentGuard(context(createResident({ bedId: 'bed-x' }))).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(CrossTenantViolationError);
    expect(error).toMatchObject({
      expectedResidenceId: 'residence-1',
      actualResidenceId: 'residence-2',
    });
  });

  it('emits assign_bed when an update changes the bed', async () => {
    const prior = createResident({ bedId: 'bed-1' });

    const result = await bedAssignmentGuard(context(createResident({ bedId: 'bed-2' }), prior));

    expect(result.events).toEqual([
      { action: 'assign_bed', payload: { oldBedId: 'bed-1', newBedId: 'bed-2' } },
    ]);
  });

  it('emits assign_bed with a null new bed on discharge', async () => {
    const prior = createResident({ bedId: 'bed-1' });

    const result = await bedAssignmentGuard(
      context(createResident({ bedId: 'bed-1', status: 'discharged' }), prior)
    );

    expect(result.events).toEqual([
      { action: 'assign_bed', payload: { oldBedId: 'bed-1', newBedId: null } },
    ]);
  });

  it('emits nothing when the bed is unchanged or on insert', async () => {
    const prior = createResident({ bedId: 'bed-1' });

    const unchanged = await bedAssignmentGuard(
      context(createResident({ bedId: 'bed-1', fullName: 'Ana R.' }), prior)
    );
    const inserted = await bedAssignmentGuard(context(createResident({ bedId: 'bed-1' })));

    expect(unchanged.events).toEqual([]);
    expect(inserted.events).toEqual([]);
  });
});
