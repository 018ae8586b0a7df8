// Tests for the referential ownership guard

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CrossTenantViolationError,
  ReferenceNotFoundError,
  type Measurement,
  type Resident,
  type ResidentTag,
  type Room,
} from '@careledger/protocol';
import { inMemory } from '@careledger/repositories';
import { ownershipGuard, referencesOf } from './ownership.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';

function createMockResident(id: string, residenceId: string): Resident {
  return {
    id,
    residenceId,
    fullName: `Resident ${id}`,
    birthDate: '1941-07-19',
    sex: null,
    comments: null,
    status: 'active',
    statusChangedAt: null,
    bedId: null,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

function createMockMeasurement(overrides: Partial<Measurement> = {}): Measurement {
  return {
    id: 'm-1',
    residenceId: 'residence-1',
    residentId: 'res-1',
    recordedBy: 'user-1',
    source: 'manual',
    deviceId: null,
    type: 'temperature',
    systolic: null,
    diastolic: null,
    pulseBpm: null,
    spo2: null,
    weightKg: null,
    temperatureC: 36.6,
    takenAt: T0,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
    ...overrides,
  };
}

function createMockRoom(floorId: string): Room {
  return {
    id: 'room-1',
    residenceId: 'residence-1',
    floorId,
    name: 'Room 1',
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

function createMockResidentTag(tagId: string): ResidentTag {
  return {
    id: 'rt-1',
    residenceId: 'residence-1',
    residentId: 'res-1',
    tagId,
    assignedBy: 'user-1',
    assignedAt: T0,
    createdAt: T0,
    updatedAt: T0,
  };
}

describe('referencesOf', () => {
  it('lists the owned references of a measurement', () => {
    expect(referencesOf('measurement', createMockMeasurement({ deviceId: 'dev-1' }))).toEqual([
      { field: 'residentId', target: 'resident', id: 'res-1' },
      { field: 'deviceId', target: 'device', id: 'dev-1' },
    ]);
  });

  it('lists the resident and the tag of a resident tag', () => {
    expect(referencesOf('resident_tag', createMockResidentTag('tag-1'))).toEqual([
      { field: 'residentId', target: 'resident', id: 'res-1' },
      { field: 'tagId', target: 'tag', id: 'tag-1' },
    ]);
  });

  it('leaves the bed of a resident to the bed assignment guard', () => {
    expect(referencesOf('resident', createMockResident('res-1', 'residence-1'))).toEqual([]);
  });
});

describe('ownershipGuard', () => {
  let repos: inMemory.InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = inMemory.createInMemoryRepositoryContext();
    await repos.residents.insert(createMockResident('res-1', 'residence-1'));
    await repos.residents.insert(createMockResident('res-other', 'residence-2'));
  });

  function guard(record: Measurement) {
    return ownershipGuard({
      entityType: 'measurement',
      operation: 'insert',
      record,
      prior: null,
      repos,
      now: T0,
    });
  }

  it('passes a row whose references live in its residence', async () => {
    const record = createMockMeasurement();

    await expect(guard(record)).resolves.toEqual({ record });
  });

  it('skips null references', async () => {
    await expect(guard(createMockMeasurement({ deviceId: null }))).resolves.toBeDefined();
  });

  it('rejects a missing referenced row', async () => {
    const error = await guard(createMockMeasurement({ deviceId: 'dev-missing' })).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ReferenceNotFoundError);
    expect(error).toMatchObject({ entityType: 'device', entityId: 'dev-missing', field: 'deviceId' });
  });

  it('rejects a reference into another residence', async () => {
    const error = await guard(createMockMeasurement({ residentId: 'res-other' })).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(CrossTenantViolationError);
    expect(error).toHaveProperty(
      'message',
      'measurement.residentId belongs to residence residence-2, expected residence-1'
    );
  });

  it('checks rooms against their floor', async () => {
    await expect(
      ownershipGuard({
        entityType: 'room',
        operation: 'insert',
        record: createMockRoom('floor-missing'),
        prior: null,
        repos,
        now: T0,
      })
    ).rejects.toMatchObject({ code: 'REFERENCE_NOT_FOUND', entityType: 'floor' });
  });

  function guardResidentTag(record: ResidentTag) {
    return ownershipGuard({
      entityType: 'resident_tag',
      operation: 'insert',
      record,
      prior: null,
      repos,
      now: T0,
    });
  }

  it('rejects a resident tag whose tag does not exist', async () => {
    const error = await guardResidentTag(createMockResidentTag('tag-missing')).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ReferenceNotFoundError);
    expect(error).toMatchObject({ entityType: 'tag', entityId: 'tag-missing', field: 'tagId' });
  });

  it('accepts a tag from any residence, since tags are global', async () => {
    await repos.tags.insert({
      id: 'tag-1',
      name: 'fall risk',
      createdBy: null,
      createdAt: T0,
      updatedAt: T0,
      deletedAt: null,
    });
    const record = createMockResidentTag('tag-1');

    await expect(guardResidentTag(record)).resolves.toEqual({ record });
  });
});
