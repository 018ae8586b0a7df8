import { describe, it, expect } from 'vitest';
import type { Resident } from '@careledger/protocol';
import { classifyResidentMovement } from './movement.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';

function createMockResident(overrides: Partial<Resident> = {}): Resident {
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

describe('classifyResidentMovement', () => {
  it('classifies taking a bed', () => {
    expect(
      classifyResidentMovement(createMockResident(), createMockResident({ bedId: 'bed-1' }))
    ).toBe('bed_assignment');
  });

  it('classifies moving between beds as a bed assignment', () => {
    expect(
      classifyResidentMovement(
        createMockResident({ bedId: 'bed-1' }),
        createMockResident({ bedId: 'bed-2' })
      )
    ).toBe('bed_assignment');
  });

  it('prefers bed removal over the status change that caused it', () => {
    expect(
      classifyResidentMovement(
        createMockResident({ bedId: 'bed-1' }),
        createMockResident({ status: 'discharged' })
      )
    ).toBe('bed_removal');
  });

  it('classifies a status change without a bed', () => {
    expect(
      classifyResidentMovement(createMockResident(), createMockResident({ status: 'deceased' }))
    ).toBe('status_change');
  });

  it('prefers a status change over a residence transfer', () => {
    expect(
      classifyResidentMovement(
        createMockResident(),
        createMockResident({ status: 'discharged', residenceId: 'residence-2' })
      )
    ).toBe('status_change');
  });

  it('classifies a residence transfer', () => {
    expect(
      classifyResidentMovement(createMockResident(), createMockResident({ residenceId: 'residence-2' }))
    ).toBe('residence_transfer');
  });

  it('returns null for other edits', () => {
    expect(
      classifyResidentMovement(createMockResident(), createMockResident({ comments: 'Prefers tea' }))
    ).toBeNull();
  });
});
