import { describe, it, expect } from 'vitest';
import { RECORD_SCHEMAS, TASK_STATUS_SLOT_COUNT } from './records.js';

describe('RECORD_SCHEMAS', () => {
  it('fills nullable resident fields with defaults', () => {
    const parsed = RECORD_SCHEMAS.resident.parse({
      residenceId: 'residence-1',
      fullName: 'Ana Ruiz',
      birthDate: '1938-02-11',
    });

    expect(parsed).toEqual({
      residenceId: 'residence-1',
      fullName: 'Ana Ruiz',
      birthDate: '1938-02-11',
      sex: null,
      comments: null,
      status: 'active',
      statusChangedAt: null,
      bedId: null,
      createdBy: null,
      deletedAt: null,
    });
  });

  it('strips store-assigned fields', () => {
    const parsed = RECORD_SCHEMAS.tag.parse({
      id: 'tag-1',
      createdAt: '2024-01-01T00:00:00.000Z',
      name: 'diabetic',
    });

    expect(parsed).toEqual({ name: 'diabetic', createdBy: null, deletedAt: null });
  });

  it('rejects an unknown resident status', () => {
    const result = RECORD_SCHEMAS.resident.safeParse({
      residenceId: 'residence-1',
      fullName: 'Ana Ruiz',
      birthDate: '1938-02-11',
      status: 'transferred',
    });

    expect(result.success).toBe(false);
  });

  it('bounds device battery to [0, 100]', () => {
    const device = {
      residenceId: 'residence-1',
      type: 'pulse_oximeter',
      name: 'Oximeter',
      mac: 'AA:BB:CC:00:00:01',
    };

    expect(RECORD_SCHEMAS.device.safeParse({ ...device, batteryPercent: 100 }).success).toBe(true);
    expect(RECORD_SCHEMAS.device.safeParse({ ...device, batteryPercent: 101 }).success).toBe(false);
    expect(RECORD_SCHEMAS.device.safeParse({ ...device, batteryPercent: -1 }).success).toBe(false);
  });

  it('leaves the task status index range to the guard', () => {
    const result = RECORD_SCHEMAS.task_application.safeParse({
      residenceId: 'residence-1',
      residentId: 'res-1',
      taskTemplateId: 'tpl-1',
      appliedBy: 'user-1',
      appliedAt: '2024-01-01T08:00:00.000Z',
      selectedStatusIndex: 9,
    });

    expect(result.success).toBe(true);
  });

  it('rejects a malformed birth date', () => {
    const result = RECORD_SCHEMAS.resident.safeParse({
      residenceId: 'residence-1',
      fullName: 'Ana Ruiz',
      birthDate: '11/02/1938',
    });

    expect(result.success).toBe(false);
  });
});

describe('TASK_STATUS_SLOT_COUNT', () => {
  it('is six', () => {
    expect(TASK_STATUS_SLOT_COUNT).toBe(6);
  });
});
