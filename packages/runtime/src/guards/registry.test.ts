import { describe, it, expect } from 'vitest';
import type { Tag } from '@careledger/protocol';
import { inMemory } from '@careledger/repositories';
import { DEFAULT_GUARDS, runGuards } from './registry.js';
import type { Guard } from './types.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';
const NOW = '2024-02-01T00:00:00.000Z';

function createMockTag(): Tag {
  return {
    id: 'tag-1',
    name: 'diabetic',
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
  };
}

describe('runGuards', () => {
  const repos = inMemory.createInMemoryRepositoryContext();

  it('feeds each guard the row rewritten by the previous one', async () => {
    const seen: string[] = [];
    const rename: Guard<'tag'> = ({ record }) => ({ record: { ...record, name: 'renamed' } });
    const observe: Guard<'tag'> = ({ record }) => {
      seen.push(record.name);
      return { record, events: [{ action: 'update', payload: { step: 2 } }] };
    };

    const result = await runGuards([rename, observe], {
      entityType: 'tag',
      operation: 'insert',
      record: createMockTag(),
      prior: null,
      repos,
      now: NOW,
    });

    expect(seen).toEqual(['renamed']);
    expect(result.record.name).toBe('renamed');
    expect(result.events).toEqual([{ action: 'update', payload: { step: 2 } }]);
  });

  it('stops at the first guard that throws', async () => {
    const calls: string[] = [];
    const fail: Guard<'tag'> = () => {
      calls.push('fail');
      throw new Error('rejected');
    };
    const after: Guard<'tag'> = ({ record }) => {
      calls.push('after');
      return { record };
    };

    await expect(
      runGuards([fail, after], {
        entityType: 'tag',
        operation: 'insert',
        record: createMockTag(),
        prior: null,
        repos,
        now: NOW,
      })
    ).rejects.toThrow('rejected');
    expect(calls).toEqual(['fail']);
  });

  it('stamps updatedAt with the mutation clock for every default list', async () => {
    const result = await runGuards(DEFAULT_GUARDS.tag, {
      entityType: 'tag',
      operation: 'update',
      record: createMockTag(),
      prior: createMockTag(),
      repos,
      now: NOW,
    });

    expect(result.record.updatedAt).toBe(NOW);
    expect(result.record.createdAt).toBe(T0);
  });

  it('ends every default list with the timestamp guard', () => {
    for (const guards of Object.values(DEFAULT_GUARDS)) {
      expect(guards[guards.length - 1]?.name).toBe('timestampGuard');
    }
  });
});
