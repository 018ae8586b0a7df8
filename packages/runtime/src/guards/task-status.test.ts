import { describe, it, expect, beforeEach } from 'vitest';
import {
  InvalidIndexError,
  type TaskApplication,
  type TaskTemplate,
} from '@careledger/protocol';
import { inMemory } from '@careledger/repositories';
import { resolveStatusText, taskStatusGuard } from './task-status.js';
import type { GuardContext } from './types.js';

// --- Test Fixtures ---

const T0 = '2024-01-01T00:00:00.000Z';

function createMockTemplate(overrides: Partial<TaskTemplate> = {}): TaskTemplate {
  return {
    id: 'tpl-1',
    residenceId: 'residence-1',
    taskCategoryId: 'cat-1',
    name: 'Morning hygiene',
    status1: 'Done',
    status2: 'Partially done',
    status3: 'Refused',
    status4: null,
    status5: null,
    status6: 'Not applicable',
    audioPhrase: null,
    isBlock: null,
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
    ...overrides,
  };
}

function createMockApplication(overrides: Partial<TaskApplication> = {}): TaskApplication {
  return {
    id: 'app-1',
    residenceId: 'residence-1',
    residentId: 'res-1',
    taskTemplateId: 'tpl-1',
    appliedBy: 'user-1',
    appliedAt: T0,
    selectedStatusIndex: null,
    selectedStatusText: null,
    createdAt: T0,
    updatedAt: T0,
    deletedAt: null,
    ...overrides,
  };
}

describe('resolveStatusText', () => {
  const template = createMockTemplate();

  it('maps index 1 to the first slot and 6 to the last', () => {
    expect(resolveStatusText(template, 1)).toBe('Done');
    expect(resolveStatusText(template, 6)).toBe('Not applicable');
  });

  it('returns null for an empty slot', () => {
    expect(resolveStatusText(template, 4)).toBeNull();
  });

  it('returns null for a null index or a missing template', () => {
    expect(resolveStatusText(template, null)).toBeNull();
    expect(resolveStatusText(null, 2)).toBeNull();
  });

  it.each([0, 7, -1, 2.5])('rejects index %s', (index) => {
    const call = () => resolveStatusText(template, index);

    expect(call).toThrow(InvalidIndexError);
    expect(call).toThrow(`Status index ${index} is outside [1, 6]`);
  });
});

describe('taskStatusGuard', () => {
  let repos: inMemory.InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = inMemory.createInMemoryRepositoryContext();
    await repos.taskTemplates.insert(createMockTemplate());
  });

  function context(record: TaskApplication): GuardContext<'task_application'> {
    return {
      entityType: 'task_application',
      operation: 'insert',
      record,
      prior: null,
      repos,
      now: T0,
    };
  }

  it('copies the selected label from the template', async () => {
    const result = await taskStatusGuard(context(createMockApplication({ selectedStatusIndex: 3 })));

    expect(result.record.selectedStatusText).toBe('Refused');
  });

  it('overwrites a stale label supplied by the caller', async () => {
    const result = await taskStatusGuard(
      context(createMockApplication({ selectedStatusIndex: 1, selectedStatusText: 'Old label' }))
    );

    expect(result.record.selectedStatusText).toBe('Done');
  });

  it('clears the label when no index is selected', async () => {
    const result = await taskStatusGuard(
      context(createMockApplication({ selectedStatusText: 'Leftover' }))
    );

    expect(result.record.selectedStatusText).toBeNull();
  });

  it('stores null when the template is missing', async () => {
    const result = await taskStatusGuard(
      context(createMockApplication({ taskTemplateId: 'tpl-gone', selectedStatusIndex: 2 }))
    );

    expect(result.record.selectedStatusText).toBeNull();
  });

  it('rejects an out-of-range index even when the template is missing', async () => {
    await expect(
      taskStatusGuard(
        context(createMockApplication({ taskTemplateId: 'tpl-gone', selectedStatusIndex: 7 }))
      )
    ).rejects.toMatchObject({ code: 'INVALID_INDEX', index: 7 });
  });
});
