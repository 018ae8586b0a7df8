import {
  InvalidIndexError,
  TASK_STATUS_SLOTS,
  type TaskTemplate,
} from '@careledger/protocol';
import type { GuardContext, GuardResult } from './types.js';

/**
 * The template label selected by a 1-based status index.
 *
 * A missing template or an empty slot resolves to null; only an index
 * outside the slots is rejected.
 */
export function resolveStatusText(template: TaskTemplate | null, index: number | null): string | null {
  if (index === null) return null;

  const slot = TASK_STATUS_SLOTS[index - 1];
  if (!Number.isInteger(index) || slot === undefined) {
    throw new InvalidIndexError(index, { min: 1, max: TASK_STATUS_SLOTS.length });
  }

  return template ? template[slot] : null;
}

/**
 * Copy the selected status label from the template into the application.
 * Runs on every write, so re-saving picks up a relabelled template.
 */
export async function taskStatusGuard(
  context: GuardContext<'task_application'>
): Promise<GuardResult<'task_application'>> {
  const { record, repos } = context;

  if (record.selectedStatusIndex === null) {
    return { record: { ...record, selectedStatusText: null } };
  }

  // Checked before the lookup so a bad index fails even without a template
  resolveStatusText(null, record.selectedStatusIndex);

  const template = await repos.taskTemplates.get(record.taskTemplateId);
  return {
    record: {
      ...record,
      selectedStatusText: resolveStatusText(template, record.selectedStatusIndex),
    },
  };
}
