import type { Resident, ResidentMovement } from '@careledger/protocol';

/**
 * Classify a resident update for the event log. The first matching rule wins:
 * bed taken, bed released, status changed, residence changed, bed swapped.
 */
export function classifyResidentMovement(before: Resident, after: Resident): ResidentMovement | null {
  if (before.bedId === null && after.bedId !== null) return 'bed_assignment';
  if (before.bedId !== null && after.bedId === null) return 'bed_removal';
  if (before.status !== after.status) return 'status_change';
  if (before.residenceId !== after.residenceId) return 'residence_transfer';
  if (before.bedId !== after.bedId) return 'bed_assignment';
  return null;
}
