// Bed assignment guard
//
// Couples a resident's bed to their status and keeps the bed inside the
// resident's residence. The occupancy rule itself is the store's unique
// index, checked when the row is written.

import {
  CrossTenantViolationError,
  ReferenceNotFoundError,
  type AssignBedPayload,
  type Resident,
} from '@careledger/protocol';
import type { DerivedEvent, GuardContext, GuardResult } from './types.js';

export async function bedAssignmentGuard(
  context: GuardContext<'resident'>
): Promise<GuardResult<'resident'>> {
  const { now, prior, repos } = context;
  let record: Resident = context.record;

  if (record.status !== 'active') {
    record = {
      ...record,
      statusChangedAt: record.statusChangedAt ?? now,
      deletedAt: record.deletedAt ?? now,
      bedId: null,
    };
  }

  if (record.bedId !== null) {
    const bed = await repos.beds.get(record.bedId);
    if (!bed) {
      throw new ReferenceNotFoundError('bed', record.bedId, { field: 'bedId' });
    }
    if (bed.residenceId !== record.residenceId) {
      throw new CrossTenantViolationError({
        entityType: 'resident',
        entityId: record.id,
        field: 'bedId',
        expectedResidenceId: record.residenceId,
        actualResidenceId: bed.residenceId,
      });
    }
  }

  const events: DerivedEvent[] = [];
  if (context.operation === 'update' && prior && prior.bedId !== record.bedId) {
    const payload: AssignBedPayload = { oldBedId: prior.bedId, newBedId: record.bedId };
    events.push({ action: 'assign_bed', payload });
  }

  return { record, events };
}
