import type { EntityType } from '@careledger/protocol';
import type { GuardContext, GuardResult } from './types.js';

/**
 * Stamp updatedAt with the mutation clock, overriding whatever the row carried.
 */
export function timestampGuard<K extends EntityType>(context: GuardContext<K>): GuardResult<K> {
  return { record: { ...context.record, updatedAt: context.now } };
}
