import {
  MEASUREMENT_FIELD_GROUPS,
  MEASUREMENT_VALUE_FIELDS,
  MalformedMeasurementError,
  type Measurement,
} from '@careledger/protocol';
import type { GuardContext, GuardResult } from './types.js';

/**
 * Throw unless exactly the field group of the measurement's type is populated:
 * every required field set, every field outside the group null.
 */
export function assertMeasurementShape(measurement: Measurement): void {
  const group = MEASUREMENT_FIELD_GROUPS[measurement.type];

  for (const field of group.required) {
    if (measurement[field] === null) {
      throw new MalformedMeasurementError(measurement.type, field, 'missing');
    }
  }

  for (const field of MEASUREMENT_VALUE_FIELDS) {
    if (group.required.includes(field) || group.optional.includes(field)) continue;
    if (measurement[field] !== null) {
      throw new MalformedMeasurementError(measurement.type, field, 'unexpected');
    }
  }
}

export function measurementShapeGuard(
  context: GuardContext<'measurement'>
): GuardResult<'measurement'> {
  assertMeasurementShape(context.record);
  return { record: context.record };
}
