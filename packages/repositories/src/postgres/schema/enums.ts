import { pgEnum } from 'drizzle-orm/pg-core';
import {
  DEVICE_TYPES,
  MEASUREMENT_SOURCES,
  MEASUREMENT_TYPES,
  RESIDENT_STATUSES,
} from '@careledger/protocol';

export const residentStatusEnum = pgEnum('resident_status_enum', RESIDENT_STATUSES);
export const deviceTypeEnum = pgEnum('device_type_enum', DEVICE_TYPES);
export const measurementTypeEnum = pgEnum('measurement_type_enum', MEASUREMENT_TYPES);
export const measurementSourceEnum = pgEnum('measurement_source_enum', MEASUREMENT_SOURCES);
export const changeKindEnum = pgEnum('change_kind_enum', ['create', 'update', 'delete']);
