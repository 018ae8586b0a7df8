export { Ledger, createLedger, type LedgerOptions } from './ledger.js';
export { DESCRIPTORS, markDeleted, type EntityDescriptor } from './descriptors.js';
