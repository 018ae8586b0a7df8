export { recordHistory, snapshotFor, type RecordChangeInput } from './recorder.js';
