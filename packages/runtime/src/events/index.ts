export { appendChangeEvent, appendDerivedEvents, type EventSubject } from './event-log.js';
export { classifyResidentMovement } from './movement.js';
