// Structured logging
//
// Record snapshots and event payloads carry clinical data and are never
// logged. The redact paths catch them if one slips into a log call.

import { pino, type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger } from 'pino';

const REDACT_PATHS = [
  'snapshot',
  'payload',
  'values',
  'record',
  '*.snapshot',
  '*.payload',
  '*.values',
  '*.record',
];

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;

  /** Defaults to stdout */
  destination?: DestinationStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? 'careledger',
    level: options.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}
