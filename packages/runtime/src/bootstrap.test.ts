import { describe, it, expect } from 'vitest';
import { createPostgresLedger } from './bootstrap.js';
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';

describe('createPostgresLedger', () => {
  it('refuses to start without a database URL', () => {
    expect(() => createPostgresLedger(loadConfig({}), createLogger({ level: 'silent' }))).toThrow(
      ConfigError
    );
  });
});
