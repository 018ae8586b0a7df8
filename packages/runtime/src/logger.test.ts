import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

function capture() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { lines, stream };
}

describe('createLogger', () => {
  it('applies the requested level', () => {
    expect(createLogger({ level: 'warn' }).level).toBe('warn');
    expect(createLogger().level).toBe('info');
  });

  it('redacts record payloads in log lines', () => {
    const { lines, stream } = capture();
    const logger = createLogger({ destination: stream });

    logger.info({ payload: { fullName: 'Ana Ruiz' }, entityId: 'res-1' }, 'event appended');
    logger.child({ component: 'ledger' }).warn({ details: { record: { bedId: 'bed-1' } } }, 'rejected');

    const first: unknown = JSON.parse(lines[0] ?? '{}');
    const second: unknown = JSON.parse(lines[1] ?? '{}');
    expect(first).toMatchObject({
      name: 'careledger',
      payload: '[redacted]',
      entityId: 'res-1',
      msg: 'event appended',
    });
    expect(second).toMatchObject({ component: 'ledger', details: { record: '[redacted]' } });
  });
});
