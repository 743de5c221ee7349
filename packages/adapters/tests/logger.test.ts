import { describe, expect, it } from 'vitest';
import { FakeLogger, PinoLogger, createLogger } from '../src/index';

describe('PinoLogger', () => {
  it('writes structured lines with child bindings', () => {
    const lines: string[] = [];
    const logger = new PinoLogger({ level: 'debug', destination: { write: (line: string) => { lines.push(line); } } });

    logger.child({ store: 'TestStore' }).debug({ threadId: 't1' }, 'Stored checkpoint');
    logger.trace('below the level');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 20, store: 'TestStore', threadId: 't1', msg: 'Stored checkpoint' });
  });

  it('is built from logging config', () => {
    expect(createLogger({ level: 'warn', prettyPrint: false })).toBeInstanceOf(PinoLogger);
  });
});

describe('FakeLogger', () => {
  it('shares entries with its children and prepends their bindings', () => {
    const logger = new FakeLogger();

    logger.info('plain');
    logger.child({ store: 'A' }).child({ op: 'put' }).warn({ id: 1 }, 'careful');
    logger.child({ store: 'A' }).error('boom');

    expect(logger.logs).toEqual([
      { level: 'info', msg: 'plain' },
      { level: 'warn', obj: { store: 'A', op: 'put', id: 1 }, msg: 'careful' },
      { level: 'error', obj: { store: 'A' }, msg: 'boom' }
    ]);
    expect(logger.entries('warn')).toHaveLength(1);
  });
});
