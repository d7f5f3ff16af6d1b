import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, SILENT_LOGGER } from '../../src/core/logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => { lines.push(line); } };
}

describe('createLogger', () => {
  it('filters below the configured level', () => {
    const sink = capture();
    const logger = createLogger({ level: 'warn', write: sink.write });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(sink.lines).toEqual(['[WARN] [kir] w', '[ERROR] [kir] e']);
  });

  it('appends metadata as JSON', () => {
    const sink = capture();
    createLogger({ component: 'io', write: sink.write }).info('Wrote file', { path: 'a.kir', bytes: 12 });
    expect(sink.lines).toEqual(['[INFO] [io] Wrote file {"path":"a.kir","bytes":12}']);
  });

  it('attaches the error name and message', () => {
    const sink = capture();
    createLogger({ write: sink.write }).error('Failed', { op: 'read' }, new TypeError('boom'));
    expect(sink.lines).toEqual(['[ERROR] [kir] Failed {"op":"read","error":{"name":"TypeError","message":"boom"}}']);
  });

  it('nests child components', () => {
    const sink = capture();
    createLogger({ component: 'cli', write: sink.write }).child('decoder').child('binary').warn('x');
    expect(sink.lines).toEqual(['[WARN] [cli:decoder:binary] x']);
  });

  it('writes one JSON object per line in json format', () => {
    const sink = capture();
    createLogger({ format: 'json', component: 'io', write: sink.write }).info('hello', { n: 1 });
    expect(sink.lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(sink.lines[0]);
    expect(parsed).toMatchObject({ level: 'info', component: 'io', msg: 'hello', n: 1 });
  });

  it('emits nothing when silent', () => {
    const sink = capture();
    const logger = createLogger({ level: 'silent', write: sink.write });
    logger.error('e');
    expect(sink.lines).toEqual([]);
    expect(() => SILENT_LOGGER.error('quiet')).not.toThrow();
  });
});

describe('isLogLevel', () => {
  it('recognizes the level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
