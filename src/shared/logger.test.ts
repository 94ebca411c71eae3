import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, createLogger, formatLogLine, getLogLevel } from './logger.js';

describe('formatLogLine', () => {
  it('renders time, padded level, message and arguments', () => {
    const line = formatLogLine(
      'warn',
      'msg',
      ['a', new Error('x'), { k: 1 }],
      new Date('2026-01-02T03:04:05.000Z'),
    );

    expect(line).toBe('[2026-01-02T03:04:05.000Z] WARN  msg a Error: x {"k":1}');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    configureLogger({ level: 'warn', sink: null });
  });

  it('prefixes messages and filters by level', () => {
    const lines: string[] = [];
    configureLogger({ level: 'info', sink: (line) => lines.push(line) });
    const logger = createLogger('Test');

    logger.debug('hidden');
    logger.info('shown');

    expect(getLogLevel()).toBe('info');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ INFO  \[Test\] shown$/);
    expect(logger.isLevelEnabled('debug')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('drops everything when silent', () => {
    const lines: string[] = [];
    configureLogger({ level: 'silent', sink: (line) => lines.push(line) });

    createLogger().error('nobody hears this');

    expect(lines).toEqual([]);
  });
});
