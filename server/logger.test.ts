import { describe, it, expect } from 'vitest';
import { createLogger, formatLogLine } from './logger.ts';
import type { LogLevel } from './config.ts';

const STAMP = new Date('2026-01-02T03:04:05.000Z');

describe('logger', () => {
  it('formats lines as stamp, level, module and message', () => {
    expect(formatLogLine(STAMP, 'warn', 'ws', 'conn 3 closed')).toBe(
      '2026-01-02T03:04:05.000Z | warn | ws | conn 3 closed'
    );
  });

  it('drops lines below the threshold', () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger('info', (level, line) => lines.push([level, line]), () => STAMP);
    logger.debug('server', 'hidden');
    logger.info('session', 'main-menu -> countdown (score 0)');
    logger.error('server', 'boom');
    expect(lines).toEqual([
      ['info', '2026-01-02T03:04:05.000Z | info | session | main-menu -> countdown (score 0)'],
      ['error', '2026-01-02T03:04:05.000Z | error | server | boom']
    ]);
  });

  it('passes everything at debug', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (_level, line) => lines.push(line), () => STAMP);
    logger.debug('server', 'tick');
    expect(lines).toEqual(['2026-01-02T03:04:05.000Z | debug | server | tick']);
  });
});
