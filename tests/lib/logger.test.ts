import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel } from '../../src/lib/logger.js';

function captureSink() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    sink: {
      log: (line: string) => out.push(line),
      warn: (line: string) => err.push(line),
      error: (line: string) => err.push(line),
    },
  };
}

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

describe('createLogger', () => {
  it('formats lines with timestamp, level and scope', () => {
    const { out, sink } = captureSink();
    const logger = createLogger({ sink, now: fixedNow, scope: 'rotation' });

    logger.info('DNS changed to: 1.1.1.1, 1.0.0.1');

    expect(out).toEqual(['2026-01-02T03:04:05.000Z INFO [rotation] DNS changed to: 1.1.1.1, 1.0.0.1']);
  });

  it('drops messages below the configured level', () => {
    const { out, err, sink } = captureSink();
    const logger = createLogger({ level: 'warn', sink, now: fixedNow });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(out).toEqual([]);
    expect(err).toEqual([
      '2026-01-02T03:04:05.000Z WARN shown',
      '2026-01-02T03:04:05.000Z ERROR shown too',
    ]);
  });

  it('nests child scopes and keeps the level', () => {
    const { out, sink } = captureSink();
    const logger = createLogger({ level: 'info', sink, now: fixedNow, scope: 'app' }).child('health');

    logger.debug('hidden');
    logger.info('probing');

    expect(out).toEqual(['2026-01-02T03:04:05.000Z INFO [app:health] probing']);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
