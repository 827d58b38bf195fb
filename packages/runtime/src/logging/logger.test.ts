// Tests for structured logging

import { describe, it, expect } from 'vitest';
import {
  createCapturingLogger,
  createEntryLogger,
  createLevelLogger,
  formatLogLine,
  type LogEntry,
} from './logger.js';

describe('formatLogLine', () => {
  it('formats level and message', () => {
    expect(formatLogLine('warn', 'Large proof count')).toBe('[WARN] Large proof count');
  });

  it('appends data as JSON', () => {
    expect(formatLogLine('debug', 'Estimated', { batches: 20 })).toBe(
      '[DEBUG] Estimated {"batches":20}'
    );
  });
});

describe('createLevelLogger', () => {
  it('drops entries below the threshold', () => {
    const lines: string[] = [];
    const logger = createLevelLogger((line) => lines.push(line), 'warn');

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d', { code: 'X' });

    expect(lines).toEqual(['[WARN] c', '[ERROR] d {"code":"X"}']);
  });

  it('emits everything at debug', () => {
    const lines: string[] = [];
    const logger = createLevelLogger((line) => lines.push(line), 'debug');
    logger.debug('a');
    logger.info('b');
    expect(lines).toEqual(['[DEBUG] a', '[INFO] b']);
  });

  it('emits nothing when silent', () => {
    const lines: string[] = [];
    const logger = createLevelLogger((line) => lines.push(line), 'silent');
    logger.error('a');
    expect(lines).toEqual([]);
  });
});

describe('createEntryLogger', () => {
  it('passes entries at or above the threshold', () => {
    const entries: LogEntry[] = [];
    const logger = createEntryLogger((entry) => entries.push(entry), 'info');

    logger.debug('hidden');
    logger.info('shown', { n: 2 });
    logger.error('failed');

    expect(entries).toEqual([
      { level: 'info', message: 'shown', data: { n: 2 } },
      { level: 'error', message: 'failed' },
    ]);
  });
});

describe('createCapturingLogger', () => {
  it('records entries in order', () => {
    const logger = createCapturingLogger();
    logger.info('first', { n: 1 });
    logger.warn('second');

    expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
      ['info', 'first'],
      ['warn', 'second'],
    ]);
    expect(logger.entries[0].data).toEqual({ n: 1 });
  });

  it('keeps debug entries', () => {
    const logger = createCapturingLogger();
    logger.debug('detail');
    expect(logger.entries).toEqual([{ level: 'debug', message: 'detail' }]);
  });
});
