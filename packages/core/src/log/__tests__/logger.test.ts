import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createConsoleLogger, formatLogLine, isLogLevel } from '../logger.js';

describe('formatLogLine', () => {
  it('tags level and component and appends data as JSON', () => {
    assert.equal(
      formatLogLine('info', 'Validator', 'SQL accepted', { tables: ['stores'] }),
      '[INFO] [Validator] SQL accepted {"tables":["stores"]}',
    );
  });

  it('omits empty data and a missing component', () => {
    assert.equal(formatLogLine('warn', undefined, 'careful', {}), '[WARN] careful');
  });
});

describe('createConsoleLogger', () => {
  it('drops lines below the configured level', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('warn', 'Executor', (line) => lines.push(line));
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');
    assert.deepEqual(lines, ['[WARN] [Executor] shown', '[ERROR] [Executor] also shown']);
  });

  it('children share the sink and level under a new tag', () => {
    const lines: string[] = [];
    const root = createConsoleLogger('debug', undefined, (line) => lines.push(line));
    root.child('TextToSql').debug('prompt built');
    assert.deepEqual(lines, ['[DEBUG] [TextToSql] prompt built']);
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('silent', 'X', (line) => lines.push(line));
    logger.error('nope');
    assert.deepEqual(lines, []);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    assert.equal(isLogLevel('debug'), true);
    assert.equal(isLogLevel('verbose'), false);
  });
});
