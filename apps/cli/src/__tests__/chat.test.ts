import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  SnapshotSchemaProvider,
  SqliteExecutor,
  TextToSqlWorkflow,
  openDatabase,
  retailSchemaSnapshot,
  seedDatabase,
  type GenerationContext,
  type SqlGenerator,
} from '@retailsql/core';
import {
  ChatController,
  defaultExportPath,
  formatContextSummary,
  formatTurn,
  parseMetaCommand,
} from '../chat.js';

class QueueGenerator implements SqlGenerator {
  readonly model = 'queue';

  constructor(private readonly replies: string[]) {}

  async generate(_schema: string, _context: GenerationContext, _userQuery: string): Promise<string> {
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('no reply left');
    return reply;
  }
}

describe('parseMetaCommand', () => {
  it('leaves questions alone', () => {
    assert.equal(parseMetaCommand('show all stores'), undefined);
  });

  it('reads each command', () => {
    assert.deepEqual(parseMetaCommand(':context'), { kind: 'context' });
    assert.deepEqual(parseMetaCommand('  :clear  '), { kind: 'clear' });
    assert.deepEqual(parseMetaCommand(':export'), { kind: 'export' });
    assert.deepEqual(parseMetaCommand(':export out/history.json'), { kind: 'export', path: 'out/history.json' });
    assert.deepEqual(parseMetaCommand(':QUIT'), { kind: 'quit' });
    assert.deepEqual(parseMetaCommand(':exit'), { kind: 'quit' });
    assert.deepEqual(parseMetaCommand(':history'), { kind: 'unknown', name: 'history' });
  });
});

describe('defaultExportPath', () => {
  it('stamps the file name with the local date and time', () => {
    assert.equal(defaultExportPath(new Date(2024, 5, 1, 9, 5, 3)), 'context-export-20240601-090503.json');
  });
});

describe('formatContextSummary', () => {
  it('lists window, outcomes and tokens', () => {
    const text = formatContextSummary({
      totalTurns: 3,
      successfulTurns: 2,
      failedTurns: 1,
      windowCapacity: 10,
      windowUsage: 3,
      tokenUsage: 25,
      tokenBudget: 4000,
      isWindowFull: false,
      isTokenPressure: false,
    });
    assert.equal(
      text,
      'Context Summary:\n  Turns in window: 3/10\n  Successful: 2\n  Failed: 1\n  Token usage: 25/4000',
    );
  });
});

describe('ChatController', () => {
  let executor: SqliteExecutor;

  beforeEach(() => {
    const db = openDatabase(':memory:', false);
    seedDatabase(db, { now: new Date('2024-06-01T12:00:00Z') });
    executor = new SqliteExecutor(db);
  });

  afterEach(async () => {
    await executor.close();
  });

  function controller(replies: string[], written: [string, string][] = []): ChatController {
    const workflow = new TextToSqlWorkflow({
      generator: new QueueGenerator(replies),
      executor,
      schema: new SnapshotSchemaProvider(retailSchemaSnapshot()),
    });
    return new ChatController(workflow, {
      writeFile: (path, data) => written.push([path, data]),
      now: () => new Date(2024, 5, 1, 12, 30, 0),
    });
  }

  it('answers a question with the SQL and the results', async () => {
    const chat = controller(['SELECT name FROM stores ORDER BY id LIMIT 1']);
    const reply = await chat.handle('What is the first store?');

    assert.equal(reply.done, false);
    assert.ok(reply.text?.startsWith('SQL: SELECT name FROM stores ORDER BY id LIMIT 1;\n\nQuery Results:\n'));
    assert.equal(reply.warning, undefined);
  });

  it('shows a failed turn as a failure block', async () => {
    const chat = controller(['DROP TABLE stores']);
    const reply = await chat.handle('Drop the stores');
    assert.equal(
      reply.text,
      'SQL: DROP TABLE stores;\n\nQuery Failed:\n\nSQL validation failed: Forbidden keyword found: DROP',
    );
  });

  it('ignores blank lines', async () => {
    assert.deepEqual(await controller([]).handle('   '), { done: false });
  });

  it('summarizes, exports and clears the context', async () => {
    const written: [string, string][] = [];
    const chat = controller(['SELECT name FROM stores', 'SELECT * FROM users'], written);
    await chat.handle('Store names');
    await chat.handle('Show users');

    const summary = await chat.handle(':context');
    assert.match(summary.text ?? '', /Turns in window: 2\/10\n {2}Successful: 1\n {2}Failed: 1/);

    const exported = await chat.handle(':export');
    assert.equal(exported.text, 'Context exported to context-export-20240601-123000.json');
    assert.equal(written.length, 1);
    const entries: unknown = JSON.parse(written[0][1]);
    assert.ok(Array.isArray(entries));
    assert.equal(entries.length, 2);

    await chat.handle(':export saved.json');
    assert.equal(written[1][0], 'saved.json');

    assert.equal((await chat.handle(':clear')).text, 'Context cleared.');
    assert.match((await chat.handle(':context')).text ?? '', /Turns in window: 0\/10/);
  });

  it('keeps the session going when an export cannot be written', async () => {
    const workflow = new TextToSqlWorkflow({
      generator: new QueueGenerator(['SELECT name FROM stores ORDER BY id LIMIT 1']),
      executor,
      schema: new SnapshotSchemaProvider(retailSchemaSnapshot()),
    });
    const chat = new ChatController(workflow, {
      writeFile: () => {
        throw new Error('EACCES: permission denied');
      },
    });

    assert.deepEqual(await chat.handle(':export /readonly/context.json'), {
      warning: 'Export failed: EACCES: permission denied',
      done: false,
    });
    const reply = await chat.handle('What is the first store?');
    assert.equal(reply.done, false);
    assert.ok(reply.text?.startsWith('SQL: SELECT name FROM stores ORDER BY id LIMIT 1;\n'));
  });

  it('warns about unknown commands and stops on :quit', async () => {
    const chat = controller([]);
    assert.deepEqual(await chat.handle(':nope'), {
      warning: 'Unknown command ":nope". Type :help for commands.',
      done: false,
    });
    assert.equal((await chat.handle(':quit')).done, true);
  });
});

describe('formatTurn', () => {
  it('adds stage timings in verbose mode', () => {
    const text = formatTurn(
      {
        success: false,
        userQuery: 'q',
        errorMessage: 'Text-to-SQL conversion failed: rate limited',
        errorCode: 'GENERATION_FAILED',
        contextSummary: {
          totalTurns: 1,
          successfulTurns: 0,
          failedTurns: 1,
          windowCapacity: 10,
          windowUsage: 1,
          tokenUsage: 1,
          tokenBudget: 4000,
          isWindowFull: false,
          isTokenPressure: false,
        },
        trace: ['GENERATING', 'VALIDATING', 'TERMINATED'],
        stages: [
          { name: 'generate', status: 'failed', durationMs: 12, error: 'Text-to-SQL conversion failed: rate limited' },
          { name: 'validate', status: 'skipped', durationMs: 0 },
        ],
      },
      true,
    );
    assert.equal(
      text,
      'Query Failed:\n\nText-to-SQL conversion failed: rate limited\n\nStages: generate failed 12ms, validate skipped 0ms',
    );
  });
});
