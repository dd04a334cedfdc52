#!/usr/bin/env tsx

/**
 * retailsql CLI entrypoint.
 */

import 'dotenv/config';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import {
  DefaultPolicyEngine,
  RETAIL_TABLES,
  describeSettings,
  errorMessage,
  openDatabase,
  parseDatabaseUrl,
  seedDatabase,
  type SchemaProvider,
  type Settings,
} from '@retailsql/core';
import { ChatController, runChat, formatTurn } from './chat.js';
import { EXIT_CODE_SUCCESS, policyError, runtimeError, toExitCode, turnError, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { createCliLogger, loadCliSettings, openDatabaseHandle, openSession } from './session.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

type GlobalOptions = {
  config?: string;
};

function settingsFor(command: Command): Settings {
  return loadCliSettings(command.optsWithGlobals<GlobalOptions>().config);
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function tableSummaryRows(schema: SchemaProvider): { table: string }[] {
  return schema.tableNames().map((table) => ({ table }));
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('retailsql')
  .description('Ask questions about the retail database in plain English')
  .option('-c, --config <file>', 'JSON settings file (environment variables take precedence)')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:  doctor, seed, schema
  Query:  ask, chat
  Safety: validate
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const settings = settingsFor(this);

          const target = parseDatabaseUrl(settings.databaseUrl);
          const database =
            target.dialect === 'sqlite'
              ? { dialect: target.dialect, path: target.path, exists: existsSync(target.path) }
              : { dialect: target.dialect };

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            settings: describeSettings(settings),
            database,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('retailsql doctor', output);
          printHuman('================', output);
          printHuman('', output);
          printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? 'ok' : '(requires >=20)'}`, output);
          printHuman(`OpenAI key: ${settings.openaiApiKey ? 'set' : 'not set'}`, output);
          printHuman(`Endpoint:   ${settings.openaiBaseUrl ?? 'OpenAI (default)'}`, output);
          printHuman(`LLM model:  ${settings.model}`, output);
          if (target.dialect === 'sqlite') {
            printHuman(
              `Database:   ${target.path} ${existsSync(target.path) ? '(exists)' : '(missing, run "retailsql seed")'}`,
              output,
            );
          } else {
            printHuman('Database:   postgres', output);
          }
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Context window:     ${settings.contextWindowSize} turns`, output);
          printHuman(`  Token budget:       ${settings.maxTokens}`, output);
          printHuman(`  Max rows:           ${settings.maxRows}`, output);
          printHuman(`  Generation timeout: ${settings.generationTimeoutMs}ms`, output);
          printHuman(`  Execution timeout:  ${settings.executionTimeoutMs}ms`, output);
        });
      }),
  ),
  ['retailsql doctor', 'retailsql doctor --json'],
);

// ── seed ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('seed')
      .description('Create the retail tables in the SQLite database and fill them with sample data')
      .option('--orders <n>', 'Number of orders to generate', parsePositiveInt, 50)
      .option('--seed <n>', 'Random seed', parsePositiveInt, 42)
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const opts = this.opts<{ orders: number; seed: number }>();
          const settings = settingsFor(this);
          const target = parseDatabaseUrl(settings.databaseUrl);
          if (target.dialect !== 'sqlite') {
            throw usageError('Seeding is only supported for SQLite databases.');
          }

          const db = openDatabase(target.path, false);
          try {
            const summary = seedDatabase(db, { orders: opts.orders, seed: opts.seed });
            if (output.json) {
              printCommandSuccess({ path: target.path, ...summary }, output);
              return;
            }
            printHuman(`Seeded ${target.path}:`, output);
            printHuman(`  ${summary.stores} stores, ${summary.customers} customers, ${summary.products} products`, output);
            printHuman(`  ${summary.orders} orders with ${summary.orderItems} items`, output);
          } catch (err: unknown) {
            throw runtimeError(`Seeding failed: ${errorMessage(err)}`);
          } finally {
            db.close();
          }
        });
      }),
  ),
  ['retailsql seed', 'retailsql seed --orders 200 --seed 7'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Show the schema description handed to the model')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const settings = settingsFor(this);
          const logger = createCliLogger(settings, output);
          const { executor, schema } = await openDatabaseHandle(settings, logger);
          try {
            if (output.json) {
              printCommandSuccess(
                { target: executor.target, tables: schema.tableNames(), description: schema.describe() },
                output,
              );
              return;
            }
            if (output.verbose) {
              printHumanTable(['table'], tableSummaryRows(schema), output);
              printHuman('', output);
            }
            printHuman(schema.describe(), output);
          } finally {
            await executor.close();
          }
        });
      }),
  ),
  ['retailsql schema', 'retailsql schema --json'],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('validate')
      .description('Check a SQL statement against the safety rules without running it')
      .argument('<sql>', 'SQL statement')
      .option('--bundled', 'Use the bundled retail tables instead of reading the database', false)
      .action(async function (this: Command, sql: string) {
        await runCommand(this, async (output) => {
          const opts = this.opts<{ bundled: boolean }>();

          let engine: DefaultPolicyEngine;
          if (opts.bundled) {
            engine = new DefaultPolicyEngine(RETAIL_TABLES);
          } else {
            const settings = settingsFor(this);
            const { executor, schema } = await openDatabaseHandle(settings, createCliLogger(settings, output));
            engine = new DefaultPolicyEngine(schema.tableNames(), executor.dialect);
            await executor.close();
          }

          const verdict = engine.validate(sql);
          const payload = {
            isValid: verdict.isValid,
            reason: verdict.reason ?? null,
            code: verdict.code ?? null,
            tablesReferenced: [...verdict.tablesReferenced],
          };

          if (!verdict.isValid) {
            throw policyError(`SQL validation failed: ${verdict.reason ?? 'unknown reason'}`, payload);
          }

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }
          printHuman('SQL is valid.', output);
          printHuman(`Tables: ${payload.tablesReferenced.join(', ') || '(none)'}`, output);
        });
      }),
  ),
  ['retailsql validate "SELECT * FROM stores"', 'retailsql validate "DROP TABLE stores" --bundled --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask one question: generate SQL, validate it, run it and show the results')
      .argument('<question>', 'Natural language question')
      .action(async function (this: Command, question: string) {
        await runCommand(this, async (output) => {
          const settings = settingsFor(this);
          const session = await openSession(settings, createCliLogger(settings, output));
          try {
            const result = await session.workflow.processQuery(question);

            if (!result.success) {
              throw turnError(result.errorCode, result.errorMessage ?? 'Unknown error', {
                sqlQuery: result.sqlQuery ?? null,
                stages: result.stages,
              });
            }

            if (output.json) {
              printCommandSuccess(
                {
                  userQuery: result.userQuery,
                  sqlQuery: result.sqlQuery,
                  columns: result.execution?.columns ?? [],
                  rows: result.execution?.rows ?? [],
                  rowCount: result.execution?.rowCount ?? 0,
                  truncated: result.execution?.truncated ?? false,
                  stages: result.stages,
                },
                output,
              );
              return;
            }
            printHuman(formatTurn(result, output.verbose), output);
          } finally {
            await session.close();
          }
        });
      }),
  ),
  [
    'retailsql ask "How many orders did each store take?"',
    'retailsql ask "Top 5 products by revenue" --json',
  ],
);

// ── chat ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('chat')
      .description('Start an interactive session that remembers earlier questions')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const settings = settingsFor(this);
          const session = await openSession(settings, createCliLogger(settings, output));
          try {
            printHuman(`Connected to ${session.executor.target}. Type :help for commands, :quit to leave.`, output);
            const controller = new ChatController(session.workflow, { verbose: output.verbose });
            await runChat(controller, {
              input: process.stdin,
              print: (text) => printHuman(text, output),
              warn: (text) => printWarning(text, output),
            });
          } finally {
            await session.close();
          }
        });
      }),
  ),
  ['retailsql chat', 'retailsql --config retailsql.json chat --verbose'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = error.exitCode === 0 ? EXIT_CODE_SUCCESS : 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
