import type { Command } from 'commander';
import { errorMessage, formatTable, type Row } from '@retailsql/core';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

type OutputFlags = Partial<Record<keyof OutputOptions, boolean>>;

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals<OutputFlags>();
  return {
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    debug: opts.debug === true,
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Row[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

/** The generated SQL a failed turn carried, if any. */
export function failedSql(error: unknown): string | undefined {
  if (!(error instanceof CliError)) return undefined;
  const { details } = error;
  if (typeof details !== 'object' || details === null || !('sqlQuery' in details)) return undefined;
  return typeof details.sqlQuery === 'string' ? details.sqlQuery : undefined;
}

export interface ErrorPayload {
  ok: false;
  code: string;
  message: string;
  sqlQuery?: string;
  details?: unknown;
}

export function errorPayload(error: unknown, debug: boolean): ErrorPayload {
  const payload: ErrorPayload = {
    ok: false,
    code: error instanceof CliError ? error.code : 'INTERNAL_ERROR',
    message: errorMessage(error),
  };
  const sql = failedSql(error);
  if (sql !== undefined) {
    payload.sqlQuery = sql;
  }
  if (debug) {
    payload.details =
      error instanceof CliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
  }
  return payload;
}

export function printError(error: unknown, output: OutputOptions): void {
  if (output.json) {
    printJson(errorPayload(error, output.debug));
    return;
  }

  const sql = failedSql(error);
  if (sql !== undefined) {
    console.error(`SQL: ${sql}`);
  }
  console.error(`Error: ${errorMessage(error)}`);
  if (output.debug) {
    if (error instanceof CliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show stage timings and extra context', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
