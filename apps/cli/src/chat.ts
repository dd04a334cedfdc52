/**
 * Interactive chat: one workflow (and so one context ledger) per session.
 *
 * Lines starting with ':' are meta-commands; anything else is a question.
 */

import { writeFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { errorMessage, formatFailure, type ContextSummary, type TextToSqlWorkflow, type TurnResult } from '@retailsql/core';

export type MetaCommand =
  | { kind: 'context' }
  | { kind: 'export'; path?: string }
  | { kind: 'clear' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'unknown'; name: string };

export const CHAT_HELP = [
  'Commands:',
  '  :context         show the conversation context summary',
  '  :export [file]   write the conversation context as JSON',
  '  :clear           forget the conversation so far',
  '  :help            show this help',
  '  :quit            leave the session',
].join('\n');

/** Undefined when the line is a question rather than a meta-command. */
export function parseMetaCommand(line: string): MetaCommand | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith(':')) return undefined;

  const [name, ...rest] = trimmed.slice(1).split(/\s+/);
  switch (name.toLowerCase()) {
    case 'context':
      return { kind: 'context' };
    case 'export':
      return rest.length > 0 ? { kind: 'export', path: rest.join(' ') } : { kind: 'export' };
    case 'clear':
      return { kind: 'clear' };
    case 'help':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'unknown', name };
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** context-export-YYYYMMDD-HHMMSS.json, in local time */
export function defaultExportPath(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `context-export-${date}-${time}.json`;
}

export function formatContextSummary(summary: ContextSummary): string {
  return [
    'Context Summary:',
    `  Turns in window: ${summary.windowUsage}/${summary.windowCapacity}`,
    `  Successful: ${summary.successfulTurns}`,
    `  Failed: ${summary.failedTurns}`,
    `  Token usage: ${summary.tokenUsage}/${summary.tokenBudget}`,
  ].join('\n');
}

export function formatTurn(result: TurnResult, verbose = false): string {
  const lines: string[] = [];
  if (result.sqlQuery !== undefined) {
    lines.push(`SQL: ${result.sqlQuery}`, '');
  }

  if (result.success) {
    lines.push(result.formattedResult ?? '');
  } else {
    lines.push(formatFailure(result.errorMessage ?? 'Unknown error'));
  }

  if (verbose && result.stages.length > 0) {
    const stages = result.stages.map((s) => `${s.name} ${s.status} ${s.durationMs}ms`).join(', ');
    lines.push('', `Stages: ${stages}`);
  }
  return lines.join('\n');
}

export interface ChatReply {
  /** Text for stdout */
  text?: string;
  /** Printed as a warning */
  warning?: string;
  done: boolean;
}

export interface ChatControllerOptions {
  verbose?: boolean;
  writeFile?: (path: string, data: string) => void;
  now?: () => Date;
}

export class ChatController {
  private readonly verbose: boolean;
  private readonly writeFile: (path: string, data: string) => void;
  private readonly now: () => Date;

  constructor(
    private readonly workflow: TextToSqlWorkflow,
    options: ChatControllerOptions = {},
  ) {
    this.verbose = options.verbose ?? false;
    this.writeFile = options.writeFile ?? ((path, data) => writeFileSync(path, data, 'utf8'));
    this.now = options.now ?? (() => new Date());
  }

  async handle(line: string): Promise<ChatReply> {
    const meta = parseMetaCommand(line);
    if (meta) {
      return this.runMeta(meta);
    }

    const question = line.trim();
    if (!question) {
      return { done: false };
    }

    const result = await this.workflow.processQuery(question);
    return { text: formatTurn(result, this.verbose), warning: result.contextWarning, done: false };
  }

  private runMeta(meta: MetaCommand): ChatReply {
    const ledger = this.workflow.getContextLedger();
    switch (meta.kind) {
      case 'context':
        return { text: formatContextSummary(ledger.summary()), done: false };
      case 'export': {
        const path = meta.path ?? defaultExportPath(this.now());
        try {
          this.writeFile(path, ledger.export());
        } catch (err: unknown) {
          return { warning: `Export failed: ${errorMessage(err)}`, done: false };
        }
        return { text: `Context exported to ${path}`, done: false };
      }
      case 'clear':
        ledger.clear();
        return { text: 'Context cleared.', done: false };
      case 'help':
        return { text: CHAT_HELP, done: false };
      case 'quit':
        return { text: 'Goodbye.', done: true };
      case 'unknown':
        return { warning: `Unknown command ":${meta.name}". Type :help for commands.`, done: false };
    }
  }
}

export interface ChatIo {
  input: NodeJS.ReadableStream;
  print(text: string): void;
  warn(text: string): void;
}

/** Read lines until :quit or end of input. */
export async function runChat(controller: ChatController, io: ChatIo, prompt = 'retailsql> '): Promise<void> {
  const rl = createInterface({ input: io.input, output: process.stdout, terminal: process.stdin.isTTY === true });
  rl.setPrompt(prompt);
  rl.prompt();

  try {
    for await (const line of rl) {
      const reply = await controller.handle(line);
      if (reply.text !== undefined) io.print(reply.text);
      if (reply.warning !== undefined) io.warn(reply.warning);
      if (reply.done) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
