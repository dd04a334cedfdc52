/**
 * Bounded conversation context for one session.
 *
 * Entries are kept oldest first. After every append the window is trimmed
 * from the oldest end: first down to `maxEntries`, then while the token total
 * exceeds 80% of the budget and more than one entry remains. The newest entry
 * is never evicted, even when its cost alone is over budget.
 */

import type {
  ContextLimits,
  ContextSummary,
  ConversationEntry,
  ExportedEntry,
  GenerationContext,
  RecordInput,
} from './types.js';

/** Fraction of the token budget above which eviction and warnings kick in */
export const TOKEN_PRESSURE_RATIO = 0.8;

/** Number of trailing entries considered for the generation context */
export const GENERATION_CONTEXT_ENTRIES = 5;

export const DEFAULT_CONTEXT_LIMITS: ContextLimits = {
  maxEntries: 10,
  maxTokens: 4000,
};

export class ContextLedger {
  private readonly entries: ConversationEntry[] = [];
  private totalTokens = 0;
  private readonly limits: ContextLimits;
  private readonly now: () => Date;

  constructor(limits: Partial<ContextLimits> = {}, now: () => Date = () => new Date()) {
    this.limits = { ...DEFAULT_CONTEXT_LIMITS, ...limits };
    if (!Number.isInteger(this.limits.maxEntries) || this.limits.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.limits.maxEntries}`);
    }
    if (!Number.isFinite(this.limits.maxTokens) || this.limits.maxTokens <= 0) {
      throw new RangeError(`maxTokens must be a positive number, got ${this.limits.maxTokens}`);
    }
    this.now = now;
  }

  record(input: RecordInput): void {
    if (!Number.isInteger(input.tokenCost) || input.tokenCost < 0) {
      throw new RangeError(`tokenCost must be a non-negative integer, got ${input.tokenCost}`);
    }

    const entry: ConversationEntry = Object.freeze({
      timestamp: new Date(this.now().getTime()),
      userQuery: input.userQuery,
      sqlQuery: input.sqlQuery,
      succeeded: input.succeeded,
      resultSummary: input.resultSummary,
      tokenCost: input.tokenCost,
    });

    this.entries.push(entry);
    this.totalTokens += entry.tokenCost;
    this.maintainWindow();
  }

  private maintainWindow(): void {
    while (this.entries.length > this.limits.maxEntries) {
      this.evictOldest();
    }

    const threshold = this.limits.maxTokens * TOKEN_PRESSURE_RATIO;
    while (this.totalTokens > threshold && this.entries.length > 1) {
      this.evictOldest();
    }
  }

  private evictOldest(): void {
    const removed = this.entries.shift();
    if (removed) {
      this.totalTokens -= removed.tokenCost;
    }
  }

  /**
   * Successful turns with SQL among the last five entries, oldest first.
   */
  contextForGeneration(): GenerationContext {
    const previousQueries = this.entries
      .slice(-GENERATION_CONTEXT_ENTRIES)
      .flatMap((entry) =>
        entry.succeeded && entry.sqlQuery
          ? [{ userQuery: entry.userQuery, sqlQuery: entry.sqlQuery, timestamp: entry.timestamp.toISOString() }]
          : [],
      );

    return {
      previousQueries,
      totalTurns: this.entries.length,
      windowUsage: `${this.entries.length}/${this.limits.maxEntries}`,
    };
  }

  summary(): ContextSummary {
    const successfulTurns = this.entries.filter((entry) => entry.succeeded).length;
    return {
      totalTurns: this.entries.length,
      successfulTurns,
      failedTurns: this.entries.length - successfulTurns,
      windowCapacity: this.limits.maxEntries,
      windowUsage: this.entries.length,
      tokenUsage: this.totalTokens,
      tokenBudget: this.limits.maxTokens,
      isWindowFull: this.entries.length >= this.limits.maxEntries,
      isTokenPressure: this.totalTokens > this.limits.maxTokens * TOKEN_PRESSURE_RATIO,
    };
  }

  /** Human-readable pressure warning, or undefined when neither limit is near. */
  warning(): string | undefined {
    const summary = this.summary();
    const warnings: string[] = [];

    if (summary.isWindowFull) {
      warnings.push(
        `Context window is full (${summary.windowUsage}/${summary.windowCapacity}). Older conversations will be removed.`,
      );
    }
    if (summary.isTokenPressure) {
      warnings.push(
        `Token limit is near (${summary.tokenUsage}/${summary.tokenBudget}). Context may be truncated.`,
      );
    }

    return warnings.length > 0 ? warnings.join(' ') : undefined;
  }

  clear(): void {
    this.entries.length = 0;
    this.totalTokens = 0;
  }

  /** Pretty-printed JSON array of every entry, timestamps in ISO-8601. */
  export(): string {
    const data: ExportedEntry[] = this.entries.map((entry) => ({
      timestamp: entry.timestamp.toISOString(),
      userQuery: entry.userQuery,
      sqlQuery: entry.sqlQuery ?? null,
      succeeded: entry.succeeded,
      resultSummary: entry.resultSummary,
      tokenCost: entry.tokenCost,
    }));
    return JSON.stringify(data, null, 2);
  }

  /** Snapshot of the current entries, oldest first. Timestamps are copies. */
  getEntries(): readonly ConversationEntry[] {
    return this.entries.map((entry) => Object.freeze({ ...entry, timestamp: new Date(entry.timestamp.getTime()) }));
  }

  getLimits(): ContextLimits {
    return { ...this.limits };
  }
}
