/**
 * Conversation context types.
 */

/** One completed turn. Created once by the pipeline and never mutated. */
export interface ConversationEntry {
  readonly timestamp: Date;
  readonly userQuery: string;
  readonly sqlQuery?: string;
  readonly succeeded: boolean;
  readonly resultSummary: string;
  /** Cheap proxy for prompt tokens (word counts), not a tokenizer count */
  readonly tokenCost: number;
}

export interface RecordInput {
  userQuery: string;
  sqlQuery?: string;
  succeeded: boolean;
  resultSummary: string;
  tokenCost: number;
}

export interface PreviousQuery {
  userQuery: string;
  sqlQuery: string;
  /** ISO-8601 */
  timestamp: string;
}

/** Payload handed to the generation service. */
export interface GenerationContext {
  previousQueries: PreviousQuery[];
  totalTurns: number;
  /** "used/capacity", e.g. "3/10" */
  windowUsage: string;
}

export interface ContextSummary {
  totalTurns: number;
  successfulTurns: number;
  failedTurns: number;
  windowCapacity: number;
  windowUsage: number;
  tokenUsage: number;
  tokenBudget: number;
  isWindowFull: boolean;
  isTokenPressure: boolean;
}

/** Serialized form of one entry in an export. */
export interface ExportedEntry {
  timestamp: string;
  userQuery: string;
  sqlQuery: string | null;
  succeeded: boolean;
  resultSummary: string;
  tokenCost: number;
}

export interface ContextLimits {
  /** Hard cap on the number of entries */
  maxEntries: number;
  /** Token budget; eviction starts above 80% of it */
  maxTokens: number;
}
