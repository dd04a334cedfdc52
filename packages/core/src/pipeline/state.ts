/**
 * Per-turn pipeline state and the transitions between stages.
 *
 *   GENERATING -> VALIDATING -> EXECUTING -> FORMATTING -> DONE
 *                          \             \
 *                           TERMINATED    TERMINATED
 *
 * State is threaded through the stages as frozen objects; a stage adds its
 * own fields and never clears or replaces one set earlier.
 */

import type { RetailSqlError, RetailSqlErrorCode } from '../errors.js';
import type { ValidationVerdict } from '../policy/types.js';
import type { ExecuteResult } from '../db/types.js';

export type PipelineStateName = 'GENERATING' | 'VALIDATING' | 'EXECUTING' | 'TERMINATED' | 'FORMATTING' | 'DONE';

export type StageName = 'generate' | 'validate' | 'execute' | 'format';

export type StageStatus = 'passed' | 'failed' | 'skipped';

export interface StageResult {
  name: StageName;
  status: StageStatus;
  durationMs: number;
  error?: string;
}

export type ExecutionOutcome =
  | { success: true; result: ExecuteResult }
  | { success: false; error: string };

export interface PipelineState {
  readonly userQuery: string;
  readonly sqlQuery?: string;
  readonly verdict?: ValidationVerdict;
  readonly execution?: ExecutionOutcome;
  readonly formattedText?: string;
  /** Stage-prefixed message of the first failure */
  readonly error?: string;
  readonly errorCode?: RetailSqlErrorCode;
  /** The failure behind `error`, with the original cause on `details` */
  readonly failure?: RetailSqlError;
}

export type StagePatch = Partial<Omit<PipelineState, 'userQuery'>>;

const STAGE_FIELDS = ['sqlQuery', 'verdict', 'execution', 'formattedText', 'error', 'errorCode', 'failure'] as const;

export function createInitialState(userQuery: unknown): PipelineState {
  if (typeof userQuery !== 'string') {
    throw new TypeError(`User query must be a string, got ${userQuery === null ? 'null' : typeof userQuery}`);
  }
  return Object.freeze({ userQuery });
}

/**
 * New state with the stage's fields added. Throws when a field that an
 * earlier stage set would be overwritten.
 */
export function extendState(state: PipelineState, patch: StagePatch): PipelineState {
  for (const field of STAGE_FIELDS) {
    if (patch[field] !== undefined && state[field] !== undefined) {
      throw new Error(`Pipeline field "${field}" is already set`);
    }
  }
  const next: PipelineState = { ...state };
  return Object.freeze(Object.assign(next, withoutUndefined(patch)));
}

function withoutUndefined(patch: StagePatch): StagePatch {
  const out: { -readonly [K in keyof StagePatch]: StagePatch[K] } = {};
  if (patch.sqlQuery !== undefined) out.sqlQuery = patch.sqlQuery;
  if (patch.verdict !== undefined) out.verdict = patch.verdict;
  if (patch.execution !== undefined) out.execution = patch.execution;
  if (patch.formattedText !== undefined) out.formattedText = patch.formattedText;
  if (patch.error !== undefined) out.error = patch.error;
  if (patch.errorCode !== undefined) out.errorCode = patch.errorCode;
  if (patch.failure !== undefined) out.failure = patch.failure;
  return out;
}

/** Patch that records a stage failure. */
export function failedWith(failure: RetailSqlError): StagePatch {
  return { error: failure.message, errorCode: failure.code, failure };
}

/** Execute iff the verdict is valid and no stage has recorded an error. */
export function shouldExecute(state: PipelineState): boolean {
  return state.verdict?.isValid === true && state.error === undefined;
}

export function afterValidation(state: PipelineState): 'EXECUTING' | 'TERMINATED' {
  return shouldExecute(state) ? 'EXECUTING' : 'TERMINATED';
}

export function afterExecution(state: PipelineState): 'FORMATTING' | 'TERMINATED' {
  return state.execution?.success === true && state.error === undefined ? 'FORMATTING' : 'TERMINATED';
}

export function turnSucceeded(state: PipelineState): boolean {
  return state.execution?.success === true;
}

/** "Returned N rows", "Error: …", or empty when neither applies. */
export function resultSummary(state: PipelineState): string {
  if (state.execution?.success) {
    return `Returned ${state.execution.result.rowCount} rows`;
  }
  return state.error ? `Error: ${state.error}` : '';
}

export function wordCount(text: string | undefined): number {
  if (!text) return 0;
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/** Word count of the question plus word count of the generated SQL. */
export function estimateTokenCost(userQuery: string, sqlQuery?: string): number {
  return wordCount(userQuery) + wordCount(sqlQuery);
}
