/**
 * Error taxonomy shared by the validator, the pipeline and the CLI.
 */

export type RetailSqlErrorCode =
  | 'UNPARSEABLE_INPUT'
  | 'FORBIDDEN_KEYWORD'
  | 'NON_SELECT_STATEMENT'
  | 'UNKNOWN_TABLE'
  | 'INJECTION_PATTERN'
  | 'GENERATION_FAILED'
  | 'EXECUTION_FAILED'
  | 'WORKFLOW_FAILED';

/** Codes produced by the validator (a rejected verdict carries one of these). */
export type ValidationErrorCode = Extract<
  RetailSqlErrorCode,
  'UNPARSEABLE_INPUT' | 'FORBIDDEN_KEYWORD' | 'NON_SELECT_STATEMENT' | 'UNKNOWN_TABLE' | 'INJECTION_PATTERN'
>;

export class RetailSqlError extends Error {
  readonly code: RetailSqlErrorCode;
  readonly details?: unknown;

  constructor(code: RetailSqlErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'RetailSqlError';
    this.code = code;
    this.details = details;
  }
}

export function generationError(message: string, details?: unknown): RetailSqlError {
  return new RetailSqlError('GENERATION_FAILED', message, details);
}

export function executionError(message: string, details?: unknown): RetailSqlError {
  return new RetailSqlError('EXECUTION_FAILED', message, details);
}

/**
 * Wraps a failure to build the initial pipeline state. The original cause is
 * kept on `details`.
 */
export function workflowError(message: string, cause?: unknown): RetailSqlError {
  return new RetailSqlError('WORKFLOW_FAILED', message, cause);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
