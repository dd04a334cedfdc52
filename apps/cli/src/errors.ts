import type { RetailSqlErrorCode } from '@retailsql/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'POLICY_BLOCKED'
  | 'GENERATION_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

/** Map a failed turn onto the CLI taxonomy. Validator rejections are policy errors. */
export function turnError(code: RetailSqlErrorCode | undefined, message: string, details?: unknown): CliError {
  switch (code) {
    case 'UNPARSEABLE_INPUT':
    case 'FORBIDDEN_KEYWORD':
    case 'NON_SELECT_STATEMENT':
    case 'UNKNOWN_TABLE':
    case 'INJECTION_PATTERN':
      return policyError(message, details);
    case 'GENERATION_FAILED':
      return runtimeError(message, 'GENERATION_FAILED', details);
    case 'EXECUTION_FAILED':
      return runtimeError(message, 'DB_QUERY_FAILED', details);
    default:
      return runtimeError(message, 'INTERNAL_ERROR', details);
  }
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
