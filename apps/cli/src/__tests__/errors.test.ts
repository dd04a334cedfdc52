import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  CliError,
  EXIT_CODE_POLICY,
  EXIT_CODE_RUNTIME,
  EXIT_CODE_USAGE,
  policyError,
  runtimeError,
  toExitCode,
  turnError,
  usageError,
} from '../errors.js';

describe('toExitCode', () => {
  it('maps each error kind to its exit code', () => {
    assert.equal(toExitCode(usageError('bad flag')), EXIT_CODE_USAGE);
    assert.equal(toExitCode(runtimeError('db down', 'DB_CONN_FAILED')), EXIT_CODE_RUNTIME);
    assert.equal(toExitCode(policyError('blocked')), EXIT_CODE_POLICY);
  });

  it('treats unknown errors as runtime failures', () => {
    assert.equal(toExitCode(new Error('boom')), EXIT_CODE_RUNTIME);
    assert.equal(toExitCode('boom'), EXIT_CODE_RUNTIME);
  });
});

describe('turnError', () => {
  it('turns validator rejections into policy errors', () => {
    for (const code of ['UNPARSEABLE_INPUT', 'FORBIDDEN_KEYWORD', 'NON_SELECT_STATEMENT', 'UNKNOWN_TABLE', 'INJECTION_PATTERN'] as const) {
      const error = turnError(code, 'SQL validation failed: x');
      assert.equal(error.kind, 'policy', code);
      assert.equal(error.code, 'POLICY_BLOCKED');
    }
  });

  it('keeps generation and execution failures apart', () => {
    assert.equal(turnError('GENERATION_FAILED', 'm').code, 'GENERATION_FAILED');
    assert.equal(turnError('EXECUTION_FAILED', 'm').code, 'DB_QUERY_FAILED');
    assert.equal(turnError('WORKFLOW_FAILED', 'm').code, 'INTERNAL_ERROR');
    assert.equal(turnError(undefined, 'm').code, 'INTERNAL_ERROR');
  });

  it('carries the message and details through', () => {
    const error = turnError('EXECUTION_FAILED', 'Query execution failed: no such column: x', { sqlQuery: 'SELECT x FROM stores;' });
    assert.ok(error instanceof CliError);
    assert.equal(error.kind, 'runtime');
    assert.equal(error.message, 'Query execution failed: no such column: x');
    assert.deepEqual(error.details, { sqlQuery: 'SELECT x FROM stores;' });
  });
});
