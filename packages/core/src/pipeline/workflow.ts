/**
 * Text-to-SQL turn pipeline: generate -> validate -> execute -> format.
 *
 * One workflow owns one context ledger. Turns are serialized, so overlapping
 * `processQuery` calls run one after another against the ledger.
 */

import { ContextLedger } from '../context/ledger.js';
import type { ContextSummary, GenerationContext } from '../context/types.js';
import { executeQuery } from '../db/execute.js';
import { SAFE_DEFAULTS, effectiveMaxRows } from '../db/defaults.js';
import type { ExecuteResult, QueryExecutor, SchemaProvider } from '../db/types.js';
import {
  RetailSqlError,
  errorMessage,
  executionError,
  generationError,
  workflowError,
  type RetailSqlErrorCode,
} from '../errors.js';
import { formatExecution } from '../format/result.js';
import { cleanGeneratedSql } from '../llm/clean.js';
import type { SqlGenerator } from '../llm/types.js';
import { silentLogger, type Logger } from '../log/logger.js';
import { DefaultPolicyEngine, type PolicyEngine } from '../policy/engine.js';
import { StepTimer } from '../util/timer.js';
import { withTimeout } from '../util/timeout.js';
import {
  afterExecution,
  afterValidation,
  createInitialState,
  estimateTokenCost,
  extendState,
  failedWith,
  resultSummary,
  turnSucceeded,
  type PipelineState,
  type PipelineStateName,
  type StageName,
  type StagePatch,
  type StageResult,
} from './state.js';

export interface TurnResult {
  success: boolean;
  userQuery: string;
  sqlQuery?: string;
  formattedResult?: string;
  errorMessage?: string;
  errorCode?: RetailSqlErrorCode;
  /** Failure behind `errorMessage`; `details` holds the original cause */
  failure?: RetailSqlError;
  /** Present when execution succeeded */
  execution?: ExecuteResult;
  contextSummary: ContextSummary;
  contextWarning?: string;
  /** States visited, in order */
  trace: PipelineStateName[];
  stages: StageResult[];
}

export interface WorkflowOptions {
  maxRows?: number;
  generationTimeoutMs?: number;
  executionTimeoutMs?: number;
}

export interface WorkflowDeps {
  generator: SqlGenerator;
  executor: QueryExecutor;
  schema: SchemaProvider;
  /** Defaults to a fresh ledger with default limits */
  ledger?: ContextLedger;
  /** Defaults to a validator over the schema's tables in the executor's dialect */
  policy?: PolicyEngine;
  logger?: Logger;
  options?: WorkflowOptions;
}

const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

interface StageLoggers {
  workflow: Logger;
  generate: Logger;
  validate: Logger;
  execute: Logger;
  format: Logger;
}

export class TextToSqlWorkflow {
  private readonly generator: SqlGenerator;
  private readonly executor: QueryExecutor;
  private readonly schema: SchemaProvider;
  private readonly ledger: ContextLedger;
  private readonly policy: PolicyEngine;
  private readonly log: StageLoggers;
  private readonly maxRows: number;
  private readonly generationTimeoutMs: number;
  private readonly executionTimeoutMs: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: WorkflowDeps) {
    this.generator = deps.generator;
    this.executor = deps.executor;
    this.schema = deps.schema;
    this.ledger = deps.ledger ?? new ContextLedger();
    this.policy = deps.policy ?? new DefaultPolicyEngine(deps.schema.tableNames(), deps.executor.dialect);

    const logger = deps.logger ?? silentLogger;
    this.log = {
      workflow: logger.child('Workflow'),
      generate: logger.child('TextToSql'),
      validate: logger.child('Validator'),
      execute: logger.child('Executor'),
      format: logger.child('Formatter'),
    };

    const options = deps.options ?? {};
    this.maxRows = effectiveMaxRows(options.maxRows);
    this.generationTimeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.executionTimeoutMs = options.executionTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;

    if (deps.executor.dialect === 'sqlite') {
      this.log.workflow.debug('SQLite statements run synchronously; the execution timeout cannot interrupt them', {
        target: deps.executor.target,
      });
    }
  }

  getContextLedger(): ContextLedger {
    return this.ledger;
  }

  /**
   * Run one turn. Never rejects: every failure becomes a structured result,
   * and every turn is recorded in the ledger exactly once.
   */
  processQuery(userQuery: string): Promise<TurnResult> {
    const run = this.tail.then(() => this.runTurn(userQuery));
    // the caller sees failures through `run`; the chain only orders turns
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runTurn(userQuery: string): Promise<TurnResult> {
    const trace: PipelineStateName[] = [];
    const stages: StageResult[] = [];

    try {
      let state = createInitialState(userQuery);
      const context = this.ledger.contextForGeneration();
      this.log.workflow.info('Processing query', { userQuery, windowUsage: context.windowUsage });

      trace.push('GENERATING');
      state = await this.stage('generate', state, stages, (s) => this.generate(s, context));

      trace.push('VALIDATING');
      state = await this.stage('validate', state, stages, (s) => this.validate(s));

      if (afterValidation(state) === 'EXECUTING') {
        trace.push('EXECUTING');
        state = await this.stage('execute', state, stages, (s) => this.execute(s));

        if (afterExecution(state) === 'FORMATTING') {
          trace.push('FORMATTING');
          state = await this.stage('format', state, stages, (s) => this.format(s));
          trace.push('DONE');
        } else {
          trace.push('TERMINATED');
        }
      } else {
        trace.push('TERMINATED');
      }

      return this.finish(state, trace, stages);
    } catch (err: unknown) {
      return this.fail(userQuery, err, trace, stages);
    }
  }

  /**
   * Run one stage and time it. A stage reports failure by returning a state
   * with `error` set; a stage that does nothing returns no patch.
   */
  private async stage(
    name: StageName,
    state: PipelineState,
    stages: StageResult[],
    run: (state: PipelineState) => Promise<StagePatch | undefined>,
  ): Promise<PipelineState> {
    const timer = new StepTimer();
    timer.begin();
    const patch = await run(state);
    const durationMs = timer.elapsed();

    if (!patch) {
      stages.push({ name, status: 'skipped', durationMs });
      return state;
    }

    const next = extendState(state, patch);
    stages.push(
      patch.error !== undefined
        ? { name, status: 'failed', durationMs, error: patch.error }
        : { name, status: 'passed', durationMs },
    );
    return next;
  }

  private async generate(state: PipelineState, context: GenerationContext): Promise<StagePatch> {
    try {
      const raw = await withTimeout(
        (signal) => this.generator.generate(this.schema.describe(), context, state.userQuery, signal),
        this.generationTimeoutMs,
        'SQL generation',
      );
      const sqlQuery = cleanGeneratedSql(raw);
      this.log.generate.info('Generated SQL', { sql: sqlQuery });
      return { sqlQuery };
    } catch (err: unknown) {
      this.log.generate.error('Failed to convert text to SQL', { error: errorMessage(err) });
      return failedWith(generationError(`Text-to-SQL conversion failed: ${errorMessage(err)}`, err));
    }
  }

  private async validate(state: PipelineState): Promise<StagePatch | undefined> {
    if (state.error !== undefined || state.sqlQuery === undefined) {
      return undefined;
    }

    const verdict = this.policy.validate(state.sqlQuery);
    if (!verdict.isValid) {
      this.log.validate.warn('Validation failed', { reason: verdict.reason, code: verdict.code });
      const failure = new RetailSqlError(
        verdict.code ?? 'UNPARSEABLE_INPUT',
        `SQL validation failed: ${verdict.reason ?? 'unknown reason'}`,
        verdict,
      );
      return { verdict, ...failedWith(failure) };
    }

    this.log.validate.info('SQL query validation passed', { tables: [...verdict.tablesReferenced] });
    return { verdict };
  }

  private async execute(state: PipelineState): Promise<StagePatch> {
    const sql = state.sqlQuery ?? '';
    try {
      const result = await withTimeout(
        (signal) => executeQuery(this.executor, sql, { maxRows: this.maxRows, signal }),
        this.executionTimeoutMs,
        'Query execution',
      );
      this.log.execute.info('Query executed successfully', {
        rows: result.rowCount,
        truncated: result.truncated,
        execMs: result.execMs,
      });
      return { execution: { success: true, result } };
    } catch (err: unknown) {
      this.log.execute.error('Execution failed', { error: errorMessage(err) });
      return {
        execution: { success: false, error: errorMessage(err) },
        ...failedWith(executionError(`Query execution failed: ${errorMessage(err)}`, err)),
      };
    }
  }

  private async format(state: PipelineState): Promise<StagePatch | undefined> {
    if (!state.execution?.success) {
      return undefined;
    }
    return { formattedText: formatExecution(state.execution.result, this.maxRows) };
  }

  private finish(state: PipelineState, trace: PipelineStateName[], stages: StageResult[]): TurnResult {
    const success = turnSucceeded(state);
    this.ledger.record({
      userQuery: state.userQuery,
      sqlQuery: state.sqlQuery,
      succeeded: success,
      resultSummary: resultSummary(state),
      tokenCost: estimateTokenCost(state.userQuery, state.sqlQuery),
    });

    return {
      success,
      userQuery: state.userQuery,
      sqlQuery: state.sqlQuery,
      formattedResult: state.formattedText,
      errorMessage: state.error,
      errorCode: state.errorCode,
      failure: state.failure,
      execution: state.execution?.success ? state.execution.result : undefined,
      contextSummary: this.ledger.summary(),
      contextWarning: this.ledger.warning(),
      trace,
      stages,
    };
  }

  /** Outermost boundary: anything not handled by a stage ends up here. */
  private fail(userQuery: unknown, err: unknown, trace: PipelineStateName[], stages: StageResult[]): TurnResult {
    const failure = workflowError(`Workflow error: ${errorMessage(err)}`, err);
    this.log.workflow.error('Workflow error', { error: errorMessage(err) });

    const question = typeof userQuery === 'string' ? userQuery : String(userQuery);
    this.ledger.record({
      userQuery: question,
      succeeded: false,
      resultSummary: `Error: ${failure.message}`,
      tokenCost: estimateTokenCost(question),
    });

    return {
      success: false,
      userQuery: question,
      errorMessage: failure.message,
      errorCode: failure.code,
      failure,
      contextSummary: this.ledger.summary(),
      contextWarning: this.ledger.warning(),
      trace: [...trace, 'TERMINATED'],
      stages,
    };
  }
}
