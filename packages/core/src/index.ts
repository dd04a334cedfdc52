/**
 * @retailsql/core — barrel export
 *
 * Validator, conversation context and the text-to-SQL pipeline used by the CLI.
 */

// Errors
export {
  RetailSqlError,
  errorMessage,
  executionError,
  generationError,
  workflowError,
} from './errors.js';
export type { RetailSqlErrorCode, ValidationErrorCode } from './errors.js';

// Configuration
export { DEFAULT_SETTINGS, describeSettings, loadSettings, parseSettingsFile, readSettingsFile } from './config/settings.js';
export type { Env, Settings, SettingsFile } from './config/settings.js';

// Logging
export { createConsoleLogger, formatLogLine, isLogLevel, LOG_LEVELS, silentLogger } from './log/logger.js';
export type { LogData, Logger, LogLevel, LogSink } from './log/logger.js';

// SQL safety validator
export { DefaultPolicyEngine, validateSql } from './policy/engine.js';
export type { PolicyEngine } from './policy/engine.js';
export { FORBIDDEN_KEYWORDS, INJECTION_PATTERNS } from './policy/types.js';
export type { ForbiddenKeyword, InjectionPattern, SqlDialect, ValidationVerdict } from './policy/types.js';
export { parseSql } from './policy/parse.js';

// Conversation context
export { ContextLedger, DEFAULT_CONTEXT_LIMITS, GENERATION_CONTEXT_ENTRIES, TOKEN_PRESSURE_RATIO } from './context/ledger.js';
export type {
  ContextLimits,
  ContextSummary,
  ConversationEntry,
  ExportedEntry,
  GenerationContext,
  PreviousQuery,
  RecordInput,
} from './context/types.js';

// Database
export type {
  ColumnInfo,
  ExecuteResult,
  QueryExecutor,
  RawQueryResult,
  Row,
  RunOptions,
  SchemaProvider,
  SchemaSnapshot,
  TableInfo,
} from './db/types.js';
export { SAFE_DEFAULTS, capRows, effectiveMaxRows } from './db/defaults.js';
export { createExecutor, executeQuery, parseDatabaseUrl } from './db/execute.js';
export type { DatabaseTarget, ExecuteLimits, ExecutorOptions } from './db/execute.js';
export { SqliteExecutor, openDatabase } from './db/adapters/sqlite.js';
export { PostgresExecutor, redactConnectionString } from './db/adapters/postgres.js';
export {
  RETAIL_TABLES,
  SnapshotSchemaProvider,
  describeSchema,
  loadRetailSchemaSql,
  loadSchemaProvider,
  retailSchemaSnapshot,
} from './db/schema.js';
export { loadSeedFixtures, seedDatabase } from './db/seed.js';
export type { SeedFixtures, SeedOptions, SeedSummary } from './db/seed.js';
export { queryStatistics } from './db/stats.js';
export type { QueryStatistics } from './db/stats.js';

// LLM
export { OpenAIProvider, DEFAULT_MODEL, buildMessages, cleanGeneratedSql } from './llm/index.js';
export type { ChatMessage, CompletionFn, OpenAIProviderOptions, SqlGenerator } from './llm/index.js';

// Formatting
export { EMPTY_RESULT_MESSAGE, formatExecution, formatFailure } from './format/result.js';
export { formatTable, formatValue } from './format/table.js';

// Pipeline
export { TextToSqlWorkflow } from './pipeline/workflow.js';
export type { TurnResult, WorkflowDeps, WorkflowOptions } from './pipeline/workflow.js';
export type { PipelineStateName, StageName, StageResult, StageStatus } from './pipeline/state.js';

// Utilities
export { TimeoutError, withTimeout } from './util/timeout.js';
