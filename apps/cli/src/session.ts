/**
 * Wiring shared by the commands: settings, logger, executor, schema and the
 * workflow for one CLI session.
 */

import {
  ContextLedger,
  OpenAIProvider,
  TextToSqlWorkflow,
  createConsoleLogger,
  createExecutor,
  errorMessage,
  loadSchemaProvider,
  loadSettings,
  type Logger,
  type QueryExecutor,
  type SchemaProvider,
  type Settings,
} from '@retailsql/core';
import { runtimeError, usageError } from './errors.js';
import type { OutputOptions } from './output.js';

export function loadCliSettings(configPath: string | undefined, env: NodeJS.ProcessEnv = process.env): Settings {
  try {
    return loadSettings(env, configPath);
  } catch (err: unknown) {
    throw usageError(errorMessage(err), 'CONFIG_INVALID');
  }
}

/** --debug lowers the level to debug; --quiet raises it to error. */
export function createCliLogger(settings: Settings, output: OutputOptions): Logger {
  if (output.debug) return createConsoleLogger('debug');
  if (output.quiet && settings.logLevel !== 'silent') return createConsoleLogger('error');
  return createConsoleLogger(settings.logLevel);
}

export interface DatabaseHandle {
  executor: QueryExecutor;
  schema: SchemaProvider;
}

export async function openDatabaseHandle(settings: Settings, logger: Logger): Promise<DatabaseHandle> {
  let executor: QueryExecutor;
  try {
    executor = createExecutor(settings.databaseUrl, {
      statementTimeoutMs: settings.executionTimeoutMs,
      logger: logger.child('Executor'),
    });
  } catch (err: unknown) {
    throw usageError(errorMessage(err), 'CONFIG_INVALID');
  }

  try {
    const schema = await loadSchemaProvider(executor, logger.child('Schema'));
    return { executor, schema };
  } catch (err: unknown) {
    await executor.close();
    throw runtimeError(`Could not connect to ${executor.target}: ${errorMessage(err)}`, 'DB_CONN_FAILED');
  }
}

export interface Session extends DatabaseHandle {
  workflow: TextToSqlWorkflow;
  close(): Promise<void>;
}

export async function openSession(settings: Settings, logger: Logger): Promise<Session> {
  if (!settings.openaiApiKey) {
    throw usageError('OPENAI_API_KEY is not set. Add it to your shell or a .env file.', 'CONFIG_INVALID');
  }

  const { executor, schema } = await openDatabaseHandle(settings, logger);
  const generator = new OpenAIProvider({
    apiKey: settings.openaiApiKey,
    baseURL: settings.openaiBaseUrl,
    model: settings.model,
    maxTokens: settings.maxTokens,
  });
  const workflow = new TextToSqlWorkflow({
    generator,
    executor,
    schema,
    ledger: new ContextLedger({ maxEntries: settings.contextWindowSize, maxTokens: settings.maxTokens }),
    logger,
    options: {
      maxRows: settings.maxRows,
      generationTimeoutMs: settings.generationTimeoutMs,
      executionTimeoutMs: settings.executionTimeoutMs,
    },
  });

  return {
    executor,
    schema,
    workflow,
    close: () => executor.close(),
  };
}
