/**
 * Settings loader.
 *
 * Precedence: environment > JSON settings file > defaults. The settings file
 * never carries the API key.
 */

import { readFileSync } from 'node:fs';
import { DEFAULT_MODEL } from '../llm/openai.js';
import { DEFAULT_CONTEXT_LIMITS } from '../context/ledger.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../log/logger.js';
import { createAjv, formatAjvErrors } from '../util/ajv.js';

export interface Settings {
  openaiApiKey?: string;
  /** OpenAI-compatible endpoint, e.g. Groq */
  openaiBaseUrl?: string;
  model: string;
  maxTokens: number;
  contextWindowSize: number;
  databaseUrl: string;
  maxRows: number;
  generationTimeoutMs: number;
  executionTimeoutMs: number;
  logLevel: LogLevel;
}

export interface SettingsFile {
  openaiBaseUrl?: string | null;
  model?: string | null;
  maxTokens?: number | null;
  contextWindowSize?: number | null;
  databaseUrl?: string | null;
  maxRows?: number | null;
  generationTimeoutMs?: number | null;
  executionTimeoutMs?: number | null;
  logLevel?: LogLevel | null;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_SETTINGS: Settings = {
  model: DEFAULT_MODEL,
  maxTokens: DEFAULT_CONTEXT_LIMITS.maxTokens,
  contextWindowSize: DEFAULT_CONTEXT_LIMITS.maxEntries,
  databaseUrl: 'sqlite:///retail_database.db',
  maxRows: SAFE_DEFAULTS.maxRows,
  generationTimeoutMs: 60_000,
  executionTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
  logLevel: 'info',
};

const positiveInt = { type: 'integer', minimum: 1, nullable: true };
const nonEmptyString = { type: 'string', minLength: 1, nullable: true };

const settingsFileSchema = {
  type: 'object',
  properties: {
    openaiBaseUrl: nonEmptyString,
    model: nonEmptyString,
    maxTokens: positiveInt,
    contextWindowSize: positiveInt,
    databaseUrl: nonEmptyString,
    maxRows: { ...positiveInt, maximum: SAFE_DEFAULTS.maxRows },
    generationTimeoutMs: positiveInt,
    executionTimeoutMs: positiveInt,
    logLevel: { type: 'string', enum: [...LOG_LEVELS, null], nullable: true },
  },
  additionalProperties: false,
};

const validateSettingsFile = createAjv().compile<SettingsFile>(settingsFileSchema);

export function parseSettingsFile(data: unknown, source = 'settings file'): SettingsFile {
  if (!validateSettingsFile(data)) {
    throw new Error(`Invalid ${source}: ${formatAjvErrors(validateSettingsFile.errors)}`);
  }
  return data;
}

export function readSettingsFile(path: string): SettingsFile {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read settings file ${path}: ${message}`);
  }
  return parseSettingsFile(data, `settings file ${path}`);
}

function envString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envInt(env: Env, name: string, max?: number): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}".`);
  }
  if (max !== undefined && n > max) {
    throw new Error(`${name} must be at most ${max}, got "${value}".`);
  }
  return n;
}

function envLogLevel(env: Env): LogLevel | undefined {
  const value = envString(env, 'LOG_LEVEL')?.toLowerCase();
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}".`);
  }
  return value;
}

export function loadSettings(env: Env = process.env, filePath?: string): Settings {
  const file = filePath ? readSettingsFile(filePath) : {};

  return {
    openaiApiKey: envString(env, 'OPENAI_API_KEY'),
    openaiBaseUrl: envString(env, 'OPENAI_BASE_URL') ?? file.openaiBaseUrl ?? undefined,
    model: envString(env, 'RETAILSQL_MODEL') ?? file.model ?? DEFAULT_SETTINGS.model,
    maxTokens: envInt(env, 'MAX_TOKENS') ?? file.maxTokens ?? DEFAULT_SETTINGS.maxTokens,
    contextWindowSize:
      envInt(env, 'CONTEXT_WINDOW_SIZE') ?? file.contextWindowSize ?? DEFAULT_SETTINGS.contextWindowSize,
    databaseUrl: envString(env, 'DATABASE_URL') ?? file.databaseUrl ?? DEFAULT_SETTINGS.databaseUrl,
    maxRows: envInt(env, 'MAX_ROWS', SAFE_DEFAULTS.maxRows) ?? file.maxRows ?? DEFAULT_SETTINGS.maxRows,
    generationTimeoutMs:
      envInt(env, 'GENERATION_TIMEOUT_MS') ?? file.generationTimeoutMs ?? DEFAULT_SETTINGS.generationTimeoutMs,
    executionTimeoutMs:
      envInt(env, 'EXECUTION_TIMEOUT_MS') ?? file.executionTimeoutMs ?? DEFAULT_SETTINGS.executionTimeoutMs,
    logLevel: envLogLevel(env) ?? file.logLevel ?? DEFAULT_SETTINGS.logLevel,
  };
}

/** Settings safe to print: the API key is reduced to whether it is set. */
export function describeSettings(settings: Settings): Record<string, unknown> {
  const { openaiApiKey, ...rest } = settings;
  return { ...rest, openaiApiKey: openaiApiKey ? 'set' : 'missing' };
}
