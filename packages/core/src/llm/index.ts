/**
 * LLM module barrel export.
 */

export type { ChatMessage, ChatRole, SqlGenerator } from './types.js';
export { OpenAIProvider, DEFAULT_MODEL } from './openai.js';
export type { CompletionFn, CompletionRequest, OpenAIProviderOptions } from './openai.js';
export { buildMessages, formatPreviousQueries, PROMPT_CONTEXT_QUERIES } from './prompt.js';
export type { PromptInput } from './prompt.js';
export { cleanGeneratedSql } from './clean.js';
