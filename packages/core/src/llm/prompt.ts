/**
 * Prompt construction for SQL generation.
 */

import type { GenerationContext } from '../context/types.js';
import type { ChatMessage } from './types.js';

/** How many previous turns are quoted back to the model */
export const PROMPT_CONTEXT_QUERIES = 3;

export interface PromptInput {
  schemaDescription: string;
  context: GenerationContext;
  userQuery: string;
}

const SYSTEM_PROMPT = `You are an expert SQL query generator for a retail database.

Instructions:
1. Generate a valid SQL query based on the user's natural language request.
2. Generate a single SELECT statement. Never modify data or the schema.
3. Only use tables and columns that exist in the schema.
4. If the query is ambiguous, make reasonable assumptions.
5. Use appropriate JOINs when querying multiple tables.
6. Consider the context from previous queries if relevant.
7. Return ONLY the SQL query without any explanation or formatting.`;

/**
 * "Previous Query: q -> SQL: s" lines for the most recent turns, oldest first.
 * Empty string when there is no usable history.
 */
export function formatPreviousQueries(context: GenerationContext): string {
  return context.previousQueries
    .slice(-PROMPT_CONTEXT_QUERIES)
    .map((q) => `Previous Query: ${q.userQuery} -> SQL: ${q.sqlQuery}`)
    .join('\n');
}

export function buildMessages(input: PromptInput): ChatMessage[] {
  const previous = formatPreviousQueries(input.context);

  const userPrompt = `Database Schema:
${input.schemaDescription}

Previous Context (if any):
${previous}

User Query: ${input.userQuery}

SQL Query:`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: userPrompt },
  ];
}
