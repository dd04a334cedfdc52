/**
 * Generation service contract.
 */

import type { GenerationContext } from '../context/types.js';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export type ChatRole = ChatMessage['role'];

/**
 * Turns a question into raw model text. Cleanup of the text (fences, labels,
 * whitespace, trailing semicolon) is done by the pipeline, not here.
 */
export interface SqlGenerator {
  /** Model identifier, for display */
  readonly model: string;

  generate(
    schemaDescription: string,
    recentContext: GenerationContext,
    userQuery: string,
    signal?: AbortSignal,
  ): Promise<string>;
}
