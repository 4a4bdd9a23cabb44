/**
 * OpenAI-compatible client construction
 *
 * Clients are built from explicit configuration. A missing API key yields no
 * client, and callers decide how to degrade.
 */

import OpenAI from "openai";

export type FetchLike = typeof fetch;

export interface CompletionClientOptions {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Transport override, used by tests */
  fetch?: FetchLike;
}

export function createOpenAIClient(options: CompletionClientOptions): OpenAI | null {
  if (!options.apiKey) {
    return null;
  }

  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    // One attempt per call; failures go straight to the caller's fallback
    maxRetries: 0,
    fetch: options.fetch,
  });
}
