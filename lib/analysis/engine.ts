/**
 * Speech Analysis Engine
 *
 * Asks the completion provider to classify a speech and rewrite it for three
 * audiences. Every failure path resolves to the canned fallback; the reason is
 * reported through the logger only.
 */

import OpenAI from "openai";
import { z } from "zod";
import type { AnalysisConfig } from "../config/env.js";
import { errorMessage, type Logger } from "../logging/logger.js";
import { createOpenAIClient, type FetchLike } from "../openai/client.js";
import { buildAnalysisPrompt } from "../openai/prompts.js";
import { createFallbackResult } from "./fallback.js";
import {
  freezeAnalysis,
  speechAnalysisResultSchema,
  type AnalyzeOptions,
  type FallbackReason,
  type SpeechAnalysisResult,
  type SpeechAnalyzer,
} from "./types.js";

// Only the part of the chat-completions envelope the engine reads
const completionEnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

export interface AnalysisEngineDeps {
  logger: Logger;
  fetch?: FetchLike;
}

export class SpeechAnalysisEngine implements SpeechAnalyzer {
  private readonly client: OpenAI | null;
  private readonly logger: Logger;

  constructor(private readonly config: AnalysisConfig, deps: AnalysisEngineDeps) {
    this.logger = deps.logger;
    this.client = createOpenAIClient({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeoutMs: config.timeoutMs,
      fetch: deps.fetch,
    });
  }

  get configured(): boolean {
    return this.client !== null;
  }

  async analyze(text: string, options: AnalyzeOptions = {}): Promise<SpeechAnalysisResult> {
    if (!this.client) {
      return this.fallback("configuration_absent");
    }

    if (options.signal?.aborted) {
      return this.fallback("provider_unavailable", { error: "Request aborted" });
    }

    const startedAt = Date.now();
    this.logger.log("analysis_request", { model: this.config.model, length: text.length });

    let completion: unknown;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            {
              role: "user",
              content: buildAnalysisPrompt(text, this.config.promptTemplate),
            },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: options.signal, timeout: this.config.timeoutMs }
      );
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      this.logger.log("provider_response", { ok: false, status });
      return this.fallback("provider_unavailable", { status, error: errorMessage(error) });
    }

    this.logger.log("provider_response", { ok: true, elapsedMs: Date.now() - startedAt });

    const envelope = completionEnvelopeSchema.safeParse(completion);
    const content = envelope.success ? envelope.data.choices[0].message.content : undefined;
    if (!content) {
      return this.fallback("malformed_output", { error: "Completion has no content" });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.debug("Raw completion content", { content });
      return this.fallback("malformed_output", { error: errorMessage(error) });
    }

    const validated = speechAnalysisResultSchema.safeParse(parsed);
    if (!validated.success) {
      return this.fallback("invalid_shape", {
        issues: validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }

    this.logger.log("analysis_complete", {
      category: validated.data.category,
      elapsedMs: Date.now() - startedAt,
    });
    return freezeAnalysis(validated.data);
  }

  private fallback(reason: FallbackReason, details?: Record<string, unknown>): SpeechAnalysisResult {
    this.logger.log("analysis_fallback", { reason, ...details });
    this.logger.warn(`Analysis fell back to canned result (${reason})`, details);
    return createFallbackResult();
  }
}
