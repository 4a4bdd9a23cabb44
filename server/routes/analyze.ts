import { z } from "zod";
import { errorMessage } from "../../lib/logging/logger.js";
import type { GatewayContext } from "../context.js";
import type { RouteHandler } from "../http/router.js";
import { errorResponse, jsonResponse } from "../http/responses.js";

const analyzeRequestSchema = z.object({
  text: z.string().default(""),
});

/**
 * POST /analyze
 */
export function createAnalyzeHandler(ctx: Pick<GatewayContext, "analyzer" | "logger">): RouteHandler {
  return async (request) => {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return errorResponse(400, "Request body must be valid JSON");
    }

    const parsed = analyzeRequestSchema.safeParse(body);
    if (!parsed.success) {
      return errorResponse(400, "Invalid request: text must be a string");
    }

    const { text } = parsed.data;
    if (!text.trim()) {
      return errorResponse(400, "Text cannot be empty");
    }

    try {
      ctx.logger.debug("Analyzing text", { preview: text.slice(0, 100) });
      const analysis = await ctx.analyzer.analyze(text, { signal: request.signal });
      return jsonResponse(analysis);
    } catch (error) {
      ctx.logger.error("Analysis error", { error: errorMessage(error) });
      return errorResponse(500, errorMessage(error));
    }
  };
}
