import type { GatewayContext } from "../context.js";
import type { RouteHandler } from "../http/router.js";
import { jsonResponse } from "../http/responses.js";

export function createRootHandler(): RouteHandler {
  return async () => jsonResponse({ message: "Speech analysis gateway" });
}

/**
 * GET /health
 *
 * Reports which providers have credentials; missing ones degrade, never fail.
 */
export function createHealthHandler(
  ctx: Pick<GatewayContext, "analyzer" | "voice" | "transcribe" | "startedAt">
): RouteHandler {
  return async () =>
    jsonResponse({
      status: "ok",
      uptime: Date.now() - ctx.startedAt,
      timestamp: Date.now(),
      providers: {
        completion: ctx.analyzer.configured,
        transcription: ctx.transcribe !== null,
        voice: ctx.voice.canClone,
        speech: ctx.voice.canSynthesize,
      },
    });
}
