import type { GatewayContext } from "./context.js";
import { createRouter, type Route, type RouteHandler } from "./http/router.js";
import { createAnalyzeHandler } from "./routes/analyze.js";
import { createHealthHandler, createRootHandler } from "./routes/health.js";
import { createTranscribeHandler } from "./routes/transcribe.js";
import { createCloneVoiceHandler, createGenerateAudioHandler } from "./routes/voice.js";

export function createRoutes(ctx: GatewayContext): Route[] {
  return [
    { method: "GET", path: "/", handler: createRootHandler() },
    { method: "GET", path: "/health", handler: createHealthHandler(ctx) },
    { method: "POST", path: "/analyze", handler: createAnalyzeHandler(ctx) },
    { method: "POST", path: "/transcribe", handler: createTranscribeHandler(ctx) },
    { method: "POST", path: "/clone-voice", handler: createCloneVoiceHandler(ctx) },
    { method: "POST", path: "/generate-audio", handler: createGenerateAudioHandler(ctx) },
  ];
}

export function createGatewayApp(ctx: GatewayContext): RouteHandler {
  return createRouter(createRoutes(ctx), {
    corsOrigin: ctx.config.server.corsOrigin,
    logger: ctx.logger,
  });
}
