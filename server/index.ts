/**
 * Speech Analysis Gateway - Main Entry Point
 *
 * HTTP front for speech analysis, transcription, voice cloning and synthesis.
 */

import "dotenv/config";
import { loadConfig } from "../lib/config/env.js";
import { Logger, errorMessage } from "../lib/logging/logger.js";
import { SpeechAnalysisEngine } from "../lib/analysis/engine.js";
import { createOpenAIClient } from "../lib/openai/client.js";
import { transcribeAudio } from "../lib/openai/stt.js";
import { VoiceGateway } from "../lib/voice/gateway.js";
import { createGatewayApp } from "./app.js";
import type { Transcriber } from "./context.js";
import { GatewayServer } from "./http/GatewayServer.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger({ logPath: config.logPath, debug: config.debug });

  const analyzer = new SpeechAnalysisEngine(config.analysis, { logger });
  const voice = new VoiceGateway(config, { logger });

  const openai = createOpenAIClient({ apiKey: config.openai.apiKey });
  const transcribe: Transcriber | null = openai
    ? (audio, filename) => transcribeAudio(openai, audio, { model: config.openai.sttModel, filename })
    : null;

  logger.info("Speech analysis gateway starting...", {
    port: config.server.port,
    completion: analyzer.configured,
    transcription: transcribe !== null,
    voiceCloning: voice.canClone,
  });
  if (!analyzer.configured) {
    logger.warn("OPENROUTER_API_KEY not set; /analyze will return the fallback analysis");
  }

  const app = createGatewayApp({
    config,
    logger,
    analyzer,
    voice,
    transcribe,
    startedAt: Date.now(),
  });
  const server = new GatewayServer(app, config.server, logger);
  await server.listen();
  logger.log("server_start", { port: config.server.port, host: config.server.host });

  // Expired voice sessions are otherwise only dropped when looked up
  const pruneTimer = setInterval(() => {
    const removed = voice.pruneSessions();
    if (removed > 0) {
      logger.debug("Pruned voice sessions", { removed });
    }
  }, 5 * 60 * 1000);
  pruneTimer.unref();

  // Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down...");
    clearInterval(pruneTimer);
    await server.close();
    logger.log("server_stop", {});
    await logger.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error("Shutdown failed", { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error("[Gateway] Fatal error", errorMessage(error));
  process.exit(1);
});
