import { errorMessage } from "../../lib/logging/logger.js";
import type { GatewayContext } from "../context.js";
import type { RouteHandler } from "../http/router.js";
import { errorResponse, jsonResponse, readAudioUpload } from "../http/responses.js";

/**
 * POST /transcribe
 */
export function createTranscribeHandler(ctx: Pick<GatewayContext, "transcribe" | "logger">): RouteHandler {
  return async (request) => {
    if (!ctx.transcribe) {
      return errorResponse(503, "Transcription is not configured");
    }

    const upload = await readAudioUpload(request);
    if (!upload) {
      return errorResponse(400, "Expected multipart/form-data");
    }
    if (!upload.audio) {
      return errorResponse(400, "No audio file provided");
    }
    if (upload.audio.size === 0) {
      return errorResponse(400, "Audio file is empty");
    }

    try {
      const result = await ctx.transcribe(upload.audio, upload.filename);
      ctx.logger.log("transcribe", { ok: true, bytes: upload.audio.size });
      return jsonResponse({ text: result.transcript });
    } catch (error) {
      ctx.logger.log("transcribe", { ok: false, error: errorMessage(error) });
      ctx.logger.error("Transcription error", { error: errorMessage(error) });
      return errorResponse(500, "Failed to transcribe audio");
    }
  };
}
