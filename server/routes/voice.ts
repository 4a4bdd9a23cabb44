import { z } from "zod";
import type { GatewayContext } from "../context.js";
import type { RouteHandler } from "../http/router.js";
import {
  SESSION_HEADER,
  errorResponse,
  jsonResponse,
  readAudioUpload,
  resolveSessionId,
} from "../http/responses.js";

const generateAudioRequestSchema = z.object({
  text: z.string().default(""),
  use_cloned_voice: z.boolean().default(false),
});

/**
 * POST /clone-voice
 *
 * The new voice is remembered for the caller's session (X-Session-Id).
 */
export function createCloneVoiceHandler(ctx: Pick<GatewayContext, "voice">): RouteHandler {
  return async (request) => {
    const upload = await readAudioUpload(request);
    if (!upload) {
      return errorResponse(400, "Expected multipart/form-data");
    }
    if (!upload.audio || upload.audio.size === 0) {
      return errorResponse(400, "No audio file provided");
    }

    const name = upload.form.get("name");
    const voiceId = await ctx.voice.cloneVoice(
      upload.audio,
      typeof name === "string" && name.trim() ? name.trim() : undefined
    );
    if (!voiceId) {
      return errorResponse(500, "Failed to clone voice");
    }

    const sessionId = resolveSessionId(request);
    ctx.voice.rememberVoice(sessionId, voiceId);

    return jsonResponse(
      { voice_id: voiceId, message: "Voice cloned successfully", session_id: sessionId },
      200,
      { [SESSION_HEADER]: sessionId }
    );
  };
}

/**
 * POST /generate-audio
 */
export function createGenerateAudioHandler(ctx: Pick<GatewayContext, "voice" | "logger">): RouteHandler {
  return async (request) => {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return errorResponse(400, "Request body must be valid JSON");
    }

    const parsed = generateAudioRequestSchema.safeParse(body);
    if (!parsed.success) {
      return errorResponse(400, "Invalid request");
    }

    const { text, use_cloned_voice: useClonedVoice } = parsed.data;
    if (!text.trim()) {
      return errorResponse(400, "Text cannot be empty");
    }

    let voiceId: string | undefined;
    if (useClonedVoice) {
      const sessionId = request.headers.get(SESSION_HEADER)?.trim();
      voiceId = sessionId ? ctx.voice.voiceFor(sessionId) : undefined;
      if (!voiceId) {
        ctx.logger.warn("No cloned voice for session, using default voice");
      }
    }

    const audio = await ctx.voice.synthesize(text, voiceId);
    if (!audio) {
      return errorResponse(500, "Failed to generate audio");
    }

    return new Response(audio, {
      status: 200,
      headers: {
        "Content-Type": "audio/mpeg",
        "Content-Length": String(audio.length),
      },
    });
  };
}
