import { describe, expect, it, vi } from "vitest";
import { quietLogger } from "../../lib/testing/providerStubs.js";
import type { VoiceService } from "../context.js";
import { createCloneVoiceHandler, createGenerateAudioHandler } from "./voice.js";

function fakeVoice(overrides: Partial<VoiceService> = {}): VoiceService {
  const voices = new Map<string, string>();
  return {
    canClone: true,
    canSynthesize: true,
    cloneVoice: vi.fn(async () => "voice-123"),
    synthesize: vi.fn(async () => Buffer.from([1, 2, 3])),
    rememberVoice: vi.fn((sessionId: string, voiceId: string) => {
      voices.set(sessionId, voiceId);
    }),
    voiceFor: vi.fn((sessionId: string) => voices.get(sessionId)),
    ...overrides,
  };
}

function cloneRequest(headers: Record<string, string> = {}, name?: string): Request {
  const form = new FormData();
  form.append("audio", new Blob([new Uint8Array([5, 5])], { type: "audio/mpeg" }), "me.mp3");
  if (name !== undefined) form.append("name", name);
  return new Request("http://localhost/clone-voice", { method: "POST", body: form, headers });
}

function generateRequest(body: unknown, headers: Record<string, string> = {}): Request {
  return new Request("http://localhost/generate-audio", {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

describe("POST /clone-voice", () => {
  it("clones the voice and remembers it for the caller's session", async () => {
    const voice = fakeVoice();
    const handler = createCloneVoiceHandler({ voice });

    const response = await handler(cloneRequest({ "X-Session-Id": "session-a" }, "My voice"));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      voice_id: "voice-123",
      message: "Voice cloned successfully",
      session_id: "session-a",
    });
    expect(response.headers.get("x-session-id")).toBe("session-a");
    expect(voice.cloneVoice).toHaveBeenCalledWith(expect.any(Blob), "My voice");
    expect(voice.rememberVoice).toHaveBeenCalledWith("session-a", "voice-123");
  });

  it("issues a session id when the caller has none", async () => {
    const voice = fakeVoice();
    const handler = createCloneVoiceHandler({ voice });

    const response = await handler(cloneRequest());
    const sessionId = response.headers.get("x-session-id");

    expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(await response.json()).toEqual({
      voice_id: "voice-123",
      message: "Voice cloned successfully",
      session_id: sessionId,
    });
    expect(voice.cloneVoice).toHaveBeenCalledWith(expect.any(Blob), undefined);
  });

  it("answers 500 when cloning fails", async () => {
    const handler = createCloneVoiceHandler({
      voice: fakeVoice({ cloneVoice: vi.fn(async () => null) }),
    });

    const response = await handler(cloneRequest());

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Failed to clone voice" });
  });

  it("rejects a body that is not multipart", async () => {
    const handler = createCloneVoiceHandler({ voice: fakeVoice() });

    const response = await handler(generateRequest({ text: "hi" }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Expected multipart/form-data" });
  });
});

describe("POST /generate-audio", () => {
  it("streams MP3 audio from the default voice", async () => {
    const voice = fakeVoice();
    const handler = createGenerateAudioHandler({ voice, logger: quietLogger() });

    const response = await handler(generateRequest({ text: "Read this aloud" }));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("audio/mpeg");
    expect(Buffer.from(await response.arrayBuffer())).toEqual(Buffer.from([1, 2, 3]));
    expect(voice.synthesize).toHaveBeenCalledWith("Read this aloud", undefined);
  });

  it("uses the session's cloned voice when asked to", async () => {
    const voice = fakeVoice();
    voice.rememberVoice("session-a", "voice-123");
    const handler = createGenerateAudioHandler({ voice, logger: quietLogger() });

    await handler(
      generateRequest({ text: "Read this", use_cloned_voice: true }, { "X-Session-Id": "session-a" })
    );

    expect(voice.synthesize).toHaveBeenCalledWith("Read this", "voice-123");
  });

  it("does not use another session's cloned voice", async () => {
    const voice = fakeVoice();
    voice.rememberVoice("session-a", "voice-123");
    const handler = createGenerateAudioHandler({ voice, logger: quietLogger() });

    await handler(
      generateRequest({ text: "Read this", use_cloned_voice: true }, { "X-Session-Id": "session-b" })
    );

    expect(voice.synthesize).toHaveBeenCalledWith("Read this", undefined);
  });

  it("rejects empty text", async () => {
    const voice = fakeVoice();
    const handler = createGenerateAudioHandler({ voice, logger: quietLogger() });

    const response = await handler(generateRequest({ text: " " }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Text cannot be empty" });
    expect(voice.synthesize).not.toHaveBeenCalled();
  });

  it("answers 500 when no audio could be produced", async () => {
    const handler = createGenerateAudioHandler({
      voice: fakeVoice({ synthesize: vi.fn(async () => null) }),
      logger: quietLogger(),
    });

    const response = await handler(generateRequest({ text: "Read this" }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Failed to generate audio" });
  });
});
