/**
 * Voice Gateway
 *
 * Voice cloning goes to ElevenLabs. Speech synthesis tries ElevenLabs first and
 * OpenAI TTS second. Every operation resolves to null rather than throwing.
 */

import type OpenAI from "openai";
import type { GatewayConfig } from "../config/env.js";
import { errorMessage, type Logger } from "../logging/logger.js";
import { createOpenAIClient, type FetchLike } from "../openai/client.js";
import { synthesizeSpeech } from "../openai/tts.js";
import { ElevenLabsClient } from "./elevenlabs.js";
import { VoiceSessionStore } from "./sessionStore.js";

export interface VoiceGatewayDeps {
  logger: Logger;
  fetch?: FetchLike;
  /** Clock for session expiry, used by tests */
  now?: () => number;
}

export class VoiceGateway {
  private readonly elevenlabs: ElevenLabsClient | null;
  private readonly openai: OpenAI | null;
  private readonly sessions: VoiceSessionStore;
  private readonly logger: Logger;

  constructor(
    private readonly config: Pick<GatewayConfig, "elevenlabs" | "openai" | "voiceSessionTtlMs">,
    deps: VoiceGatewayDeps
  ) {
    this.logger = deps.logger;
    const { apiKey } = config.elevenlabs;
    this.elevenlabs = apiKey
      ? new ElevenLabsClient({ ...config.elevenlabs, apiKey }, deps.logger, deps.fetch)
      : null;
    this.openai = createOpenAIClient({ apiKey: config.openai.apiKey, fetch: deps.fetch });
    this.sessions = new VoiceSessionStore(config.voiceSessionTtlMs, deps.now);
  }

  get canClone(): boolean {
    return this.elevenlabs !== null;
  }

  get canSynthesize(): boolean {
    return this.elevenlabs !== null || this.openai !== null;
  }

  async cloneVoice(sample: Blob, name: string = "Cloned Voice"): Promise<string | null> {
    if (!this.elevenlabs) {
      this.logger.log("voice_clone", { ok: false, reason: "not_configured" });
      return null;
    }

    const voiceId = await this.elevenlabs.cloneVoice(sample, name);
    this.logger.log("voice_clone", { ok: voiceId !== null, bytes: sample.size });
    return voiceId;
  }

  /**
   * Synthesize MP3 audio. A voice id only applies to the ElevenLabs backend.
   */
  async synthesize(text: string, voiceId?: string): Promise<Buffer | null> {
    if (this.elevenlabs) {
      const audio = await this.elevenlabs.synthesize(text, voiceId ?? this.elevenlabs.defaultVoiceId);
      if (audio) {
        this.logger.log("voice_synthesize", { ok: true, backend: "elevenlabs", bytes: audio.length });
        return audio;
      }
      this.logger.log("voice_synthesize", { ok: false, backend: "elevenlabs" });
    }

    if (this.openai) {
      try {
        const audio = await synthesizeSpeech(this.openai, text, {
          model: this.config.openai.ttsModel,
          voice: this.config.openai.ttsVoice,
        });
        if (audio.length > 0) {
          this.logger.log("voice_synthesize", { ok: true, backend: "openai", bytes: audio.length });
          return audio;
        }
        this.logger.log("voice_synthesize", { ok: false, backend: "openai", reason: "empty_audio" });
      } catch (error) {
        this.logger.log("voice_synthesize", { ok: false, backend: "openai", error: errorMessage(error) });
      }
    }

    return null;
  }

  rememberVoice(sessionId: string, voiceId: string): void {
    this.sessions.set(sessionId, voiceId);
  }

  voiceFor(sessionId: string): string | undefined {
    return this.sessions.get(sessionId)?.voiceId;
  }

  pruneSessions(): number {
    return this.sessions.prune();
  }
}
