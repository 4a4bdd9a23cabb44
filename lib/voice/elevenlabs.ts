/**
 * ElevenLabs REST client: instant voice cloning and text-to-speech
 *
 * Both calls resolve to null on any provider failure instead of throwing.
 */

import { z } from "zod";
import type { ElevenLabsConfig } from "../config/env.js";
import { errorMessage, type Logger } from "../logging/logger.js";
import type { FetchLike } from "../openai/client.js";

const addVoiceResponseSchema = z.object({
  voice_id: z.string().min(1),
});

export interface VoiceSettings {
  stability: number;
  similarity_boost: number;
}

const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.5,
  similarity_boost: 0.75,
};

export class ElevenLabsClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: ElevenLabsConfig & { apiKey: string },
    private readonly logger: Logger,
    fetchImpl: FetchLike = fetch
  ) {
    this.fetchImpl = fetchImpl;
  }

  get defaultVoiceId(): string {
    return this.config.defaultVoiceId;
  }

  /**
   * Upload a voice sample and return the id of the new voice
   */
  async cloneVoice(sample: Blob, name: string): Promise<string | null> {
    const form = new FormData();
    form.append("name", name);
    form.append("files", sample, "sample.mp3");

    try {
      const response = await this.fetchImpl(this.url("/v1/voices/add"), {
        method: "POST",
        headers: { "xi-api-key": this.config.apiKey },
        body: form,
      });

      if (!response.ok) {
        this.logger.warn("ElevenLabs voice clone failed", {
          status: response.status,
          body: await response.text(),
        });
        return null;
      }

      const parsed = addVoiceResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn("ElevenLabs voice clone returned no voice_id");
        return null;
      }
      return parsed.data.voice_id;
    } catch (error) {
      this.logger.warn("ElevenLabs voice clone request error", { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Synthesize text with the given voice, returning MP3 bytes
   */
  async synthesize(
    text: string,
    voiceId: string = this.config.defaultVoiceId,
    settings: VoiceSettings = DEFAULT_VOICE_SETTINGS
  ): Promise<Buffer | null> {
    try {
      const response = await this.fetchImpl(
        this.url(`/v1/text-to-speech/${encodeURIComponent(voiceId)}`),
        {
          method: "POST",
          headers: {
            Accept: "audio/mpeg",
            "Content-Type": "application/json",
            "xi-api-key": this.config.apiKey,
          },
          body: JSON.stringify({
            text,
            model_id: this.config.modelId,
            voice_settings: settings,
          }),
        }
      );

      if (!response.ok) {
        this.logger.warn("ElevenLabs synthesis failed", {
          status: response.status,
          voiceId,
        });
        return null;
      }

      const audio = Buffer.from(await response.arrayBuffer());
      return audio.length > 0 ? audio : null;
    } catch (error) {
      this.logger.warn("ElevenLabs synthesis request error", { error: errorMessage(error) });
      return null;
    }
  }

  private url(pathname: string): string {
    return `${this.config.baseURL.replace(/\/+$/, "")}${pathname}`;
  }
}
