/**
 * Text-to-Speech (TTS) using OpenAI TTS API
 *
 * Secondary speech backend when ElevenLabs is not configured or fails
 */

import OpenAI from "openai";

export type OpenAIVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export interface TTSOptions {
  model?: string;
  voice?: OpenAIVoice;
}

export async function synthesizeSpeech(
  client: OpenAI,
  text: string,
  options: TTSOptions = {}
): Promise<Buffer> {
  const response = await client.audio.speech.create({
    model: options.model || "tts-1",
    voice: options.voice || "alloy",
    input: text,
    response_format: "mp3",
  });

  return Buffer.from(await response.arrayBuffer());
}
