/**
 * Speech-to-Text (STT) using OpenAI Whisper API
 */

import OpenAI, { toFile } from "openai";

export interface STTOptions {
  model?: string;
  language?: string;
  prompt?: string;
  filename?: string;
}

export interface STTResult {
  transcript: string;
}

/**
 * Transcribe an uploaded audio clip
 *
 * Throws when the provider rejects the request; callers map that to an HTTP error.
 */
export async function transcribeAudio(
  client: OpenAI,
  audio: Blob,
  options: STTOptions = {}
): Promise<STTResult> {
  const file = await toFile(audio, options.filename || "audio.webm", {
    type: audio.type || "audio/webm",
  });

  const transcription = await client.audio.transcriptions.create({
    file,
    model: options.model || "whisper-1",
    language: options.language,
    prompt: options.prompt,
  });

  return { transcript: transcription.text };
}
