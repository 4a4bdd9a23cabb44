import type { GatewayConfig } from "../lib/config/env.js";
import type { SpeechAnalyzer } from "../lib/analysis/types.js";
import type { Logger } from "../lib/logging/logger.js";
import type { STTResult } from "../lib/openai/stt.js";
import type { VoiceGateway } from "../lib/voice/gateway.js";

export type Transcriber = (audio: Blob, filename: string) => Promise<STTResult>;

export type VoiceService = Pick<
  VoiceGateway,
  "cloneVoice" | "synthesize" | "rememberVoice" | "voiceFor" | "canClone" | "canSynthesize"
>;

/**
 * Everything the route handlers need, built once in the entry point
 */
export interface GatewayContext {
  config: GatewayConfig;
  logger: Logger;
  analyzer: SpeechAnalyzer & { readonly configured: boolean };
  voice: VoiceService;
  /** Null when no transcription credential is configured */
  transcribe: Transcriber | null;
  startedAt: number;
}
