/**
 * Environment Configuration
 * Validates the process environment and builds the gateway configuration
 */

import { z } from 'zod';

export const TEXT_PLACEHOLDER = '{{text}}';

// Empty strings count as "not set"
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const booleanFlag = z.enum(['true', 'false']).transform((v) => v === 'true');

const envSchema = z.object({
  // HTTP server
  HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HTTP_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(25 * 1024 * 1024),

  // Completion provider (OpenRouter)
  OPENROUTER_API_KEY: optionalSecret,
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  ANALYSIS_MODEL: z.string().min(1).default('mistralai/mistral-7b-instruct'),
  ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  ANALYSIS_MAX_TOKENS: z.coerce.number().int().positive().default(15000),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ANALYSIS_PROMPT_TEMPLATE: optionalSecret.refine(
    (v) => v === undefined || v.includes(TEXT_PLACEHOLDER),
    { message: `must contain ${TEXT_PLACEHOLDER}` },
  ),

  // OpenAI (transcription, secondary speech backend)
  OPENAI_API_KEY: optionalSecret,
  OPENAI_STT_MODEL: z.string().min(1).default('whisper-1'),
  OPENAI_TTS_MODEL: z.string().min(1).default('tts-1'),
  OPENAI_TTS_VOICE: z
    .enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'])
    .default('alloy'),

  // ElevenLabs (voice cloning, primary speech backend)
  ELEVENLABS_API_KEY: optionalSecret,
  ELEVENLABS_BASE_URL: z.string().url().default('https://api.elevenlabs.io'),
  ELEVENLABS_MODEL_ID: z.string().min(1).default('eleven_multilingual_v2'),
  ELEVENLABS_VOICE_ID: z.string().min(1).default('21m00Tcm4TlvDq8ikWAM'),
  VOICE_SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),

  // Logging
  LOG_PATH: z.string().default('./data/gateway.log'),
  DEBUG: booleanFlag.default('false'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
  maxUploadBytes: number;
}

export interface AnalysisConfig {
  apiKey?: string;
  baseURL: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  promptTemplate?: string;
}

export interface OpenAIConfig {
  apiKey?: string;
  sttModel: string;
  ttsModel: string;
  ttsVoice: EnvConfig['OPENAI_TTS_VOICE'];
}

export interface ElevenLabsConfig {
  apiKey?: string;
  baseURL: string;
  modelId: string;
  defaultVoiceId: string;
}

export interface GatewayConfig {
  server: ServerConfig;
  analysis: AnalysisConfig;
  openai: OpenAIConfig;
  elevenlabs: ElevenLabsConfig;
  voiceSessionTtlMs: number;
  logPath: string;
  debug: boolean;
}

export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('[Config] Invalid environment configuration:');
    const retained: NodeJS.ProcessEnv = { ...source };
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message} (using default)`);
      const [key] = issue.path;
      if (typeof key === 'string') {
        delete retained[key];
      }
    }
    // Only the invalid keys fall back; credentials set alongside them are kept
    const retry = envSchema.safeParse(retained);
    return retry.success ? retry.data : envSchema.parse({});
  }

  return result.data;
}

/**
 * Build the gateway configuration once at startup. Missing credentials are not
 * an error: the components that need them degrade instead.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const env = parseEnv(source);

  return {
    server: {
      port: env.HTTP_PORT,
      host: env.HTTP_HOST,
      corsOrigin: env.CORS_ORIGIN,
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
    analysis: {
      apiKey: env.OPENROUTER_API_KEY,
      baseURL: env.OPENROUTER_BASE_URL,
      model: env.ANALYSIS_MODEL,
      temperature: env.ANALYSIS_TEMPERATURE,
      maxTokens: env.ANALYSIS_MAX_TOKENS,
      timeoutMs: env.ANALYSIS_TIMEOUT_MS,
      promptTemplate: env.ANALYSIS_PROMPT_TEMPLATE,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      sttModel: env.OPENAI_STT_MODEL,
      ttsModel: env.OPENAI_TTS_MODEL,
      ttsVoice: env.OPENAI_TTS_VOICE,
    },
    elevenlabs: {
      apiKey: env.ELEVENLABS_API_KEY,
      baseURL: env.ELEVENLABS_BASE_URL,
      modelId: env.ELEVENLABS_MODEL_ID,
      defaultVoiceId: env.ELEVENLABS_VOICE_ID,
    },
    voiceSessionTtlMs: env.VOICE_SESSION_TTL_MS,
    logPath: env.LOG_PATH,
    debug: env.DEBUG,
  };
}
