import { z } from "zod";

export const alternateSpeechSchema = z.object({
  demographic: z.string().min(1),
  speech: z.string().min(1),
});

/**
 * Shape every analysis must have before it leaves the engine:
 * exactly three distinct demographics and three rewritten speeches.
 */
export const speechAnalysisResultSchema = z.object({
  category: z.string().min(1),
  demographics: z
    .array(z.string().min(1))
    .length(3)
    .refine((items) => new Set(items).size === items.length, {
      message: "demographics must be distinct",
    }),
  alternateSpeeches: z.array(alternateSpeechSchema).length(3),
});

export type AlternateSpeech = Readonly<z.infer<typeof alternateSpeechSchema>>;

export interface SpeechAnalysisResult {
  readonly category: string;
  readonly demographics: readonly string[];
  readonly alternateSpeeches: readonly AlternateSpeech[];
}

export type FallbackReason =
  | "configuration_absent"
  | "provider_unavailable"
  | "malformed_output"
  | "invalid_shape";

export interface AnalyzeOptions {
  /** Aborts the provider call; the engine then resolves to the fallback */
  signal?: AbortSignal;
}

export interface SpeechAnalyzer {
  analyze(text: string, options?: AnalyzeOptions): Promise<SpeechAnalysisResult>;
}

export function freezeAnalysis(
  result: z.infer<typeof speechAnalysisResultSchema>
): SpeechAnalysisResult {
  return Object.freeze({
    category: result.category,
    demographics: Object.freeze([...result.demographics]),
    alternateSpeeches: Object.freeze(
      result.alternateSpeeches.map((entry) =>
        Object.freeze({ demographic: entry.demographic, speech: entry.speech })
      )
    ),
  });
}
