/**
 * Canned analysis returned whenever the completion provider cannot be used
 * or its output cannot be trusted.
 */

import { freezeAnalysis, type SpeechAnalysisResult } from "./types.js";

export function createFallbackResult(): SpeechAnalysisResult {
  return freezeAnalysis({
    category: "General",
    demographics: ["Progressive", "Conservative", "Moderate"],
    alternateSpeeches: [
      {
        demographic: "Progressive",
        speech: "We need bold action and systemic change to address this issue effectively.",
      },
      {
        demographic: "Conservative",
        speech: "We should preserve our values while making careful, measured improvements.",
      },
      {
        demographic: "Moderate",
        speech: "A balanced approach considering all perspectives will yield the best results.",
      },
    ],
  });
}
