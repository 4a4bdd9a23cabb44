/**
 * Prompt templates for speech analysis
 */

import { TEXT_PLACEHOLDER } from "../config/env.js";

export const ANALYSIS_PROMPT_TEMPLATE = `Analyze the following speech and respond with a single JSON object.

Speech: "${TEXT_PLACEHOLDER}"

The JSON object must have exactly these fields:
{
  "category": "The main topic of the speech (politics, economics, climate, etc.)",
  "demographics": ["Three different audience segments, as short labels"],
  "alternateSpeeches": [
    { "demographic": "First demographic", "speech": "The speech rewritten for this audience" },
    { "demographic": "Second demographic", "speech": "The speech rewritten for this audience" },
    { "demographic": "Third demographic", "speech": "The speech rewritten for this audience" }
  ]
}

Rules:
- "demographics" holds exactly 3 distinct strings; "alternateSpeeches" holds exactly 3 objects, in the same order.
- Each rewritten speech addresses what that demographic cares about.
- Each rewritten speech is roughly as long as the original speech.

Only return the JSON, no other text.`;

/**
 * Build the analysis instruction. The text is inserted verbatim, so `$&` and
 * similar replacement patterns in user input are not expanded.
 */
export function buildAnalysisPrompt(
  text: string,
  template: string = ANALYSIS_PROMPT_TEMPLATE
): string {
  return template.split(TEXT_PLACEHOLDER).join(text);
}
