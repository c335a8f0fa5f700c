import type { PromptBundle, SummaryStyle } from "../types.js";

const SHARED_STRUCTURE = `Structure:
1. A main title in **bold**.
2. A short contextual introduction.
3. Thematic sections with subheadings.
4. Key points as bullets.
5. Highlighted conclusions.`;

const STYLE_RULES: Record<SummaryStyle, string> = {
  detailed: `- Cover every section of the source, keeping its order.
- Keep figures, examples and caveats.
- Keep length ~1000-1500 words.`,
  balanced: `- Keep the order of the source.
- Focus on the central arguments, results and takeaways.
- Keep length ~500-800 words.`,
  concise: `- Only the essentials: thesis, key findings, conclusion.
- Keep output under 300 words.`,
};

export function buildFinalPrompt(style: SummaryStyle, partialSummaries: string): PromptBundle {
  return {
    systemPrompt: `You are a professional editor producing one coherent summary from partial summaries of a transcript.

${SHARED_STRUCTURE}

Requirements:
${STYLE_RULES[style]}
- Sections marked as unavailable could not be summarized; mention the gap briefly, never fill it in.
- Write in the language of the partial summaries, using markdown.
- Do not invent facts not present in the partial summaries.`,
    userPrompt: `Create the ${style.toUpperCase()} final summary from these partial summaries:\n\n${partialSummaries}`,
  };
}
