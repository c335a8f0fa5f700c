import type { PromptBundle } from "../types.js";

// Bump whenever the wording changes so cached partial summaries are not reused across prompts.
export const CHUNK_PROMPT_VERSION = "chunk-v1";

export type ChunkPromptInput = {
  chunkNumber: number;
  transcriptExcerpt: string;
};

export function buildChunkPrompt(input: ChunkPromptInput): PromptBundle {
  const systemPrompt = `You are an expert at analysing and condensing spoken technical content.

Summarize ONLY the transcript excerpt you are given.
It is one part of a longer transcript; do not guess at what came before or after.

Rules:
- Capture the main ideas and key points.
- Keep relevant figures, numbers and named entities exactly as stated.
- Note important conclusions.
- Write in the language of the transcript.
- Do not invent content not present in the excerpt.`;

  const userPrompt = [
    `TRANSCRIPT PART ${input.chunkNumber}:`,
    input.transcriptExcerpt,
    "",
    "Return only the partial summary (no title, no preamble).",
  ].join("\n");

  return {
    systemPrompt,
    userPrompt,
  };
}
