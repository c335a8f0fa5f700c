// Request-size caps follow the model's context window rather than fixed character counts.

const KNOWN_CONTEXT_TOKENS: Record<string, number> = {
  "gpt-4o": 128000,
  "gpt-4o-mini": 128000,
  "gpt-4-turbo": 128000,
  "gpt-4.1": 1047576,
  "gpt-4.1-mini": 1047576,
  "gpt-3.5-turbo": 16385,
};

export const DEFAULT_CONTEXT_TOKENS = 16385;

// Rough English average; only used to turn a token window into a character cap.
export const CHARS_PER_TOKEN = 4;

// Room for the system prompt and instructions wrapped around the content.
export const PROMPT_OVERHEAD_TOKENS = 512;

export function contextTokensForModel(model: string): number {
  if (Object.hasOwn(KNOWN_CONTEXT_TOKENS, model)) {
    return KNOWN_CONTEXT_TOKENS[model] ?? DEFAULT_CONTEXT_TOKENS;
  }

  // Dated snapshots ("gpt-4o-mini-2024-07-18") share their family's window.
  const family = Object.keys(KNOWN_CONTEXT_TOKENS)
    .filter((name) => model.startsWith(`${name}-`))
    .sort((a, b) => b.length - a.length)[0];

  return family ? KNOWN_CONTEXT_TOKENS[family] ?? DEFAULT_CONTEXT_TOKENS : DEFAULT_CONTEXT_TOKENS;
}

export function charBudgetFor(contextTokens: number, maxOutputTokens: number): number {
  const inputTokens = Math.max(1, Math.floor(contextTokens) - Math.max(0, maxOutputTokens) - PROMPT_OVERHEAD_TOKENS);
  return inputTokens * CHARS_PER_TOKEN;
}
