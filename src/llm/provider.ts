/**
 * Text generator selection.
 *
 * LLM_PROVIDER env var: "openai" | "debug"
 * Providers are lazy-loaded and cached (single instance per process).
 */

import type { Config } from "../config/types.js";
import type { TextGenerator } from "../digest/types.js";
import { DebugTextGenerator } from "./debug.js";

let providerPromise: Promise<TextGenerator> | null = null;

export function getTextGeneratorInfo(cfg: Config): { name: string; description: string } {
  switch (cfg.llm.provider) {
    case "debug":
      return { name: "debug", description: "deterministic offline summaries for development" };
    case "openai":
      return { name: "openai", description: `OpenAI chat completions (${cfg.llm.model})` };
  }
}

export async function getTextGenerator(cfg: Config): Promise<TextGenerator> {
  if (providerPromise) return providerPromise;

  providerPromise = (async () => {
    switch (cfg.llm.provider) {
      case "debug":
        return new DebugTextGenerator();

      case "openai": {
        // Lazy-load so the debug provider never imports the SDK
        const { getOpenAIClient, OpenAiTextGenerator } = await import("./client.js");
        return new OpenAiTextGenerator(getOpenAIClient(cfg.openai.apiKey));
      }
    }
  })();

  try {
    return await providerPromise;
  } catch (err) {
    providerPromise = null;
    throw err;
  }
}
