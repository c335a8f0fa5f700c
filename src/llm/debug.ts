import type { GenerationRequest, TextGenerator } from "../digest/types.js";

const DEBUG_SUMMARY_WORDS = 40;

/**
 * Debug text generator.
 *
 * Deterministic and offline: echoes the leading words of the prompt content so a
 * full pipeline run can be exercised without API keys or network access.
 */
export class DebugTextGenerator implements TextGenerator {
  private calls = 0;

  get callCount(): number {
    return this.calls;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.calls++;
    return `(debug summary) ${this.leadingWords(request.userPrompt)}`;
  }

  async *generateStream(request: GenerationRequest): AsyncGenerator<string, void, undefined> {
    this.calls++;
    yield "**Debug summary**\n\n";
    for (const word of this.leadingWords(request.userPrompt).split(" ")) {
      yield `${word} `;
    }
  }

  private leadingWords(prompt: string): string {
    // Drop the header line ("TRANSCRIPT PART 1:", "Create the ... summary ...").
    const body = prompt.split("\n").slice(1).join(" ");
    return body.split(/\s+/).filter(Boolean).slice(0, DEBUG_SUMMARY_WORDS).join(" ");
  }
}
