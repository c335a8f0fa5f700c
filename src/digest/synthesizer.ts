import { log } from "../utils/logger.js";
import { Deadline } from "./deadline.js";
import { CancelledError, errorMessage, GenerationError } from "./errors.js";
import { buildFinalPrompt } from "./prompts/finalPrompt.js";
import type { PartialSummary, StreamErrorInfo, SummaryStreamEvent, SummaryStyle, TextGenerator } from "./types.js";

const digestLog = log.withScope("digest");

export type SynthesizeOptions = {
  generator: TextGenerator;
  model: string;
  style: SummaryStyle;
  temperature: number;
  maxOutputTokens: number;
  synthesisCharBudget: number;
  timeoutMs: number;
  signal?: AbortSignal;
};

export function unavailableMarker(chunkIndex: number): string {
  return `[Section ${chunkIndex + 1} unavailable]`;
}

export function failureMarker(error: StreamErrorInfo): string {
  return `\n\n[Summary generation failed: ${error.kind}: ${error.message}]`;
}

/**
 * Joins partial summaries in chunk order. Failed chunks keep their place as an
 * explicit marker so the gap is visible to the final pass.
 */
export function combinePartials(partials: readonly PartialSummary[], charBudget: number): string {
  const combined = [...partials]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map((partial) => (partial.failed ? unavailableMarker(partial.chunkIndex) : partial.text))
    .join("\n\n");

  return combined.slice(0, Math.max(0, charBudget));
}

function describeStreamError(err: unknown): StreamErrorInfo {
  if (err instanceof GenerationError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: "Unknown", message: errorMessage(err) };
}

/**
 * Streams the final summary. Each increment is forwarded as soon as it arrives;
 * a failure ends the stream with one event carrying a visible marker and `error`.
 * Cancellation closes the stream quietly.
 */
export async function* synthesize(
  partials: readonly PartialSummary[],
  options: SynthesizeOptions,
): AsyncGenerator<SummaryStreamEvent, void, undefined> {
  const prompt = buildFinalPrompt(options.style, combinePartials(partials, options.synthesisCharBudget));
  const deadline = new Deadline(options.timeoutMs, options.signal);
  let sequence = 0;
  const started = Date.now();

  try {
    const stream = options.generator.generateStream(
      {
        ...prompt,
        model: options.model,
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens,
      },
      deadline.signal,
    );
    const iterator = stream[Symbol.asyncIterator]();

    while (true) {
      const step = await deadline.race(iterator.next());
      if (step.done) break;
      if (!step.value) continue;

      yield { sequence: sequence++, delta: step.value };
    }

    digestLog.info(`synthesis finished`, { events: sequence, ms: Date.now() - started });
  } catch (err) {
    if (err instanceof CancelledError || options.signal?.aborted) {
      digestLog.info(`synthesis cancelled`, { events: sequence });
      return;
    }

    const error = describeStreamError(err);
    digestLog.error(`synthesis failed`, { ...error, events: sequence });
    yield { sequence: sequence++, delta: failureMarker(error), error };
  } finally {
    deadline.dispose();
  }
}
