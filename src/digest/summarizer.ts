import { log } from "../utils/logger.js";
import { fingerprintChunk, NoopSummaryCache, type SummaryCache } from "./cache.js";
import { withDeadline } from "./deadline.js";
import { CancelledError, errorMessage, GenerationError, toGenerationError } from "./errors.js";
import { buildChunkPrompt, CHUNK_PROMPT_VERSION } from "./prompts/chunkPrompt.js";
import type { Chunk, GenerationRequest, PartialSummary, RetryState, TextGenerator } from "./types.js";

const digestLog = log.withScope("digest");
const cacheLog = log.withScope("cache");

export type ChunkSummarizerOptions = {
  generator: TextGenerator;
  cache?: SummaryCache;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  chunkRequestCharBudget: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  sleep?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function failedSummary(chunk: Chunk, errorDetail: string, attempts: number): PartialSummary {
  return { chunkIndex: chunk.index, text: "", failed: true, errorDetail, attempts, fromCache: false };
}

function isCancelledSummary(result: PartialSummary): boolean {
  return result.failed && (result.errorDetail?.startsWith("Cancelled:") ?? false);
}

/**
 * Wraps the text generator for per-chunk summaries: cache lookup, one in-flight
 * request per fingerprint, bounded retries on transient errors, per-attempt timeout.
 * Always resolves; failures come back as `failed: true` entries.
 */
export class ChunkSummarizer {
  private readonly cache: SummaryCache;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly inFlight = new Map<string, Promise<PartialSummary>>();

  constructor(private readonly options: ChunkSummarizerOptions) {
    this.cache = options.cache ?? new NoopSummaryCache();
    this.sleep = options.sleep ?? sleep;
  }

  async summarizeChunk(chunk: Chunk, signal?: AbortSignal): Promise<PartialSummary> {
    if (signal?.aborted) {
      return failedSummary(chunk, "Cancelled: run was cancelled before the request was sent", 0);
    }

    const fingerprint = this.fingerprint(chunk);

    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      digestLog.debug(`chunk ${chunk.index}: joining in-flight request`, { fingerprint: fingerprint.slice(0, 12) });
      const shared = await pending;
      if (!isCancelledSummary(shared) || signal?.aborted) {
        return { ...shared, chunkIndex: chunk.index };
      }

      // The shared flight was cancelled by the run that started it, not by ours.
      digestLog.debug(`chunk ${chunk.index}: in-flight request was cancelled elsewhere, retrying`);
      return this.summarizeChunk(chunk, signal);
    }

    const work = this.resolve(chunk, fingerprint, signal);
    this.inFlight.set(fingerprint, work);
    try {
      return await work;
    } finally {
      this.inFlight.delete(fingerprint);
    }
  }

  fingerprint(chunk: Chunk): string {
    return fingerprintChunk({
      promptVersion: CHUNK_PROMPT_VERSION,
      model: this.options.model,
      temperature: this.options.temperature,
      maxOutputTokens: this.options.maxOutputTokens,
      charBudget: this.options.chunkRequestCharBudget,
      text: chunk.text,
    });
  }

  private async resolve(chunk: Chunk, fingerprint: string, signal?: AbortSignal): Promise<PartialSummary> {
    const cached = await this.readCache(fingerprint);
    if (cached) {
      cacheLog.debug(`chunk ${chunk.index}: cache hit`, { fingerprint: fingerprint.slice(0, 12) });
      return { ...cached.result, chunkIndex: chunk.index, fromCache: true, attempts: 0 };
    }

    const result = await this.requestWithRetry(chunk, signal);

    if (!result.failed) {
      try {
        await this.cache.set(fingerprint, result, this.options.cacheTtlMs);
      } catch (err) {
        cacheLog.warn(`chunk ${chunk.index}: cache write failed, result kept`, { error: errorMessage(err) });
      }
    }

    return result;
  }

  private async readCache(fingerprint: string) {
    try {
      return await this.cache.get(fingerprint);
    } catch (err) {
      cacheLog.warn("cache read failed, treating as miss", { error: errorMessage(err) });
      return null;
    }
  }

  private buildRequest(chunk: Chunk): GenerationRequest {
    // Truncation only shapes the request; the chunk itself keeps its full text.
    const prompt = buildChunkPrompt({
      chunkNumber: chunk.index + 1,
      transcriptExcerpt: chunk.text.slice(0, this.options.chunkRequestCharBudget),
    });

    return {
      ...prompt,
      model: this.options.model,
      temperature: this.options.temperature,
      maxOutputTokens: this.options.maxOutputTokens,
    };
  }

  private async requestWithRetry(chunk: Chunk, signal?: AbortSignal): Promise<PartialSummary> {
    const request = this.buildRequest(chunk);
    const state: RetryState = { attempt: 0, maxAttempts: Math.max(1, this.options.maxAttempts) };
    let lastMessage = "";

    while (state.attempt < state.maxAttempts) {
      if (signal?.aborted) {
        return failedSummary(chunk, `Cancelled: run was cancelled (after ${state.attempt} attempts)`, state.attempt);
      }

      state.attempt++;
      const started = Date.now();

      try {
        const raw = await withDeadline(this.options.requestTimeoutMs, signal, (attemptSignal) =>
          this.options.generator.generate(request, attemptSignal),
        );
        const text = raw.trim();
        if (!text) {
          throw new GenerationError("ServiceError", "Empty response from text generator");
        }

        digestLog.debug(`chunk ${chunk.index}: summarized`, {
          attempt: state.attempt,
          ms: Date.now() - started,
          respChars: text.length,
        });

        return { chunkIndex: chunk.index, text, failed: false, attempts: state.attempt, fromCache: false };
      } catch (err) {
        if (err instanceof CancelledError) {
          return failedSummary(chunk, `Cancelled: ${err.message} (after ${state.attempt} attempts)`, state.attempt);
        }

        const failure = toGenerationError(err);
        state.lastError = failure.kind;
        lastMessage = failure.message;

        if (!failure.retryable) {
          digestLog.warn(`chunk ${chunk.index}: permanent failure`, { kind: failure.kind, message: failure.message });
          break;
        }

        if (state.attempt < state.maxAttempts) {
          digestLog.warn(
            `chunk ${chunk.index}: transient ${failure.kind}, retrying in ${this.options.retryDelayMs}ms`,
            { attempt: state.attempt, maxAttempts: state.maxAttempts, message: failure.message },
          );
          await this.sleep(this.options.retryDelayMs);
        }
      }
    }

    const detail = `${state.lastError ?? "ServiceError"}: ${lastMessage} (after ${state.attempt} attempts)`;
    digestLog.warn(`chunk ${chunk.index}: giving up`, { detail });
    return failedSummary(chunk, detail, state.attempt);
  }
}
