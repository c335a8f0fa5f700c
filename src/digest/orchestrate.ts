import { log } from "../utils/logger.js";
import { chunkTranscript } from "./chunker.js";
import { runAll, type SummarizeFn } from "./fanOut.js";
import { synthesize } from "./synthesizer.js";
import type {
  Chunk,
  DigestOutcome,
  DigestTiming,
  FailureReason,
  PartialSummary,
  PipelineState,
  ProgressSink,
  ResultSink,
  StreamErrorInfo,
  SummaryStyle,
  TextGenerator,
} from "./types.js";

const digestLog = log.withScope("digest");

export type DigestSettings = {
  model: string;
  style: SummaryStyle;
  maxWordsPerChunk: number;
  concurrency: number;
  synthesisCharBudget: number;
  summaryTemperature: number;
  summaryMaxOutputTokens: number;
  synthesisTimeoutMs: number;
};

export type DigestDeps = {
  summarize: SummarizeFn;
  generator: TextGenerator;
};

export type DigestRunOptions = {
  signal?: AbortSignal;
  onProgress?: ProgressSink;
  onSummary?: ResultSink;
};

function describeAggregateFailure(partials: PartialSummary[]): string {
  const details = partials.map((p) => `chunk ${p.chunkIndex}: ${p.errorDetail ?? "unknown error"}`);
  return `All ${partials.length} chunks failed to summarize (${details.join("; ")})`;
}

/**
 * Runs one transcript through chunking, fan-out summarization and streamed synthesis.
 * Resolves with the outcome in every case; the run's success is decided only here.
 */
export async function orchestrateDigest(
  transcript: string,
  settings: DigestSettings,
  deps: DigestDeps,
  run: DigestRunOptions = {},
): Promise<DigestOutcome> {
  let state: PipelineState = "Idle";
  let chunks: Chunk[] = [];
  let partials: PartialSummary[] = [];
  let streamedEvents = 0;
  const timing: DigestTiming = { chunkingMs: 0, fanOutMs: 0, synthesisMs: 0 };

  const transition = (next: PipelineState): void => {
    digestLog.debug(`state ${state} -> ${next}`);
    state = next;
    run.onProgress?.({ type: "state", state: next });
  };

  const outcome = (failure?: FailureReason): DigestOutcome => ({
    state: failure ? "Failed" : "Completed",
    ...(failure ? { failure } : {}),
    chunks,
    partials,
    failedChunks: partials
      .filter((p) => p.failed)
      .map((p) => ({ chunkIndex: p.chunkIndex, errorDetail: p.errorDetail ?? "unknown error" })),
    streamedEvents,
    timing,
  });

  const fail = (reason: FailureReason): DigestOutcome => {
    transition("Failed");
    digestLog.warn(`run failed: ${reason.kind}`, { message: reason.message });
    run.onProgress?.({ type: "failed", reason });
    return outcome(reason);
  };

  const cancelled = (stage: string): DigestOutcome =>
    fail({ kind: "Cancelled", message: `Run was cancelled during ${stage}` });

  if (!transcript.trim()) {
    return fail({ kind: "InputError", message: "Transcript is empty" });
  }
  if (run.signal?.aborted) return cancelled("startup");

  transition("Chunking");
  let started = Date.now();
  chunks = [...chunkTranscript(transcript, settings.maxWordsPerChunk)];
  timing.chunkingMs = Date.now() - started;

  if (chunks.length === 0) {
    return fail({ kind: "NoChunks", message: "Chunker produced no chunks" });
  }

  digestLog.info(`processing ${chunks.length} chunks`, {
    maxWordsPerChunk: settings.maxWordsPerChunk,
    words: chunks.reduce((sum, chunk) => sum + chunk.wordCount, 0),
  });

  transition("FanningOut");
  started = Date.now();
  partials = await runAll(chunks, deps.summarize, {
    concurrency: settings.concurrency,
    signal: run.signal,
    onChunkDone: (progress) => run.onProgress?.({ type: "chunk", ...progress }),
  });
  timing.fanOutMs = Date.now() - started;

  if (run.signal?.aborted) return cancelled("chunk summarization");

  const succeeded = partials.filter((p) => !p.failed);
  if (succeeded.length === 0) {
    return fail({ kind: "AggregateFailure", message: describeAggregateFailure(partials) });
  }
  if (succeeded.length < partials.length) {
    digestLog.warn(`${partials.length - succeeded.length} of ${partials.length} chunks failed; continuing`);
  }

  transition("Synthesizing");
  started = Date.now();
  let streamError: StreamErrorInfo | undefined;

  for await (const event of synthesize(partials, {
    generator: deps.generator,
    model: settings.model,
    style: settings.style,
    temperature: settings.summaryTemperature,
    maxOutputTokens: settings.summaryMaxOutputTokens,
    synthesisCharBudget: settings.synthesisCharBudget,
    timeoutMs: settings.synthesisTimeoutMs,
    signal: run.signal,
  })) {
    streamedEvents++;
    run.onSummary?.(event);
    if (event.error) streamError = event.error;
  }
  timing.synthesisMs = Date.now() - started;

  if (run.signal?.aborted) return cancelled("synthesis");
  if (streamError) {
    return fail({ kind: "StreamError", message: `${streamError.kind}: ${streamError.message}` });
  }

  transition("Completed");
  run.onProgress?.({ type: "completed" });
  return outcome();
}
