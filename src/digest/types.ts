import type { SummaryStyle } from "../config/types.js";

export type { SummaryStyle };

export type Chunk = {
  index: number;
  text: string;
  wordCount: number;
};

export type PartialSummary = {
  chunkIndex: number;
  text: string;
  failed: boolean;
  errorDetail?: string;
  attempts: number;
  fromCache: boolean;
};

export type GenerationErrorKind = "RateLimited" | "Timeout" | "InvalidRequest" | "ServiceError";

export type StreamErrorInfo = {
  kind: GenerationErrorKind | "Unknown";
  message: string;
};

export type SummaryStreamEvent = {
  sequence: number;
  delta: string;
  /** Set only on the terminal event of a stream that failed. */
  error?: StreamErrorInfo;
};

export type RetryState = {
  attempt: number;
  maxAttempts: number;
  lastError?: GenerationErrorKind;
};

export type CacheEntry = {
  fingerprint: string;
  result: PartialSummary;
  expiresAt: number;
};

export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

export type GenerationRequest = PromptBundle & {
  model: string;
  temperature: number;
  maxOutputTokens: number;
};

/**
 * Text-generation service seen by the pipeline. Implementations reject with
 * GenerationError so the retry policy can tell transient failures apart.
 */
export interface TextGenerator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
  generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<string>;
}

export type ChunkProgress = {
  chunkIndex: number;
  succeeded: boolean;
  completed: number;
  total: number;
  errorDetail?: string;
};

export type PipelineState = "Idle" | "Chunking" | "FanningOut" | "Synthesizing" | "Completed" | "Failed";

export type FailureKind = "InputError" | "NoChunks" | "AggregateFailure" | "StreamError" | "Cancelled";

export type FailureReason = {
  kind: FailureKind;
  message: string;
};

export type ProgressEvent =
  | { type: "state"; state: PipelineState }
  | ({ type: "chunk" } & ChunkProgress)
  | { type: "completed" }
  | { type: "failed"; reason: FailureReason };

export type ProgressSink = (event: ProgressEvent) => void;
export type ResultSink = (event: SummaryStreamEvent) => void;

export type DigestTiming = {
  chunkingMs: number;
  fanOutMs: number;
  synthesisMs: number;
};

export type DigestOutcome = {
  state: "Completed" | "Failed";
  failure?: FailureReason;
  chunks: Chunk[];
  partials: PartialSummary[];
  failedChunks: Array<{ chunkIndex: number; errorDetail: string }>;
  streamedEvents: number;
  timing: DigestTiming;
};
