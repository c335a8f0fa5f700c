import fs from "node:fs";
import path from "node:path";
import type { DigestOutcome, FailureReason, PipelineState, SummaryStyle } from "../../digest/types.js";

export type DigestMeta = {
  content_id: string;
  source: string;
  generated_at: string;
  model: string;
  style: SummaryStyle;
  state: Extract<PipelineState, "Completed" | "Failed">;
  failure: FailureReason | null;
  chunk_count: number;
  max_words_per_chunk: number;
  total_words: number;
  failed_chunks: Array<{ chunk_index: number; error: string }>;
  cached_chunks: number;
  summary_chars: number;
  timing: {
    chunking_ms: number;
    fan_out_ms: number;
    synthesis_ms: number;
  };
};

export function buildDigestMeta(args: {
  contentId: string;
  source: string;
  model: string;
  style: SummaryStyle;
  maxWordsPerChunk: number;
  outcome: DigestOutcome;
  summaryChars: number;
  generatedAt?: Date;
}): DigestMeta {
  const { outcome } = args;
  return {
    content_id: args.contentId,
    source: args.source,
    generated_at: (args.generatedAt ?? new Date()).toISOString(),
    model: args.model,
    style: args.style,
    state: outcome.state,
    failure: outcome.failure ?? null,
    chunk_count: outcome.chunks.length,
    max_words_per_chunk: args.maxWordsPerChunk,
    total_words: outcome.chunks.reduce((sum, chunk) => sum + chunk.wordCount, 0),
    failed_chunks: outcome.failedChunks.map((item) => ({ chunk_index: item.chunkIndex, error: item.errorDetail })),
    cached_chunks: outcome.partials.filter((partial) => partial.fromCache).length,
    summary_chars: args.summaryChars,
    timing: {
      chunking_ms: outcome.timing.chunkingMs,
      fan_out_ms: outcome.timing.fanOutMs,
      synthesis_ms: outcome.timing.synthesisMs,
    },
  };
}

export function sanitizeLabel(input: string): string {
  const normalized = input
    .trim()
    .replace(/[^A-Za-z0-9_-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  return normalized || "transcript";
}

export function summaryFilename(label: string): string {
  return `digest_${sanitizeLabel(label)}.md`;
}

export function metaFilename(label: string): string {
  return `digest_${sanitizeLabel(label)}.meta.json`;
}

export function writeDigestOutputs(args: {
  outputDir: string;
  label: string;
  summaryMarkdown: string | null;
  meta: DigestMeta;
}): {
  outputDir: string;
  summaryPath: string | null;
  metaPath: string;
} {
  const outputDir = path.resolve(args.outputDir);
  fs.mkdirSync(outputDir, { recursive: true });

  const summaryPath = args.summaryMarkdown ? path.join(outputDir, summaryFilename(args.label)) : null;
  const metaPath = path.join(outputDir, metaFilename(args.label));

  if (summaryPath && args.summaryMarkdown) {
    fs.writeFileSync(summaryPath, args.summaryMarkdown, "utf-8");
  }
  fs.writeFileSync(metaPath, JSON.stringify(args.meta, null, 2), "utf-8");

  return {
    outputDir,
    summaryPath,
    metaPath,
  };
}

export function readTranscriptInput(inputPath: string): string {
  return fs.readFileSync(path.resolve(inputPath), "utf-8");
}
