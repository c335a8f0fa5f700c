import type { Config } from "../config/types.js";
import { log } from "../utils/logger.js";
import { MemorySummaryCache, NoopSummaryCache, type SummaryCache } from "./cache.js";
import { orchestrateDigest, type DigestRunOptions, type DigestSettings } from "./orchestrate.js";
import { ChunkSummarizer } from "./summarizer.js";
import type { DigestOutcome, TextGenerator } from "./types.js";

const cacheLog = log.withScope("cache");

export type DigestPipeline = {
  settings: DigestSettings;
  summarizer: ChunkSummarizer;
  run(transcript: string, options?: DigestRunOptions): Promise<DigestOutcome>;
  close(): void;
};

export async function createSummaryCache(cfg: Config): Promise<{ cache: SummaryCache; close: () => void }> {
  switch (cfg.cache.backend) {
    case "none":
      return { cache: new NoopSummaryCache(), close: () => undefined };

    case "memory":
      return { cache: new MemorySummaryCache(), close: () => undefined };

    case "sqlite": {
      // Lazy-load so the native module is only required when asked for
      const { SqliteSummaryCache } = await import("./sqliteCache.js");
      const cache = new SqliteSummaryCache(cfg.cache.sqlitePath);
      const pruned = cache.prune();
      cacheLog.debug(`sqlite cache ready at ${cfg.cache.sqlitePath}`, { pruned });
      return { cache, close: () => cache.close() };
    }
  }
}

export function settingsFromConfig(cfg: Config): DigestSettings {
  return {
    model: cfg.llm.model,
    style: cfg.digest.style,
    maxWordsPerChunk: cfg.digest.maxWordsPerChunk,
    concurrency: cfg.digest.concurrency,
    synthesisCharBudget: cfg.digest.synthesisCharBudget,
    summaryTemperature: cfg.digest.summaryTemperature,
    summaryMaxOutputTokens: cfg.digest.summaryMaxOutputTokens,
    synthesisTimeoutMs: cfg.digest.synthesisTimeoutMs,
  };
}

export async function createDigestPipeline(
  cfg: Config,
  generator: TextGenerator,
  overrides: Partial<DigestSettings> = {},
): Promise<DigestPipeline> {
  const { cache, close } = await createSummaryCache(cfg);
  const settings: DigestSettings = { ...settingsFromConfig(cfg), ...overrides };

  const summarizer = new ChunkSummarizer({
    generator,
    cache,
    model: settings.model,
    temperature: cfg.digest.chunkTemperature,
    maxOutputTokens: cfg.digest.chunkMaxOutputTokens,
    chunkRequestCharBudget: cfg.digest.chunkRequestCharBudget,
    maxAttempts: cfg.digest.maxRetryAttempts,
    retryDelayMs: cfg.digest.retryDelayMs,
    requestTimeoutMs: cfg.digest.requestTimeoutMs,
    cacheTtlMs: cfg.cache.ttlMs,
  });

  return {
    settings,
    summarizer,
    run: (transcript, options) =>
      orchestrateDigest(
        transcript,
        settings,
        { summarize: (chunk, signal) => summarizer.summarizeChunk(chunk, signal), generator },
        options,
      ),
    close,
  };
}
