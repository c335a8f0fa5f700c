import "dotenv/config";
import { charBudgetFor, contextTokensForModel } from "./budgets.js";
import type { CacheBackend, Config, LlmProvider, LogFormat, LogLevel, SummaryStyle } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return Math.floor(n);
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function optList(name: string, def: string[]): string[] {
  const v = opt(name);
  if (!v) return def;
  const items = v.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : def;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((item) => item === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

/**
 * `overrides.model` takes precedence over LLM_MODEL; the derived context window and
 * character budgets follow whichever model wins.
 */
export function loadConfig(overrides: { model?: string } = {}): Config {
  const model = overrides.model ?? opt("LLM_MODEL") ?? "gpt-4o-mini";
  const contextTokens = optInt("LLM_CONTEXT_TOKENS", contextTokensForModel(model));
  const chunkMaxOutputTokens = optInt("DIGEST_CHUNK_MAX_TOKENS", 200);
  const summaryMaxOutputTokens = optInt("DIGEST_SUMMARY_MAX_TOKENS", 1500);

  const cfg: Config = {
    openai: {
      apiKey: opt("OPENAI_API_KEY"),
    },

    llm: {
      provider: enumOf<LlmProvider>("LLM_PROVIDER", ["openai", "debug"] as const, "openai"),
      model,
      contextTokens,
    },

    digest: {
      maxWordsPerChunk: Math.max(1, optInt("DIGEST_MAX_WORDS_PER_CHUNK", 1500)),
      maxRetryAttempts: Math.max(1, optInt("DIGEST_MAX_RETRY_ATTEMPTS", 3)),
      retryDelayMs: Math.max(0, optInt("DIGEST_RETRY_DELAY_MS", 2000)),
      concurrency: Math.max(1, optInt("DIGEST_CONCURRENCY", 5)),
      chunkRequestCharBudget: Math.max(
        1,
        optInt("DIGEST_CHUNK_CHAR_BUDGET", charBudgetFor(contextTokens, chunkMaxOutputTokens)),
      ),
      synthesisCharBudget: Math.max(
        1,
        optInt("DIGEST_SYNTHESIS_CHAR_BUDGET", charBudgetFor(contextTokens, summaryMaxOutputTokens)),
      ),
      chunkMaxOutputTokens,
      summaryMaxOutputTokens,
      chunkTemperature: optFloat("DIGEST_CHUNK_TEMPERATURE", 0.5),
      summaryTemperature: optFloat("DIGEST_SUMMARY_TEMPERATURE", 0.7),
      requestTimeoutMs: Math.max(1, optInt("DIGEST_REQUEST_TIMEOUT_MS", 60000)),
      synthesisTimeoutMs: Math.max(1, optInt("DIGEST_SYNTHESIS_TIMEOUT_MS", 180000)),
      style: enumOf<SummaryStyle>("DIGEST_STYLE", ["detailed", "balanced", "concise"] as const, "balanced"),
    },

    cache: {
      backend: enumOf<CacheBackend>("DIGEST_CACHE", ["memory", "sqlite", "none"] as const, "memory"),
      ttlMs: Math.max(0, optInt("DIGEST_CACHE_TTL_MS", 3600000)),
      sqlitePath: opt("DIGEST_CACHE_PATH") ?? "./data/digest-cache.sqlite",
    },

    transcripts: {
      preferredLanguages: optList("TRANSCRIPT_LANGUAGES", ["es", "en"]),
      captionsDir: opt("TRANSCRIPT_CAPTIONS_DIR") ?? "./data/captions",
    },

    output: {
      dir: opt("DIGEST_OUTPUT_DIR") ?? "./data/digests",
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    OPENAI_API_KEY: cfg.openai.apiKey,
    LLM_PROVIDER: cfg.llm.provider,
    LLM_MODEL: cfg.llm.model,
    LLM_CONTEXT_TOKENS: cfg.llm.contextTokens,
    DIGEST_MAX_WORDS_PER_CHUNK: cfg.digest.maxWordsPerChunk,
    DIGEST_MAX_RETRY_ATTEMPTS: cfg.digest.maxRetryAttempts,
    DIGEST_RETRY_DELAY_MS: cfg.digest.retryDelayMs,
    DIGEST_CONCURRENCY: cfg.digest.concurrency,
    DIGEST_CHUNK_CHAR_BUDGET: cfg.digest.chunkRequestCharBudget,
    DIGEST_SYNTHESIS_CHAR_BUDGET: cfg.digest.synthesisCharBudget,
    DIGEST_CHUNK_MAX_TOKENS: cfg.digest.chunkMaxOutputTokens,
    DIGEST_SUMMARY_MAX_TOKENS: cfg.digest.summaryMaxOutputTokens,
    DIGEST_REQUEST_TIMEOUT_MS: cfg.digest.requestTimeoutMs,
    DIGEST_SYNTHESIS_TIMEOUT_MS: cfg.digest.synthesisTimeoutMs,
    DIGEST_STYLE: cfg.digest.style,
    DIGEST_CACHE: cfg.cache.backend,
    DIGEST_CACHE_TTL_MS: cfg.cache.ttlMs,
    DIGEST_CACHE_PATH: cfg.cache.sqlitePath,
    TRANSCRIPT_LANGUAGES: cfg.transcripts.preferredLanguages.join(","),
    TRANSCRIPT_CAPTIONS_DIR: cfg.transcripts.captionsDir,
    DIGEST_OUTPUT_DIR: cfg.output.dir,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.error("=== DIGEST CONFIG SNAPSHOT ===");
  console.error(JSON.stringify(snap, null, 2));
  console.error("==============================");
}

export const cfg = loadConfig();
