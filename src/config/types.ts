export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type LlmProvider = "openai" | "debug";
export type CacheBackend = "memory" | "sqlite" | "none";
export type SummaryStyle = "detailed" | "balanced" | "concise";

export interface Config {
  openai: {
    apiKey?: string;
  };

  llm: {
    provider: LlmProvider;
    model: string;
    contextTokens: number;
  };

  digest: {
    maxWordsPerChunk: number;
    maxRetryAttempts: number;
    retryDelayMs: number;
    concurrency: number;
    chunkRequestCharBudget: number;
    synthesisCharBudget: number;
    chunkMaxOutputTokens: number;
    summaryMaxOutputTokens: number;
    chunkTemperature: number;
    summaryTemperature: number;
    requestTimeoutMs: number;
    synthesisTimeoutMs: number;
    style: SummaryStyle;
  };

  cache: {
    backend: CacheBackend;
    ttlMs: number;
    sqlitePath: string;
  };

  transcripts: {
    preferredLanguages: string[];
    captionsDir: string;
  };

  output: {
    dir: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
