import { createHash } from "node:crypto";
import type { CacheEntry, PartialSummary } from "./types.js";

/**
 * Summary cache shared across pipeline runs. Only successful partial summaries
 * are stored; entries past `expiresAt` are treated as absent.
 */
export interface SummaryCache {
  get(fingerprint: string): Promise<CacheEntry | null>;
  set(fingerprint: string, result: PartialSummary, ttlMs: number): Promise<void>;
}

export type Clock = () => number;

export type FingerprintInput = {
  promptVersion: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  charBudget: number;
  text: string;
};

export function fingerprintChunk(input: FingerprintInput): string {
  return createHash("sha256").update(JSON.stringify(input), "utf8").digest("hex");
}

export class MemorySummaryCache implements SummaryCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: Clock = Date.now) {}

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(fingerprint);
      return null;
    }
    return entry;
  }

  async set(fingerprint: string, result: PartialSummary, ttlMs: number): Promise<void> {
    this.entries.set(fingerprint, {
      fingerprint,
      result: { ...result },
      expiresAt: this.now() + ttlMs,
    });
  }

  get size(): number {
    return this.entries.size;
  }
}

export class NoopSummaryCache implements SummaryCache {
  async get(_fingerprint: string): Promise<CacheEntry | null> {
    return null;
  }

  async set(_fingerprint: string, _result: PartialSummary, _ttlMs: number): Promise<void> {}
}
