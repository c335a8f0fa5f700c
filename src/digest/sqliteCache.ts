import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Clock, SummaryCache } from "./cache.js";
import type { CacheEntry, PartialSummary } from "./types.js";

type CacheRow = {
  fingerprint: string;
  chunk_index: number;
  text: string;
  attempts: number;
  expires_at_ms: number;
};

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS summary_cache (
  fingerprint TEXT PRIMARY KEY,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  attempts INTEGER NOT NULL,
  expires_at_ms INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_summary_cache_expires ON summary_cache(expires_at_ms);
`;

function ensureDirFor(dbPath: string): void {
  if (dbPath === ":memory:") return;
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

/**
 * Persistent summary cache so repeated runs over the same transcript skip paid requests.
 */
export class SqliteSummaryCache implements SummaryCache {
  private readonly db: Database.Database;

  constructor(dbPath: string, private readonly now: Clock = Date.now) {
    ensureDirFor(dbPath);
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(SCHEMA_SQL);
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const row = this.db
      .prepare<[string], CacheRow>(
        `SELECT fingerprint, chunk_index, text, attempts, expires_at_ms
         FROM summary_cache
         WHERE fingerprint = ?`,
      )
      .get(fingerprint);

    if (!row) return null;

    if (row.expires_at_ms <= this.now()) {
      this.db.prepare(`DELETE FROM summary_cache WHERE fingerprint = ?`).run(fingerprint);
      return null;
    }

    return {
      fingerprint: row.fingerprint,
      expiresAt: row.expires_at_ms,
      result: {
        chunkIndex: row.chunk_index,
        text: row.text,
        failed: false,
        attempts: row.attempts,
        fromCache: false,
      },
    };
  }

  async set(fingerprint: string, result: PartialSummary, ttlMs: number): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO summary_cache (fingerprint, chunk_index, text, attempts, expires_at_ms)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(fingerprint) DO UPDATE SET
           chunk_index = excluded.chunk_index,
           text = excluded.text,
           attempts = excluded.attempts,
           expires_at_ms = excluded.expires_at_ms`,
      )
      .run(fingerprint, result.chunkIndex, result.text, result.attempts, this.now() + ttlMs);
  }

  /** Drops expired rows; returns how many were removed. */
  prune(): number {
    return this.db.prepare(`DELETE FROM summary_cache WHERE expires_at_ms <= ?`).run(this.now()).changes;
  }

  close(): void {
    this.db.close();
  }
}
