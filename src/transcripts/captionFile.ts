import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import { log } from "../utils/logger.js";
import { TranscriptUnavailableError, type CaptionSegment, type CaptionTrack, type TranscriptSource } from "./types.js";

const transcriptLog = log.withScope("transcripts");

const CAPTION_EXTENSIONS = [".yaml", ".yml", ".json", ".txt"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseSegment(raw: unknown): CaptionSegment | null {
  if (!isRecord(raw) || typeof raw.text !== "string") return null;
  return typeof raw.start === "number" ? { text: raw.text, start: raw.start } : { text: raw.text };
}

function parseTrack(raw: unknown): CaptionTrack | null {
  if (!isRecord(raw) || typeof raw.language !== "string" || !Array.isArray(raw.segments)) return null;
  const segments: CaptionSegment[] = [];
  for (const item of raw.segments) {
    const segment = parseSegment(item);
    if (!segment) return null;
    segments.push(segment);
  }
  return {
    language: raw.language,
    generated: raw.generated === true,
    segments,
  };
}

/**
 * Parse a caption document:
 *   tracks:
 *     - language: en
 *       generated: false
 *       segments:
 *         - { text: "...", start: 0.0 }
 * JSON documents use the same shape.
 */
export function parseCaptionDocument(content: string): CaptionTrack[] {
  const doc: unknown = yaml.parse(content);
  if (!isRecord(doc) || !Array.isArray(doc.tracks)) {
    throw new Error("Caption document must contain a 'tracks' list");
  }

  return doc.tracks.map((raw, i) => {
    const track = parseTrack(raw);
    if (!track) throw new Error(`Invalid caption track at index ${i}`);
    return track;
  });
}

function matchesLanguage(track: CaptionTrack, language: string): boolean {
  const trackLang = track.language.toLowerCase();
  const wanted = language.toLowerCase();
  return trackLang === wanted || trackLang.startsWith(`${wanted}-`);
}

/**
 * Manually created tracks win over generated ones; within each kind the preferred
 * languages are tried in order.
 */
export function selectTrack(tracks: CaptionTrack[], preferredLanguages: string[]): CaptionTrack | null {
  for (const generated of [false, true]) {
    for (const language of preferredLanguages) {
      const match = tracks.find((track) => track.generated === generated && matchesLanguage(track, language));
      if (match) return match;
    }
  }
  return null;
}

export function describeTrack(track: CaptionTrack): string {
  return `${track.language} (${track.generated ? "auto" : "manual"})`;
}

export function trackToText(track: CaptionTrack): string {
  // One caption line per paragraph keeps chunk boundaries on caption boundaries.
  return track.segments
    .map((segment) => segment.text.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

/**
 * Transcript source backed by caption files on disk: `<dir>/<contentId>.{yaml,yml,json,txt}`.
 */
export class CaptionFileSource implements TranscriptSource {
  constructor(
    private readonly captionsDir: string,
    private readonly preferredLanguages: string[],
  ) {}

  async fetchTranscript(contentId: string): Promise<string> {
    const filePath = this.resolveFile(contentId);
    if (!filePath) {
      throw new TranscriptUnavailableError({
        reason: "Unavailable",
        contentId,
        message: `No captions found for ${contentId} in ${path.resolve(this.captionsDir)}`,
      });
    }

    let content: string;
    try {
      content = await fs.promises.readFile(filePath, "utf-8");
    } catch (err) {
      throw new TranscriptUnavailableError({
        reason: "Unknown",
        contentId,
        message: `Could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }

    if (filePath.endsWith(".txt")) {
      return this.requireText(contentId, content);
    }

    let tracks: CaptionTrack[];
    try {
      tracks = parseCaptionDocument(content);
    } catch (err) {
      throw new TranscriptUnavailableError({
        reason: "Unknown",
        contentId,
        message: `Invalid caption file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }

    if (tracks.length === 0) {
      throw new TranscriptUnavailableError({
        reason: "Unavailable",
        contentId,
        message: `Captions are disabled for ${contentId}`,
      });
    }

    const track = selectTrack(tracks, this.preferredLanguages);
    if (!track) {
      throw new TranscriptUnavailableError({
        reason: "NoMatchingLanguage",
        contentId,
        message: `Captions for ${contentId} are only available in other languages`,
        availableLanguages: tracks.map(describeTrack),
      });
    }

    transcriptLog.info(`using caption track ${describeTrack(track)}`, { contentId, segments: track.segments.length });
    return this.requireText(contentId, trackToText(track));
  }

  private resolveFile(contentId: string): string | null {
    // Content ids are used as file names; refuse anything that could leave the directory.
    if (!/^[0-9A-Za-z_-]+$/.test(contentId)) return null;

    for (const ext of CAPTION_EXTENSIONS) {
      const candidate = path.join(this.captionsDir, `${contentId}${ext}`);
      if (fs.existsSync(candidate)) return candidate;
    }
    return null;
  }

  private requireText(contentId: string, text: string): string {
    if (!text.trim()) {
      throw new TranscriptUnavailableError({
        reason: "Unavailable",
        contentId,
        message: `Caption track for ${contentId} has no text`,
      });
    }
    return text;
  }
}
