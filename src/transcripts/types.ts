export type TranscriptUnavailableReason = "Unavailable" | "NoMatchingLanguage" | "Unknown";

export interface TranscriptSource {
  /** Full transcript text for a content id; rejects with TranscriptUnavailableError. */
  fetchTranscript(contentId: string): Promise<string>;
}

export class TranscriptUnavailableError extends Error {
  readonly reason: TranscriptUnavailableReason;
  readonly contentId: string;
  /** Only set for NoMatchingLanguage, e.g. ["de (manual)", "fr (auto)"]. */
  readonly availableLanguages?: string[];

  constructor(args: {
    reason: TranscriptUnavailableReason;
    contentId: string;
    message: string;
    availableLanguages?: string[];
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "TranscriptUnavailableError";
    this.reason = args.reason;
    this.contentId = args.contentId;
    this.availableLanguages = args.availableLanguages;
  }
}

export type CaptionSegment = {
  text: string;
  start?: number;
};

export type CaptionTrack = {
  language: string;
  generated: boolean;
  segments: CaptionSegment[];
};
