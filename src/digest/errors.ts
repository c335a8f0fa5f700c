import type { GenerationErrorKind } from "./types.js";

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
    this.kind = kind;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export class CancelledError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function isRetryableKind(kind: GenerationErrorKind): boolean {
  return kind === "RateLimited" || kind === "Timeout";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Anything a provider throws that is not already classified is treated as a
 * permanent service failure.
 */
export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  return new GenerationError("ServiceError", errorMessage(err), { cause: err });
}
