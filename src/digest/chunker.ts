import type { Chunk } from "./types.js";

export function countWords(text: string): number {
  return splitWords(text).length;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function* walkChunks(text: string, maxWords: number): Generator<Chunk, void, undefined> {
  let current: string[] = [];
  let index = 0;

  for (const paragraph of text.split("\n")) {
    const words = splitWords(paragraph);
    if (words.length === 0) continue;

    if (current.length > 0 && current.length + words.length > maxWords) {
      yield { index: index++, text: current.join(" "), wordCount: current.length };
      current = [];
    }

    // An oversized paragraph still lands whole in its own chunk.
    current.push(...words);
  }

  if (current.length > 0) {
    yield { index, text: current.join(" "), wordCount: current.length };
  }
}

/**
 * Splits a transcript into word-bounded chunks on paragraph (newline) boundaries.
 * The result is lazy and can be iterated any number of times with identical output.
 */
export function chunkTranscript(text: string, maxWords: number): Iterable<Chunk> {
  const safeMaxWords = Math.max(1, Math.floor(maxWords) || 1);
  return {
    [Symbol.iterator]: () => walkChunks(text, safeMaxWords),
  };
}
