import { expect, test } from "vitest";
import { chunkTranscript, countWords } from "../../digest/chunker.js";

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

test("empty and blank input yields no chunks", () => {
  expect([...chunkTranscript("", 10)]).toEqual([]);
  expect([...chunkTranscript("   \n\n \t \n", 10)]).toEqual([]);
});

test("closes a chunk before the paragraph that would overflow it", () => {
  const chunks = [...chunkTranscript("a b c\nd e\nf g h i", 5)];

  expect(chunks).toEqual([
    { index: 0, text: "a b c d e", wordCount: 5 },
    { index: 1, text: "f g h i", wordCount: 4 },
  ]);
});

test("an oversized paragraph becomes its own chunk without truncation", () => {
  const chunks = [...chunkTranscript("one two three four five six\nseven", 3)];

  expect(chunks).toEqual([
    { index: 0, text: "one two three four five six", wordCount: 6 },
    { index: 1, text: "seven", wordCount: 1 },
  ]);
});

test("oversized paragraph after a partial chunk closes the partial chunk first", () => {
  const chunks = [...chunkTranscript("x y\nq r s t u", 3)];

  expect(chunks.map((c) => c.text)).toEqual(["x y", "q r s t u"]);
});

test("blank lines neither add words nor force a boundary", () => {
  const chunks = [...chunkTranscript("a b\n\n\n   \nc d", 4)];

  expect(chunks).toEqual([{ index: 0, text: "a b c d", wordCount: 4 }]);
});

test("chunking is lossless and respects the word bound", () => {
  const paragraphs = Array.from({ length: 40 }, (_, i) =>
    Array.from({ length: (i % 7) + 1 }, (_, j) => `w${i}_${j}`).join("  "),
  );
  const text = paragraphs.join("\n\r\n");
  const chunks = [...chunkTranscript(text, 9)];

  expect(words(chunks.map((c) => c.text).join(" "))).toEqual(words(text));
  expect(chunks.map((c) => c.index)).toEqual(chunks.map((_, i) => i));
  for (const chunk of chunks) {
    expect(chunk.wordCount).toBe(countWords(chunk.text));
    expect(chunk.wordCount).toBeLessThanOrEqual(9);
  }
});

test("sequence is restartable with identical output", () => {
  const iterable = chunkTranscript("alpha beta\ngamma delta\nepsilon", 2);

  const first = [...iterable];
  const second = [...iterable];

  expect(first).toEqual(second);
  expect(first).toHaveLength(3);
});

test("non-positive word limit is clamped to one word per chunk", () => {
  expect([...chunkTranscript("a\nb", 0)].map((c) => c.text)).toEqual(["a", "b"]);
});
