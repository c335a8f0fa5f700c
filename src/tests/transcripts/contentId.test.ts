import { expect, test } from "vitest";
import { extractContentId } from "../../transcripts/contentId.js";

test("extracts the id from common url shapes", () => {
  const urls = [
    "https://www.youtube.com/watch?v=abcDEF12345",
    "https://www.youtube.com/watch?feature=share&v=abcDEF12345",
    "https://youtu.be/abcDEF12345?t=42",
    "https://www.youtube.com/shorts/abcDEF12345",
    "https://www.youtube.com/embed/abcDEF12345",
    "https://www.youtube.com/v/abcDEF12345",
  ];

  for (const url of urls) {
    expect(extractContentId(url)).toBe("abcDEF12345");
  }
});

test("accepts a bare id with surrounding whitespace", () => {
  expect(extractContentId("  abc_DEF-123 ")).toBe("abc_DEF-123");
});

test("returns null when no id is present", () => {
  expect(extractContentId("")).toBeNull();
  expect(extractContentId("not a video link")).toBeNull();
  expect(extractContentId("https://example.com/watch")).toBeNull();
  expect(extractContentId("abc")).toBeNull();
});
