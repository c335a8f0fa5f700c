import { expect, test } from "vitest";
import { GenerationError } from "../../digest/errors.js";
import { orchestrateDigest, type DigestSettings } from "../../digest/orchestrate.js";
import type { ProgressEvent, SummaryStreamEvent } from "../../digest/types.js";
import { fromArray, makeSummarizer, stubGenerator, type StubGenerator } from "./stubs.js";

const SETTINGS: DigestSettings = {
  model: "test-model",
  style: "balanced",
  maxWordsPerChunk: 2,
  concurrency: 3,
  synthesisCharBudget: 12000,
  summaryTemperature: 0.7,
  summaryMaxOutputTokens: 1500,
  synthesisTimeoutMs: 1000,
};

// Five two-word paragraphs -> five chunks at maxWordsPerChunk=2
const TRANSCRIPT = "a b\nc d\ne f\ng h\ni j";

function excerptOf(userPrompt: string): string {
  return userPrompt.split("\n")[1] ?? "";
}

function run(generator: StubGenerator, transcript: string, extra: { signal?: AbortSignal } = {}) {
  const progress: ProgressEvent[] = [];
  const summary: SummaryStreamEvent[] = [];
  const summarizer = makeSummarizer(generator);

  const pending = orchestrateDigest(
    transcript,
    SETTINGS,
    { summarize: (chunk, signal) => summarizer.summarizeChunk(chunk, signal), generator },
    {
      signal: extra.signal,
      onProgress: (event) => progress.push(event),
      onSummary: (event) => summary.push(event),
    },
  );

  return { pending, progress, summary };
}

function states(progress: ProgressEvent[]): string[] {
  return progress.flatMap((event) => (event.type === "state" ? [event.state] : []));
}

test("empty transcript fails fast without any external call", async () => {
  const generator = stubGenerator({ generate: async () => "x", stream: () => fromArray(["x"]) });

  for (const transcript of ["", "  \n\t "]) {
    const { pending, progress } = run(generator, transcript);
    const outcome = await pending;

    expect(outcome.state).toBe("Failed");
    expect(outcome.failure).toEqual({ kind: "InputError", message: "Transcript is empty" });
    expect(states(progress)).toEqual(["Failed"]);
    expect(progress.at(-1)).toEqual({ type: "failed", reason: { kind: "InputError", message: "Transcript is empty" } });
  }

  expect(generator.calls).toHaveLength(0);
  expect(generator.streamCalls).toHaveLength(0);
});

test("partial chunk failure still reaches synthesis with the surviving partials in order", async () => {
  const generator = stubGenerator({
    generate: async (request) => {
      const excerpt = excerptOf(request.userPrompt);
      if (excerpt === "c d" || excerpt === "g h") throw new GenerationError("InvalidRequest", "rejected");
      return `summary of ${excerpt}`;
    },
    stream: () => fromArray(["Final", " summary"]),
  });

  const { pending, progress, summary } = run(generator, TRANSCRIPT);
  const outcome = await pending;

  expect(outcome.state).toBe("Completed");
  expect(outcome.failure).toBeUndefined();
  expect(states(progress)).toEqual(["Chunking", "FanningOut", "Synthesizing", "Completed"]);
  expect(outcome.chunks).toHaveLength(5);
  expect(outcome.partials.filter((p) => !p.failed).map((p) => [p.chunkIndex, p.text])).toEqual([
    [0, "summary of a b"],
    [2, "summary of e f"],
    [4, "summary of i j"],
  ]);
  expect(outcome.failedChunks).toEqual([
    { chunkIndex: 1, errorDetail: "InvalidRequest: rejected (after 1 attempts)" },
    { chunkIndex: 3, errorDetail: "InvalidRequest: rejected (after 1 attempts)" },
  ]);
  expect(generator.streamCalls[0]?.userPrompt).toContain(
    "summary of a b\n\n[Section 2 unavailable]\n\nsummary of e f\n\n[Section 4 unavailable]\n\nsummary of i j",
  );
  expect(summary).toEqual([
    { sequence: 0, delta: "Final" },
    { sequence: 1, delta: " summary" },
  ]);
  expect(outcome.streamedEvents).toBe(2);
  expect(progress.filter((e) => e.type === "chunk")).toHaveLength(5);
  expect(progress.at(-1)).toEqual({ type: "completed" });
});

test("all chunks failing escalates to an aggregate failure before synthesis", async () => {
  const generator = stubGenerator({
    generate: async () => {
      throw new GenerationError("InvalidRequest", "rejected");
    },
    stream: () => fromArray(["never"]),
  });

  const { pending, progress } = run(generator, TRANSCRIPT);
  const outcome = await pending;

  expect(outcome.state).toBe("Failed");
  expect(outcome.failure?.kind).toBe("AggregateFailure");
  expect(outcome.failure?.message).toMatch(/^All 5 chunks failed to summarize \(chunk 0: InvalidRequest: rejected/);
  expect(outcome.partials).toHaveLength(5);
  expect(generator.streamCalls).toHaveLength(0);
  expect(states(progress)).toEqual(["Chunking", "FanningOut", "Failed"]);
});

test("a stream failure ends the run as failed after forwarding the marker", async () => {
  const generator = stubGenerator({
    generate: async () => "partial",
    stream: async function* () {
      yield "Start";
      throw new GenerationError("RateLimited", "too many streams");
    },
  });

  const { pending, summary } = run(generator, TRANSCRIPT);
  const outcome = await pending;

  expect(outcome.state).toBe("Failed");
  expect(outcome.failure).toEqual({ kind: "StreamError", message: "RateLimited: too many streams" });
  expect(summary.map((e) => e.delta)).toEqual(["Start", "\n\n[Summary generation failed: RateLimited: too many streams]"]);
});

test("an already-cancelled run does no work", async () => {
  const generator = stubGenerator({ generate: async () => "x", stream: () => fromArray(["x"]) });
  const controller = new AbortController();
  controller.abort();

  const { pending } = run(generator, TRANSCRIPT, { signal: controller.signal });
  const outcome = await pending;

  expect(outcome.failure).toEqual({ kind: "Cancelled", message: "Run was cancelled during startup" });
  expect(generator.calls).toHaveLength(0);
});

test("cancelling during fan-out stops dispatch and skips synthesis", async () => {
  const controller = new AbortController();
  const generator = stubGenerator({
    generate: async () => {
      controller.abort();
      return "partial";
    },
    stream: () => fromArray(["never"]),
  });

  const { pending, progress } = run(generator, TRANSCRIPT, { signal: controller.signal });
  const outcome = await pending;

  expect(outcome.state).toBe("Failed");
  expect(outcome.failure).toEqual({ kind: "Cancelled", message: "Run was cancelled during chunk summarization" });
  expect(generator.calls.length).toBeLessThan(5);
  expect(generator.streamCalls).toHaveLength(0);
  expect(states(progress)).toEqual(["Chunking", "FanningOut", "Failed"]);
});

test("cancelling while the summary streams ends the run as cancelled without a failure marker", async () => {
  const controller = new AbortController();
  const generator = stubGenerator({
    generate: async () => "partial",
    stream: () => fromArray(["Start", " more", " text"]),
  });
  const summarizer = makeSummarizer(generator);
  const progress: ProgressEvent[] = [];
  const summary: SummaryStreamEvent[] = [];

  const outcome = await orchestrateDigest(
    TRANSCRIPT,
    SETTINGS,
    { summarize: (chunk, signal) => summarizer.summarizeChunk(chunk, signal), generator },
    {
      signal: controller.signal,
      onProgress: (event) => progress.push(event),
      onSummary: (event) => {
        summary.push(event);
        controller.abort();
      },
    },
  );

  expect(outcome.state).toBe("Failed");
  expect(outcome.failure).toEqual({ kind: "Cancelled", message: "Run was cancelled during synthesis" });
  expect(states(progress)).toEqual(["Chunking", "FanningOut", "Synthesizing", "Failed"]);
  expect(summary).toEqual([{ sequence: 0, delta: "Start" }]);
  expect(outcome.streamedEvents).toBe(1);
});
