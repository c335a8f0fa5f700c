import OpenAI from "openai";
import { expect, test } from "vitest";
import { GenerationError } from "../../digest/errors.js";
import { toGenerationErrorFromOpenAi } from "../../llm/client.js";
import { DebugTextGenerator } from "../../llm/debug.js";

function kindOf(err: unknown): string {
  return toGenerationErrorFromOpenAi(err).kind;
}

test("maps HTTP statuses onto generation error kinds", () => {
  expect(kindOf(new OpenAI.APIError(429, { code: "rate_limit_exceeded" }, "slow down", undefined))).toBe("RateLimited");
  expect(kindOf(new OpenAI.APIError(429, { code: "insufficient_quota" }, "quota", undefined))).toBe("ServiceError");
  expect(kindOf(new OpenAI.APIError(408, undefined, "timeout", undefined))).toBe("Timeout");
  expect(kindOf(new OpenAI.APIError(400, undefined, "bad", undefined))).toBe("InvalidRequest");
  expect(kindOf(new OpenAI.APIError(401, undefined, "auth", undefined))).toBe("InvalidRequest");
  expect(kindOf(new OpenAI.APIError(500, undefined, "boom", undefined))).toBe("ServiceError");
  expect(kindOf(new OpenAI.APIError(503, undefined, "down", undefined))).toBe("ServiceError");
});

test("connection failures are retryable timeouts", () => {
  const timeout = toGenerationErrorFromOpenAi(new OpenAI.APIConnectionTimeoutError());
  expect(timeout.kind).toBe("Timeout");
  expect(timeout.retryable).toBe(true);

  const connection = toGenerationErrorFromOpenAi(new OpenAI.APIConnectionError({ message: "socket hang up" }));
  expect(connection.kind).toBe("Timeout");
  expect(connection.message).toBe("Connection failed: socket hang up");
});

test("passes generation errors through and wraps anything else", () => {
  const original = new GenerationError("RateLimited", "already mapped");
  expect(toGenerationErrorFromOpenAi(original)).toBe(original);

  const wrapped = toGenerationErrorFromOpenAi(new Error("weird"));
  expect(wrapped.kind).toBe("ServiceError");
  expect(wrapped.message).toBe("weird");
  expect(wrapped.retryable).toBe(false);
});

test("debug generator echoes the prompt body deterministically", async () => {
  const generator = new DebugTextGenerator();
  const request = {
    systemPrompt: "system",
    userPrompt: "HEADER\nalpha beta\ngamma",
    model: "debug",
    temperature: 0,
    maxOutputTokens: 10,
  };

  expect(await generator.generate(request)).toBe("(debug summary) alpha beta gamma");

  const parts: string[] = [];
  for await (const part of generator.generateStream(request)) parts.push(part);
  expect(parts).toEqual(["**Debug summary**\n\n", "alpha ", "beta ", "gamma "]);
  expect(generator.callCount).toBe(2);
});
