import OpenAI from "openai";
import { GenerationError } from "../digest/errors.js";
import type { GenerationErrorKind, GenerationRequest, TextGenerator } from "../digest/types.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(apiKey: string | undefined): OpenAI {
  if (!openaiClient) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY not configured in .env");
    }
    // Retries are owned by the chunk summarizer; the SDK must not add its own.
    openaiClient = new OpenAI({ apiKey, maxRetries: 0 });
  }
  return openaiClient;
}

const INVALID_REQUEST_STATUSES = new Set([400, 401, 403, 404, 422]);

function classifyStatus(status: number | undefined, code: string | null | undefined): GenerationErrorKind {
  if (status === 429) {
    // Exhausted billing quota also arrives as 429 but never clears on retry.
    return code === "insufficient_quota" ? "ServiceError" : "RateLimited";
  }
  if (status === 408) return "Timeout";
  if (status !== undefined && INVALID_REQUEST_STATUSES.has(status)) return "InvalidRequest";
  return "ServiceError";
}

/**
 * Map OpenAI SDK failures onto the pipeline's error kinds. Connection failures
 * never reached the service, so they share the retry-eligible Timeout kind.
 */
export function toGenerationErrorFromOpenAi(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  if (err instanceof OpenAI.APIUserAbortError) {
    return new GenerationError("Timeout", "Request aborted", { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new GenerationError("Timeout", err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new GenerationError("Timeout", `Connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    return new GenerationError(classifyStatus(err.status, err.code), err.message, { cause: err });
  }
  return new GenerationError("ServiceError", err instanceof Error ? err.message : String(err), { cause: err });
}

function toMessages(request: GenerationRequest) {
  return [
    { role: "system" as const, content: request.systemPrompt },
    { role: "user" as const, content: request.userPrompt },
  ];
}

export class OpenAiTextGenerator implements TextGenerator {
  constructor(private readonly client: OpenAI) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
          messages: toMessages(request),
        },
        { signal },
      );

      return response.choices[0]?.message?.content?.trim() ?? "";
    } catch (err) {
      const failure = toGenerationErrorFromOpenAi(err);
      llmLog.debug(`completion failed (${failure.kind})`, { model: request.model, message: failure.message });
      throw failure;
    }
  }

  async *generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
          messages: toMessages(request),
          stream: true,
        },
        { signal },
      );

      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) yield content;
      }
    } catch (err) {
      const failure = toGenerationErrorFromOpenAi(err);
      llmLog.debug(`stream failed (${failure.kind})`, { model: request.model, message: failure.message });
      throw failure;
    }
  }
}
