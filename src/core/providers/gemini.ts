import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
  type GenerativeModel,
} from "@google/generative-ai";
import type { ModelProvider } from "./base";
import { guardCall, guardStream } from "./base";
import {
  ProviderError,
  categoryFromMessage,
  categoryFromStatus,
  errorMessage,
} from "../errors";
import { logger } from "../logger";
import type { Prompt } from "../types";

export function classifyGeminiError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof GoogleGenerativeAIFetchError) {
    const category = categoryFromStatus(err.status) ?? categoryFromMessage(err.message);
    return new ProviderError(category, err.message, { status: err.status, cause: err });
  }
  // Blocked prompts / responses and malformed input will fail the same way on retry.
  if (
    err instanceof GoogleGenerativeAIResponseError ||
    err instanceof GoogleGenerativeAIRequestInputError
  ) {
    return new ProviderError("invalid-request", err.message, { cause: err });
  }
  const message = errorMessage(err);
  return new ProviderError(categoryFromMessage(message), message, { cause: err });
}

export class GeminiProvider implements ModelProvider {
  readonly name = "gemini";
  readonly model: string;
  private client: GenerativeModel;

  constructor(apiKey: string, model: string) {
    this.client = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
    this.model = model;
  }

  generate(prompt: Prompt) {
    return guardCall(async () => {
      logger.debug(`gemini: generate (${this.model})`);
      const result = await this.client.generateContent(prompt);
      return result.response.text();
    }, classifyGeminiError);
  }

  stream(prompt: Prompt) {
    const client = this.client;
    const model = this.model;
    return guardStream(async function* () {
      logger.debug(`gemini: stream (${model})`);
      // The SDK tees the response body into `stream` and `response`; only
      // aborting the request stops the second branch once the consumer leaves.
      const controller = new AbortController();
      try {
        const result = await client.generateContentStream(prompt, { signal: controller.signal });
        // The aggregated response rejects alongside the stream (and on abort);
        // the stream iteration below is where a failure is reported.
        void result.response.catch((err: unknown) => {
          logger.debug("gemini: aggregated response rejected:", errorMessage(err));
        });
        for await (const chunk of result.stream) {
          const delta = chunk.text();
          if (delta) yield delta;
        }
      } finally {
        controller.abort();
      }
    }, classifyGeminiError);
  }
}
