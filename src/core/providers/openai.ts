import OpenAI, { APIConnectionError, APIError } from "openai";
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

export function classifyOpenAIError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof APIConnectionError) {
    return new ProviderError("network", err.message, { cause: err });
  }
  if (err instanceof APIError) {
    const category = categoryFromStatus(err.status) ?? categoryFromMessage(err.message);
    return new ProviderError(category, err.message, { status: err.status, cause: err });
  }
  const message = errorMessage(err);
  return new ProviderError(categoryFromMessage(message), message, { cause: err });
}

export class OpenAIProvider implements ModelProvider {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model: string) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
  }

  generate(prompt: Prompt) {
    return guardCall(async () => {
      logger.debug(`openai: generate (${this.model})`);
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: 4096,
        messages: [{ role: "user", content: prompt }],
      });
      return response.choices[0]?.message?.content ?? "";
    }, classifyOpenAIError);
  }

  stream(prompt: Prompt) {
    const client = this.client;
    const model = this.model;
    return guardStream(async function* () {
      logger.debug(`openai: stream (${model})`);
      const stream = await client.chat.completions.create({
        model,
        max_tokens: 4096,
        messages: [{ role: "user", content: prompt }],
        stream: true,
      });
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    }, classifyOpenAIError);
  }
}
