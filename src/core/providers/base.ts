import type { ProviderError } from "../errors";
import { fail, ok, type Result } from "../result";
import type { Prompt } from "../types";

/**
 * A hosted text-generation API. Implementations never throw: every SDK
 * failure is classified into a ProviderError and returned as a failed
 * Result, so callers only ever branch on `ok`.
 */
export interface ModelProvider {
  readonly name: string;
  readonly model: string;
  generate(prompt: Prompt): Promise<Result<string, ProviderError>>;
  /** Incremental deltas. The sequence ends after the first failed Result. */
  stream(prompt: Prompt): AsyncIterable<Result<string, ProviderError>>;
}

export type ErrorClassifier = (err: unknown) => ProviderError;

/** Run a one-shot SDK call, converting a thrown error into a failed Result. */
export async function guardCall(
  call: () => Promise<string>,
  classify: ErrorClassifier
): Promise<Result<string, ProviderError>> {
  try {
    return ok(await call());
  } catch (err) {
    return fail(classify(err));
  }
}

/**
 * Wrap an SDK delta stream. Errors raised while opening the stream or while
 * reading it become one trailing failed Result. If the consumer stops early
 * the SDK iterator is closed through `for await`.
 */
export async function* guardStream(
  deltas: () => AsyncIterable<string>,
  classify: ErrorClassifier
): AsyncGenerator<Result<string, ProviderError>, void, undefined> {
  try {
    for await (const delta of deltas()) {
      yield ok(delta);
    }
  } catch (err) {
    yield fail(classify(err));
  }
}
