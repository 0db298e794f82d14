/**
 * Turns a provider call into a sequence of progress events.
 *
 * Streaming: every delta extends an attempt-local buffer and the whole
 * buffer is emitted as a TextSnapshot. Retryable failures back off
 * exponentially and restart with an empty buffer; partial output from a
 * failed attempt is never merged into the next one.
 *
 * Non-streaming: p-retry drives the same policy around `generate`, and
 * `runGeneration` relays its retry notices as the same StatusUpdate events.
 */

import { setTimeout as delay } from "node:timers/promises";
import pRetry, { AbortError } from "p-retry";
import type { ModelProvider } from "./providers/base";
import { ProviderError, errorMessage } from "./errors";
import { logger } from "./logger";
import { PhaseTracker, type PhaseListener } from "./phase";
import {
  DEFAULT_RETRY_POLICY,
  type GenerationRequest,
  type Prompt,
  type RetryPolicy,
  type StatusUpdate,
  type StreamEvent,
  type TextSnapshot,
} from "./types";

export type Sleep = (seconds: number) => Promise<void>;

export interface RunOptions {
  retry?: Partial<RetryPolicy>;
  onPhaseChange?: PhaseListener;
}

export interface StreamOptions extends RunOptions {
  /** Backoff sleep; replaced in tests to observe delays without waiting. */
  sleep?: Sleep;
}

export interface GenerateOptions extends RunOptions {
  /** Called before each backoff wait, with the same update the streaming path yields. */
  onStatus?: (update: StatusUpdate) => void;
  /** Stops the retry loop; the pending call rejects with the abort reason. */
  signal?: AbortSignal;
}

const defaultSleep: Sleep = (seconds) => delay(seconds * 1000);

export function resolvePolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

// ── Formatting ───────────────────────────────────────────────────────────────

/** `retries` is set when the error ended a run of backoff retries. */
export function formatProviderError(error: ProviderError, retries?: number): string {
  return retries === undefined
    ? `❌ Error (${error.category}): ${error.message}`
    : `❌ Error: the model is still unavailable after ${retries} retries (${error.category}): ${error.message}`;
}

export function formatStatus(update: StatusUpdate): string {
  const reason = update.error.category === "quota" ? "Rate limited" : "Model overloaded";
  return `⏳ ${reason} (attempt ${update.attempt}/${update.maxRetries + 1}). Retrying in ${formatSeconds(update.delay)}…`;
}

function formatSeconds(seconds: number): string {
  return `${Number(seconds.toFixed(3))}s`;
}

function errorSnapshot(error: ProviderError, attempt: number, retries?: number): TextSnapshot {
  return {
    kind: "text",
    text: formatProviderError(error, retries),
    attempt,
    final: true,
    error,
  };
}

// ── Streaming ────────────────────────────────────────────────────────────────

export async function* streamWithRetry(
  provider: ModelProvider,
  prompt: Prompt,
  options: StreamOptions = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  const policy = resolvePolicy(options.retry);
  const sleep = options.sleep ?? defaultSleep;
  const phase = new PhaseTracker(options.onPhaseChange);

  let attempt = 1;
  let wait = policy.initialDelay;

  for (;;) {
    phase.moveTo("requesting");
    logger.debug(`${provider.name}: attempt ${attempt} (${provider.model})`);

    let buffer = "";
    let failure: ProviderError | undefined;

    for await (const result of provider.stream(prompt)) {
      if (!result.ok) {
        failure = result.error;
        break;
      }
      if (!result.value) continue;
      phase.moveTo("streaming");
      buffer += result.value;
      yield { kind: "text", text: buffer, attempt, final: false };
    }

    if (!failure) {
      phase.moveTo("completed");
      return;
    }

    if (!failure.retryable) {
      logger.error(`${provider.name}: ${failure.category} error, not retrying: ${failure.message}`);
      phase.moveTo("failed");
      yield errorSnapshot(failure, attempt);
      return;
    }

    if (attempt > policy.maxRetries) {
      logger.error(`${provider.name}: giving up after ${policy.maxRetries} retries: ${failure.message}`);
      phase.moveTo("failed");
      yield errorSnapshot(failure, attempt, policy.maxRetries);
      return;
    }

    logger.warn(`${provider.name}: ${failure.category} on attempt ${attempt}, retrying in ${wait}s`);
    phase.moveTo("retrying");
    yield { kind: "status", attempt, maxRetries: policy.maxRetries, delay: wait, error: failure };
    await sleep(wait);
    wait *= policy.backoffMultiplier;
    attempt++;
  }
}

// ── Non-streaming ────────────────────────────────────────────────────────────

export async function generateWithRetry(
  provider: ModelProvider,
  prompt: Prompt,
  options: GenerateOptions = {}
): Promise<TextSnapshot> {
  const policy = resolvePolicy(options.retry);
  const phase = new PhaseTracker(options.onPhaseChange);
  let attempt = 0;

  try {
    const text = await pRetry(
      async () => {
        attempt++;
        phase.moveTo("requesting");
        const result = await provider.generate(prompt);
        if (result.ok) return result.value;
        if (!result.error.retryable) throw new AbortError(result.error);
        throw result.error;
      },
      {
        retries: policy.maxRetries,
        factor: policy.backoffMultiplier,
        minTimeout: policy.initialDelay * 1000,
        randomize: false,
        signal: options.signal,
        onFailedAttempt: (error) => {
          if (error.retriesLeft === 0 || !(error instanceof ProviderError)) return;
          const wait = policy.initialDelay * policy.backoffMultiplier ** (error.attemptNumber - 1);
          logger.warn(`${provider.name}: ${error.category} on attempt ${error.attemptNumber}, retrying in ${wait}s`);
          phase.moveTo("retrying");
          options.onStatus?.({
            kind: "status",
            attempt: error.attemptNumber,
            maxRetries: policy.maxRetries,
            delay: wait,
            error,
          });
        },
      }
    );
    phase.moveTo("completed");
    return { kind: "text", text, attempt, final: true };
  } catch (err) {
    if (!(err instanceof ProviderError)) throw err;
    logger.error(`${provider.name}: ${err.message}`);
    phase.moveTo("failed");
    return errorSnapshot(err, attempt, err.retryable ? policy.maxRetries : undefined);
  }
}

// ── Dispatch ─────────────────────────────────────────────────────────────────

/** Run one GenerationRequest on whichever path it asks for. */
export async function* runGeneration(
  provider: ModelProvider,
  request: GenerationRequest,
  options: Omit<StreamOptions, "retry"> = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  if (request.stream) {
    yield* streamWithRetry(provider, request.prompt, { ...options, retry: request.retry });
    return;
  }
  yield* generateWithStatus(provider, request.prompt, {
    retry: request.retry,
    onPhaseChange: options.onPhaseChange,
  });
}

/**
 * generateWithRetry as an event sequence: status updates as p-retry reports
 * them, then the final snapshot. Stopping iteration aborts the retry loop.
 */
async function* generateWithStatus(
  provider: ModelProvider,
  prompt: Prompt,
  options: RunOptions
): AsyncGenerator<StreamEvent, void, undefined> {
  const controller = new AbortController();
  const pending: StatusUpdate[] = [];
  const state: { snapshot?: TextSnapshot } = {};
  let wake = () => {};

  const finished = generateWithRetry(provider, prompt, {
    ...options,
    signal: controller.signal,
    onStatus: (update) => {
      pending.push(update);
      wake();
    },
  }).then((snapshot) => {
    state.snapshot = snapshot;
  });

  try {
    while (!state.snapshot) {
      if (pending.length === 0) {
        await Promise.race([finished, new Promise<void>((resolve) => (wake = resolve))]);
      }
      for (let update = pending.shift(); update; update = pending.shift()) yield update;
    }
  } finally {
    if (!state.snapshot) {
      controller.abort();
      await finished.catch((err: unknown) => {
        logger.debug(`${provider.name}: retry loop stopped: ${errorMessage(err)}`);
      });
    }
  }

  // An empty completion is the empty-result condition, not a snapshot.
  const { snapshot } = state;
  if (snapshot && (snapshot.error || snapshot.text)) yield snapshot;
}
