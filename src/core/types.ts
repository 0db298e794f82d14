import type { ProviderError } from "./errors";

/** Instruction template with the user's question interpolated. */
export type Prompt = string;

export interface RetryPolicy {
  maxRetries: number;
  /** Seconds to wait before the first retry. */
  initialDelay: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelay: 1.5,
  backoffMultiplier: 2,
};

export interface GenerationRequest {
  prompt: Prompt;
  stream: boolean;
  retry: RetryPolicy;
}

/** Emitted right before the accumulator sleeps and retries. */
export interface StatusUpdate {
  kind: "status";
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  maxRetries: number;
  /** Seconds until the next attempt. */
  delay: number;
  error: ProviderError;
}

export interface TextSnapshot {
  kind: "text";
  /** Full text accumulated by the current attempt, or the error message when `error` is set. */
  text: string;
  attempt: number;
  final: boolean;
  error?: ProviderError;
}

export type StreamEvent = StatusUpdate | TextSnapshot;

export type SegmentKind = "text" | "inline-math" | "display-math";

export interface DisplaySegment {
  kind: SegmentKind;
  content: string;
}
