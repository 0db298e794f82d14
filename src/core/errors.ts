/**
 * Error taxonomy.
 *
 * - ConfigurationError: missing or invalid settings. Fatal, raised before
 *   any provider is built.
 * - ProviderError: a failed model call, classified once at the provider
 *   boundary. Only overload and quota failures are retryable.
 * - RenderError: one display segment failed to render. Never stops the
 *   remaining segments.
 */

import type { DisplaySegment } from "./types";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type ProviderErrorCategory =
  | "overload"
  | "quota"
  | "invalid-request"
  | "network"
  | "unknown";

const RETRYABLE_CATEGORIES: ReadonlySet<ProviderErrorCategory> = new Set([
  "overload",
  "quota",
]);

export class ProviderError extends Error {
  readonly category: ProviderErrorCategory;
  readonly retryable: boolean;
  /** HTTP status reported by the provider, when there was a response. */
  readonly status?: number;

  constructor(
    category: ProviderErrorCategory,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.category = category;
    this.retryable = RETRYABLE_CATEGORIES.has(category);
    this.status = options.status;
  }
}

export class RenderError extends Error {
  readonly segment: DisplaySegment;

  constructor(segment: DisplaySegment, cause: unknown) {
    super(`Failed to render ${segment.kind} segment: ${errorMessage(cause)}`, { cause });
    this.name = "RenderError";
    this.segment = segment;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map an HTTP status to a category; undefined when the status says nothing useful. */
export function categoryFromStatus(status: number | undefined): ProviderErrorCategory | undefined {
  if (status === undefined) return undefined;
  if (status === 429) return "quota";
  if ([500, 502, 503, 504, 529].includes(status)) return "overload";
  if ([400, 401, 403, 404, 409, 413, 422].includes(status)) return "invalid-request";
  return undefined;
}

/**
 * Last-resort classification from the error text. Provider SDKs do not
 * always surface a status (streams failing mid-body, wrapped fetch errors).
 */
export function categoryFromMessage(message: string): ProviderErrorCategory {
  const msg = message.toLowerCase();
  if (
    msg.includes("429") ||
    msg.includes("resource exhausted") ||
    msg.includes("resource_exhausted") ||
    msg.includes("quota") ||
    msg.includes("rate limit")
  ) {
    return "quota";
  }
  if (
    msg.includes("503") ||
    msg.includes("overloaded") ||
    msg.includes("unavailable")
  ) {
    return "overload";
  }
  if (
    msg.includes("fetch failed") ||
    msg.includes("econnreset") ||
    msg.includes("econnrefused") ||
    msg.includes("enotfound") ||
    msg.includes("timed out") ||
    msg.includes("timeout") ||
    msg.includes("network")
  ) {
    return "network";
  }
  return "unknown";
}
