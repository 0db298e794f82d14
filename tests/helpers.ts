/** Test doubles shared across suites: a scripted provider and a recording surface. */

import type { DisplaySurface } from "../src/core/display";
import type { ProviderError } from "../src/core/errors";
import type { ModelProvider } from "../src/core/providers/base";
import { fail, ok, type Result } from "../src/core/result";
import type { DisplaySegment, Prompt, SegmentKind } from "../src/core/types";

/** What one call to the provider produces: some deltas, then optionally an error. */
export interface ScriptedAttempt {
  deltas?: string[];
  error?: ProviderError;
}

export class ScriptedProvider implements ModelProvider {
  readonly name = "scripted";
  readonly model = "scripted-1";
  readonly prompts: Prompt[] = [];
  /** Number of streams whose iteration was finished or abandoned. */
  closed = 0;

  constructor(private readonly attempts: ScriptedAttempt[]) {}

  async generate(prompt: Prompt): Promise<Result<string, ProviderError>> {
    const attempt = this.next(prompt);
    return attempt.error ? fail(attempt.error) : ok((attempt.deltas ?? []).join(""));
  }

  async *stream(prompt: Prompt): AsyncGenerator<Result<string, ProviderError>> {
    const attempt = this.next(prompt);
    try {
      for (const delta of attempt.deltas ?? []) yield ok(delta);
      if (attempt.error) yield fail(attempt.error);
    } finally {
      this.closed++;
    }
  }

  private next(prompt: Prompt): ScriptedAttempt {
    this.prompts.push(prompt);
    return this.attempts[this.prompts.length - 1] ?? {};
  }
}

export class RecordingSurface implements DisplaySurface {
  readonly segments: DisplaySegment[] = [];
  readonly statuses: string[] = [];

  constructor(private readonly failOn?: (segment: DisplaySegment) => boolean) {}

  text(content: string): void {
    this.record("text", content);
  }

  inlineMath(content: string): void {
    this.record("inline-math", content);
  }

  displayMath(content: string): void {
    this.record("display-math", content);
  }

  status(message: string): void {
    this.statuses.push(message);
  }

  private record(kind: SegmentKind, content: string): void {
    const segment = { kind, content };
    if (this.failOn?.(segment)) throw new Error(`cannot render ${content}`);
    this.segments.push(segment);
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}
