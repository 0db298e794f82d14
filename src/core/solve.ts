/**
 * Orchestrates one question: prompt → model → normalised segments → surface.
 */

import { renderSegments, type DisplaySurface, type RenderReport } from "./display";
import type { PhaseListener, SolvePhase } from "./phase";
import { normalizeAnswer } from "./postprocessing";
import { buildPrompt } from "./prompt";
import type { ModelProvider } from "./providers/base";
import { formatStatus, resolvePolicy, runGeneration, type Sleep } from "./retry";
import type { GenerationRequest, RetryPolicy, StreamEvent } from "./types";

export interface SolveOptions {
  stream?: boolean;
  retry?: Partial<RetryPolicy>;
  /** Every status update and snapshot, as produced. */
  onEvent?: (event: StreamEvent) => void;
  onPhaseChange?: PhaseListener;
  sleep?: Sleep;
}

export interface SolveOutcome {
  phase: Extract<SolvePhase, "completed" | "failed">;
  /** Final answer text, or the error message on failure. */
  text: string;
  /** True when the model finished without producing any text. */
  empty: boolean;
  report?: RenderReport;
}

export const EMPTY_ANSWER_NOTICE = "The model returned an empty answer. Try rephrasing the question.";

export async function solveQuestion(
  question: string,
  provider: ModelProvider,
  surface: DisplaySurface,
  options: SolveOptions = {}
): Promise<SolveOutcome> {
  const request: GenerationRequest = {
    prompt: buildPrompt(question),
    stream: options.stream ?? true,
    retry: resolvePolicy(options.retry),
  };

  let last: StreamEvent | undefined;
  for await (const event of runGeneration(provider, request, {
    sleep: options.sleep,
    onPhaseChange: options.onPhaseChange,
  })) {
    options.onEvent?.(event);
    if (event.kind === "status") surface.status(formatStatus(event));
    last = event;
  }

  if (last?.kind === "text" && last.error) {
    surface.status(last.text);
    return { phase: "failed", text: last.text, empty: false };
  }

  const text = last?.kind === "text" ? last.text : "";
  if (!text) {
    surface.status(EMPTY_ANSWER_NOTICE);
    return { phase: "completed", text: "", empty: true };
  }

  const report = renderSegments(normalizeAnswer(text), surface);
  return { phase: "completed", text, empty: false, report };
}
