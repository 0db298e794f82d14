import { RenderError } from "./errors";
import { logger } from "./logger";
import type { DisplaySegment } from "./types";

/** Where an answer ends up. Any render method may throw for a bad segment. */
export interface DisplaySurface {
  text(content: string): void;
  inlineMath(content: string): void;
  displayMath(content: string): void;
  /** Retry notices, error messages and per-segment render failures. */
  status(message: string): void;
}

export interface RenderReport {
  rendered: number;
  failures: RenderError[];
}

function renderOne(segment: DisplaySegment, surface: DisplaySurface): void {
  switch (segment.kind) {
    case "text":
      surface.text(segment.content);
      break;
    case "inline-math":
      surface.inlineMath(segment.content);
      break;
    case "display-math":
      surface.displayMath(segment.content);
      break;
  }
}

/** Render every segment; a failing segment is reported and skipped. */
export function renderSegments(
  segments: readonly DisplaySegment[],
  surface: DisplaySurface
): RenderReport {
  const report: RenderReport = { rendered: 0, failures: [] };
  for (const segment of segments) {
    try {
      renderOne(segment, surface);
      report.rendered++;
    } catch (err) {
      const failure = new RenderError(segment, err);
      logger.warn(failure.message);
      report.failures.push(failure);
      surface.status(`⚠ ${failure.message}`);
    }
  }
  return report;
}
