import type { StreamEvent } from "../core/types";
import type { TextSink } from "./terminal-surface";

export interface ProgressPrinter {
  onEvent(event: StreamEvent): void;
  /** Terminate the live output with a newline if anything was printed. */
  end(): void;
}

/**
 * Live view of a streaming answer. Snapshots within one attempt only ever
 * grow, so only the new suffix is written; a new attempt starts on a fresh
 * line. Error snapshots are left to the display surface.
 */
export function createProgressPrinter(sink: TextSink): ProgressPrinter {
  let shown = "";
  let attempt = 0;

  const breakLine = () => {
    if (shown) sink.write("\n");
    shown = "";
  };

  return {
    onEvent(event) {
      if (event.kind === "status") {
        breakLine();
        return;
      }
      if (event.error) return;
      if (event.attempt !== attempt) {
        breakLine();
        attempt = event.attempt;
      }
      if (event.text.startsWith(shown)) {
        sink.write(event.text.slice(shown.length));
      } else {
        breakLine();
        sink.write(event.text);
      }
      shown = event.text;
    },
    end() {
      breakLine();
    },
  };
}
