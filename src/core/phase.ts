/**
 * Lifecycle of one submitted question:
 *
 *   idle → requesting → streaming → (retrying → requesting → streaming)* → completed | failed
 *
 * `requesting → completed` is the empty-result case (the provider finished
 * without producing any text).
 */

export type SolvePhase =
  | "idle"
  | "requesting"
  | "streaming"
  | "retrying"
  | "completed"
  | "failed";

export type PhaseListener = (from: SolvePhase, to: SolvePhase) => void;

const TRANSITIONS: Record<SolvePhase, readonly SolvePhase[]> = {
  idle: ["requesting"],
  requesting: ["streaming", "retrying", "completed", "failed"],
  streaming: ["retrying", "completed", "failed"],
  retrying: ["requesting"],
  completed: [],
  failed: [],
};

export class PhaseTracker {
  private phase: SolvePhase = "idle";

  constructor(private readonly onChange?: PhaseListener) {}

  get current(): SolvePhase {
    return this.phase;
  }

  get done(): boolean {
    return this.phase === "completed" || this.phase === "failed";
  }

  moveTo(next: SolvePhase): void {
    if (next === this.phase) return;
    if (!TRANSITIONS[this.phase].includes(next)) {
      throw new Error(`Illegal phase transition: ${this.phase} → ${next}`);
    }
    const from = this.phase;
    this.phase = next;
    this.onChange?.(from, next);
  }
}
