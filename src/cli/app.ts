import type { DisplaySurface } from "../core/display";
import type { PhaseListener } from "../core/phase";
import type { ModelProvider } from "../core/providers/base";
import { GeminiProvider } from "../core/providers/gemini";
import { OpenAIProvider } from "../core/providers/openai";
import type { Sleep } from "../core/retry";
import { solveQuestion, type SolveOutcome } from "../core/solve";
import type { StreamEvent } from "../core/types";
import { loadSettings, type SolverSettings } from "./settings";

export function createProvider(settings: SolverSettings): ModelProvider {
  return settings.provider === "openai"
    ? new OpenAIProvider(settings.openaiApiKey, settings.openaiModel)
    : new GeminiProvider(settings.geminiApiKey, settings.geminiModel);
}

export interface SolverOptions {
  /** Overrides the SOLVER_STREAM setting when given. */
  stream?: boolean;
  createProvider?: (settings: SolverSettings) => ModelProvider;
  onEvent?: (event: StreamEvent) => void;
  onPhaseChange?: PhaseListener;
  sleep?: Sleep;
}

export interface Solver {
  settings: SolverSettings;
  provider: ModelProvider;
  solve(question: string, surface: DisplaySurface): Promise<SolveOutcome>;
}

/**
 * Validate configuration and build the provider. Runs at startup, before
 * any question is read: a missing key throws ConfigurationError and no
 * provider is ever constructed.
 */
export function createSolver(
  env: Record<string, string | undefined>,
  options: SolverOptions = {}
): Solver {
  const settings = loadSettings(env);
  const provider = (options.createProvider ?? createProvider)(settings);

  return {
    settings,
    provider,
    solve: (question, surface) =>
      solveQuestion(question, provider, surface, {
        stream: options.stream ?? settings.stream,
        retry: { maxRetries: settings.maxRetries, initialDelay: settings.initialDelay },
        onEvent: options.onEvent,
        onPhaseChange: options.onPhaseChange,
        sleep: options.sleep,
      }),
  };
}
