import { ConfigurationError } from "../core/errors";
import { DEFAULT_RETRY_POLICY } from "../core/types";

export type ProviderName = "gemini" | "openai";

export interface SolverSettings {
  provider: ProviderName;
  geminiApiKey: string;
  openaiApiKey: string;
  geminiModel: string;
  openaiModel: string;
  /** Stream the answer as it is generated instead of waiting for the whole reply. */
  stream: boolean;
  /** Retries after an overload / rate-limit error before giving up. */
  maxRetries: number;
  /** Seconds before the first retry; doubles on each subsequent one. */
  initialDelay: number;
}

export const DEFAULT_SETTINGS: Omit<SolverSettings, "provider"> = {
  geminiApiKey: "",
  openaiApiKey: "",
  geminiModel: "gemini-2.0-flash",
  openaiModel: "gpt-4o",
  stream: true,
  maxRetries: DEFAULT_RETRY_POLICY.maxRetries,
  initialDelay: DEFAULT_RETRY_POLICY.initialDelay,
};

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string {
  return (env[name] ?? "").trim();
}

function pickProvider(env: Env, geminiApiKey: string, openaiApiKey: string): ProviderName {
  const requested = read(env, "SOLVER_PROVIDER").toLowerCase();
  if (requested === "gemini" || requested === "openai") {
    const key = requested === "gemini" ? geminiApiKey : openaiApiKey;
    if (!key) {
      const variable = requested === "gemini" ? "GEMINI_API_KEY" : "OPENAI_API_KEY";
      throw new ConfigurationError(
        `🔐 ${variable} is not set. Export it (or add it to .env) to use the ${requested} provider.`
      );
    }
    return requested;
  }
  if (requested) {
    throw new ConfigurationError(`Unknown SOLVER_PROVIDER "${requested}" (use gemini or openai).`);
  }
  if (geminiApiKey) return "gemini";
  if (openaiApiKey) return "openai";
  throw new ConfigurationError(
    "🔐 No API key found. Set GEMINI_API_KEY or OPENAI_API_KEY in the environment or in .env."
  );
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = read(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return value;
}

function readSeconds(env: Env, name: string, fallback: number): number {
  const raw = read(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of seconds, got "${raw}".`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = read(env, name).toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigurationError(`${name} must be true or false, got "${raw}".`);
}

/** Build settings from environment variables. Throws ConfigurationError. */
export function loadSettings(env: Env): SolverSettings {
  const geminiApiKey = read(env, "GEMINI_API_KEY");
  const openaiApiKey = read(env, "OPENAI_API_KEY");
  const provider = pickProvider(env, geminiApiKey, openaiApiKey);

  return {
    ...DEFAULT_SETTINGS,
    provider,
    geminiApiKey,
    openaiApiKey,
    geminiModel: read(env, "GEMINI_MODEL") || DEFAULT_SETTINGS.geminiModel,
    openaiModel: read(env, "OPENAI_MODEL") || DEFAULT_SETTINGS.openaiModel,
    stream: readBoolean(env, "SOLVER_STREAM", DEFAULT_SETTINGS.stream),
    maxRetries: readInteger(env, "SOLVER_MAX_RETRIES", DEFAULT_SETTINGS.maxRetries),
    initialDelay: readSeconds(env, "SOLVER_INITIAL_DELAY", DEFAULT_SETTINGS.initialDelay),
  };
}
