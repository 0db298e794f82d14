#!/usr/bin/env tsx
/**
 * Command-line math solver: sends a question to Gemini or OpenAI and prints
 * a step-by-step answer. The answer goes to stdout; live progress, retry
 * notices and logs go to stderr.
 *
 * Usage:
 *   GEMINI_API_KEY=... npm run solve -- "What is the derivative of sin(x^2)?"
 *   OPENAI_API_KEY=... npm run solve -- --html answer.html --example 3
 *
 * Environment variables (a .env file in the working directory is loaded too):
 *   SOLVER_PROVIDER       "gemini" or "openai" (default: whichever key is set, gemini first)
 *   GEMINI_API_KEY        required when provider = gemini
 *   GEMINI_MODEL          default: gemini-2.0-flash
 *   OPENAI_API_KEY        required when provider = openai
 *   OPENAI_MODEL          default: gpt-4o
 *   SOLVER_STREAM         default: true
 *   SOLVER_MAX_RETRIES    default: 3
 *   SOLVER_INITIAL_DELAY  seconds, default: 1.5
 *   LOG_LEVEL             DEBUG, INFO, WARN, ERROR or SILENT (default: INFO)
 */

import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import * as dotenv from "dotenv";
import { renderSegments } from "../core/display";
import { ConfigurationError, errorMessage } from "../core/errors";
import { logger, parseLogLevel, setLogLevel } from "../core/logger";
import { normalizeAnswer } from "../core/postprocessing";
import { EMPTY_ANSWER_NOTICE, type SolveOutcome } from "../core/solve";
import { createSolver, type Solver } from "./app";
import { EXAMPLE_QUESTIONS } from "./examples";
import { HtmlSurface } from "./html-surface";
import { createProgressPrinter } from "./progress";
import { TerminalSurface } from "./terminal-surface";

const USAGE = `\
Usage: npm run solve -- [options] <question...>

Options:
  --no-stream       wait for the complete answer instead of streaming it
  --html <file>     also write the answer as a KaTeX-rendered HTML page
  --example <n>     solve built-in example question n
  --examples        list the built-in example questions
  -q, --quiet       no live progress, warnings and errors only
  -h, --help        show this message`;

function exitWith(message: string, code = 1): never {
  console.error(message);
  process.exit(code);
}

function writeHtml(path: string, question: string, outcome: SolveOutcome): void {
  const html = new HtmlSurface();
  if (outcome.phase === "failed") {
    html.status(outcome.text);
  } else if (outcome.empty) {
    html.status(EMPTY_ANSWER_NOTICE);
  } else {
    renderSegments(normalizeAnswer(outcome.text), html);
  }
  writeFileSync(path, html.toHtml(question));
  console.error(`HTML written to ${path}`);
}

// ── Arguments ─────────────────────────────────────────────────────────────────

let parsed: ReturnType<typeof parseCommandLine>;

function parseCommandLine() {
  return parseArgs({
    allowPositionals: true,
    options: {
      "no-stream": { type: "boolean" },
      html: { type: "string" },
      example: { type: "string" },
      examples: { type: "boolean" },
      quiet: { type: "boolean", short: "q" },
      help: { type: "boolean", short: "h" },
    },
  });
}

try {
  parsed = parseCommandLine();
} catch (err) {
  exitWith(`${errorMessage(err)}\n\n${USAGE}`);
}

const { values, positionals } = parsed;

if (values.help) exitWith(USAGE, 0);

if (values.examples) {
  EXAMPLE_QUESTIONS.forEach((q, i) => console.log(`${i + 1}. ${q}`));
  process.exit(0);
}

// ── Configuration ─────────────────────────────────────────────────────────────

dotenv.config();
setLogLevel(values.quiet ? "WARN" : parseLogLevel(process.env.LOG_LEVEL));

const progress = createProgressPrinter(process.stderr);
let solver: Solver;
try {
  solver = createSolver(process.env, {
    stream: values["no-stream"] ? false : undefined,
    onEvent: values.quiet ? undefined : (event) => progress.onEvent(event),
    onPhaseChange: (from, to) => logger.debug(`phase: ${from} → ${to}`),
  });
} catch (err) {
  if (err instanceof ConfigurationError) exitWith(err.message);
  throw err;
}

// ── Question ──────────────────────────────────────────────────────────────────

let question = positionals.join(" ").trim();
if (values.example !== undefined) {
  const index = Number(values.example);
  const example = Number.isInteger(index) ? EXAMPLE_QUESTIONS[index - 1] : undefined;
  if (!example) exitWith(`--example must be between 1 and ${EXAMPLE_QUESTIONS.length}`);
  question = example;
}
if (!question) exitWith(`⚠ Please enter a math question.\n\n${USAGE}`);

// ── Solve ─────────────────────────────────────────────────────────────────────

logger.info(`Provider: ${solver.provider.name} (${solver.provider.model})`);
logger.info(`Question: ${question}`);

const terminal = new TerminalSurface(process.stdout, process.stderr);
const outcome = await solver.solve(question, terminal);
progress.end();
terminal.flush();

if (outcome.report && outcome.report.failures.length > 0) {
  logger.warn(`${outcome.report.failures.length} segment(s) could not be rendered`);
}
if (values.html) writeHtml(values.html, question, outcome);

process.exitCode = outcome.phase === "failed" ? 1 : 0;
