/**
 * Integration check: asks the configured provider a fixed question through
 * the CLI and asserts the answer is non-empty and contains the expected
 * root. Does NOT validate the explanation — just that the pipeline works
 * end-to-end against the real API.
 *
 * Uses the same environment variables as src/cli/main.ts:
 *   SOLVER_PROVIDER   gemini or openai (default: whichever key is set)
 *   GEMINI_API_KEY    required when provider = gemini
 *   OPENAI_API_KEY    required when provider = openai
 *
 * Usage:
 *   GEMINI_API_KEY=... npm run check-solve
 *   SOLVER_PROVIDER=openai OPENAI_API_KEY=... npm run check-solve
 */

import { spawnSync } from "node:child_process";

const QUESTION = "Solve the equation 2x + 6 = 10 for x.";

function fail(msg: string): never {
  console.error(`FAIL: ${msg}`);
  process.exit(1);
}

console.error(`Asking: ${QUESTION}`);
const result = spawnSync(
  "node_modules/.bin/tsx",
  ["src/cli/main.ts", "--quiet", QUESTION],
  { encoding: "utf8", env: process.env, stdio: ["ignore", "pipe", "pipe"] },
);

if (result.stderr) process.stderr.write(result.stderr);
if (result.error) fail(`Failed to spawn the CLI: ${result.error.message}`);
if (result.status !== 0) fail(`CLI exited with status ${result.status}`);

const output = result.stdout;
if (output.trim().length === 0) fail("Answer is empty");
if (!/\b2\b/.test(output)) fail("Answer does not mention the root x = 2");

console.error(`  ${output.length} characters returned`);
console.error("PASS");
