import type { Prompt } from "./types";

/**
 * Instruction template shared by all providers. `{{question}}` is replaced
 * verbatim; the question is not sanitized.
 */
export const MATH_SOLVER_TEMPLATE = `\
You are a patient mathematics tutor. Solve the problem below step by step.

### Format
- Number each step and explain the reasoning behind it in one or two sentences.
- Write every mathematical expression in LaTeX.
- Use ONLY dollar-sign delimiters. Do NOT use \\( ... \\) or \\[ ... \\].
- Inline math (inside a sentence): single dollar signs, e.g. "so $x = 2$".
- Stand-alone equations: double dollar signs, e.g. $$x^2 + 3x - 5 = 0$$
- Finish with a line starting with "Final answer:".

### Problem
{{question}}
`;

export function buildPrompt(question: string): Prompt {
  return MATH_SOLVER_TEMPLATE.replace("{{question}}", () => question.trim());
}
