import type { DisplaySegment } from "./types";

/**
 * Safety-net delimiter normalisation.
 *
 * The prompt instructs the model to use dollar-sign delimiters exclusively,
 * but models occasionally still emit bracket-style delimiters.
 *
 * - `\( … \)` → `$ … $`   (inline math)
 * - `\[ … \]` → `$$ … $$` (display math)
 */
export function normalizeLatexDelimiters(text: string): string {
  text = text.replace(/\\\(([\s\S]*?)\\\)/g, "$$$1$$");
  text = text.replace(/\\\[([\s\S]*?)\\\]/g, "$$$$$1$$$$");
  return text;
}

export interface NotationRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

/**
 * Informal notation → symbols, applied in order, each rule exactly once.
 * None of the rules fire after a backslash, so LaTeX commands such as
 * `\sqrt{…}`, `\int` and `\sum` pass through.
 *
 * The exponent rule is a heuristic: `x2` becomes `x^2`, but not when the
 * letter follows another letter or digit, and not when the digits run into
 * a further letter, so formulas like `H2O2` and `CO2` are left alone.
 */
export const MATH_NOTATION_RULES: readonly NotationRule[] = [
  { name: "sqrt", pattern: /(?<![\\A-Za-z])sqrt\s*\(([^()]*)\)/g, replacement: "√($1)" },
  { name: "int", pattern: /(?<![\\A-Za-z])int\b/g, replacement: "∫" },
  { name: "sum", pattern: /(?<![\\A-Za-z])sum\b/g, replacement: "∑" },
  {
    name: "exponent",
    pattern: /(?<![A-Za-z0-9\\^_])([A-Za-z])(\d+)(?![A-Za-z0-9])/g,
    replacement: "$1^$2",
  },
];

export function normalizeMathNotation(text: string): string {
  return MATH_NOTATION_RULES.reduce(
    (acc, rule) => acc.replace(rule.pattern, rule.replacement),
    text
  );
}

// Display math is tried first so `$$…$$` is never read as two empty inline spans.
const MATH_SPAN = /\$\$([\s\S]+?)\$\$|\$([^$\n]+?)\$/g;

/**
 * Split text into plain-text and math segments, in source order.
 * Delimiters are dropped; math content is kept byte for byte; plain text is
 * trimmed and dropped when blank.
 */
export function splitMathSegments(text: string): DisplaySegment[] {
  const segments: DisplaySegment[] = [];
  let cursor = 0;

  const pushText = (raw: string) => {
    const content = raw.trim();
    if (content) segments.push({ kind: "text", content });
  };

  for (const match of text.matchAll(MATH_SPAN)) {
    const start = match.index ?? 0;
    pushText(text.slice(cursor, start));
    const [, display, inline] = match;
    if (display !== undefined) {
      if (display.trim()) segments.push({ kind: "display-math", content: display });
    } else if (inline !== undefined && inline.trim()) {
      segments.push({ kind: "inline-math", content: inline });
    }
    cursor = start + match[0].length;
  }
  pushText(text.slice(cursor));

  return segments;
}

/** Raw model output → ordered display segments. */
export function normalizeAnswer(raw: string): DisplaySegment[] {
  return splitMathSegments(normalizeMathNotation(normalizeLatexDelimiters(raw)));
}
