/**
 * Tests for segment rendering: per-segment failure isolation and the
 * terminal and HTML surfaces.
 */

import { describe, it, expect } from "vitest";
import { renderSegments } from "../src/core/display";
import type { DisplaySegment } from "../src/core/types";
import { HtmlSurface, escapeHtml } from "../src/cli/html-surface";
import { TerminalSurface } from "../src/cli/terminal-surface";
import { RecordingSurface } from "./helpers";

const SEGMENTS: DisplaySegment[] = [
  { kind: "text", content: "The answer is" },
  { kind: "inline-math", content: "x^2+1" },
  { kind: "text", content: "and also" },
  { kind: "display-math", content: "\\int_0^1 x\\,dx" },
  { kind: "text", content: "done." },
];

function sink() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

// ── renderSegments ────────────────────────────────────────────────────────────

describe("renderSegments", () => {
  it("renders every segment in order", () => {
    const surface = new RecordingSurface();
    const report = renderSegments(SEGMENTS, surface);

    expect(surface.segments).toEqual(SEGMENTS);
    expect(report).toEqual({ rendered: 5, failures: [] });
  });

  it("keeps going after a segment fails", () => {
    const surface = new RecordingSurface((s) => s.kind === "inline-math");
    const report = renderSegments(SEGMENTS, surface);

    expect(surface.segments.map((s) => s.content)).toEqual([
      "The answer is",
      "and also",
      "\\int_0^1 x\\,dx",
      "done.",
    ]);
    expect(report.rendered).toBe(4);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].segment).toEqual({ kind: "inline-math", content: "x^2+1" });
    expect(surface.statuses).toEqual([
      "⚠ Failed to render inline-math segment: cannot render x^2+1",
    ]);
  });
});

// ── TerminalSurface ───────────────────────────────────────────────────────────

describe("TerminalSurface", () => {
  it("flows inline math into paragraphs and indents display math", () => {
    const out = sink();
    const status = sink();
    const surface = new TerminalSurface(out, status);

    renderSegments(SEGMENTS, surface);
    surface.flush();

    expect(out.chunks.join("")).toBe(
      "The answer is $x^2+1$ and also\n\n    \\int_0^1 x\\,dx\n\ndone.\n\n"
    );
    expect(status.chunks).toEqual([]);
  });

  it("writes status lines to the status sink", () => {
    const out = sink();
    const status = sink();
    new TerminalSurface(out, status).status("⏳ retrying");

    expect(status.chunks).toEqual(["⏳ retrying\n"]);
    expect(out.chunks).toEqual([]);
  });
});

// ── HtmlSurface ───────────────────────────────────────────────────────────────

describe("HtmlSurface", () => {
  it("renders math with KaTeX", () => {
    const surface = new HtmlSurface();
    const report = renderSegments(SEGMENTS, surface);
    const body = surface.body();

    expect(report.failures).toEqual([]);
    expect(body.startsWith("<p>The answer is <span class=\"katex\">")).toBe(true);
    expect(body).toContain("<div class=\"math-display\"><span class=\"katex-display\">");
    expect(body.endsWith("<p>done.</p>")).toBe(true);
  });

  it("reports malformed LaTeX and renders the rest", () => {
    const surface = new HtmlSurface();
    const report = renderSegments(
      [
        { kind: "text", content: "Broken:" },
        { kind: "inline-math", content: "\\frac{1}{" },
        { kind: "display-math", content: "x = 2" },
      ],
      surface
    );
    const body = surface.body();

    expect(report.rendered).toBe(2);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].segment.content).toBe("\\frac{1}{");
    expect(body.startsWith("<p>Broken:</p>\n<p class=\"status\">⚠ Failed to render inline-math segment:")).toBe(true);
    expect(body).toContain("<div class=\"math-display\">");
  });

  it("escapes text and the page title", () => {
    const surface = new HtmlSurface();
    surface.text("1 < 2 & 3 > 2");
    const page = surface.toHtml("Is 1 < 2?");

    expect(page).toContain("<title>Is 1 &lt; 2?</title>");
    expect(page).toContain("<p>1 &lt; 2 &amp; 3 &gt; 2</p>");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'b' & c</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;b&#39; &amp; c&lt;/a&gt;"
    );
  });
});
