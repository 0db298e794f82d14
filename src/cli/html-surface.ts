import katex from "katex";
import type { DisplaySurface } from "../core/display";

const KATEX_CSS_URL = "https://cdn.jsdelivr.net/npm/katex@0.16.11/dist/katex.min.css";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Builds a standalone HTML page with KaTeX-rendered math. KaTeX runs with
 * `throwOnError`, so malformed LaTeX surfaces as a render failure for that
 * one segment instead of red error markup in the page.
 */
export class HtmlSurface implements DisplaySurface {
  private blocks: string[] = [];
  private paragraph: string[] = [];

  text(content: string): void {
    this.paragraph.push(escapeHtml(content).replace(/\n/g, "<br>\n"));
  }

  inlineMath(content: string): void {
    this.paragraph.push(katex.renderToString(content, { throwOnError: true }));
  }

  displayMath(content: string): void {
    const html = katex.renderToString(content, { displayMode: true, throwOnError: true });
    this.flush();
    this.blocks.push(`<div class="math-display">${html}</div>`);
  }

  status(message: string): void {
    this.flush();
    this.blocks.push(`<p class="status">${escapeHtml(message)}</p>`);
  }

  /** Body markup only. */
  body(): string {
    this.flush();
    return this.blocks.join("\n");
  }

  toHtml(title: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<link rel="stylesheet" href="${KATEX_CSS_URL}">
<style>
  body { font-family: system-ui, sans-serif; font-size: 18px; max-width: 48rem; margin: 2rem auto; line-height: 1.6; }
  .status { color: #a15c00; }
</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
${this.body()}
</body>
</html>
`;
  }

  private flush(): void {
    if (this.paragraph.length === 0) return;
    this.blocks.push(`<p>${this.paragraph.join(" ")}</p>`);
    this.paragraph = [];
  }
}
