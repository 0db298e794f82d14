import type { DisplaySurface } from "../core/display";

export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Plain-terminal rendering. Text and inline math flow together into
 * paragraphs (inline math keeps its `$…$` markers); display math is printed
 * as an indented block. Status lines go to the separate status sink.
 */
export class TerminalSurface implements DisplaySurface {
  private paragraph: string[] = [];

  constructor(
    private readonly out: TextSink,
    private readonly statusOut: TextSink
  ) {}

  text(content: string): void {
    this.paragraph.push(content);
  }

  inlineMath(content: string): void {
    this.paragraph.push(`$${content}$`);
  }

  displayMath(content: string): void {
    this.flush();
    const lines = content.trim().split("\n").map((line) => `    ${line.trim()}`);
    this.out.write(`${lines.join("\n")}\n\n`);
  }

  status(message: string): void {
    this.statusOut.write(`${message}\n`);
  }

  /** Write out the paragraph in progress. Call once rendering is done. */
  flush(): void {
    if (this.paragraph.length === 0) return;
    this.out.write(`${this.paragraph.join(" ")}\n\n`);
    this.paragraph = [];
  }
}
