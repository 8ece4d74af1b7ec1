/// # terminal presenter
///
/// documentation is rendered markdown, echoed code is highlighted for the
/// walkthrough's language, and the two status lines read like they always
/// have: a green "Code not executed", and an orange "An error occurred:"
/// with the message in red underneath.

import type { EvaluationError } from "../errors.js";
import { createStyle, type Style } from "./ansi.js";
import { highlight } from "./highlight.js";
import { renderMarkdown } from "./markdown.js";
import type { Presenter, TextSink } from "./types.js";

export interface TerminalPresenterOptions {
  out: TextSink;
  color: boolean;
  /// language used to highlight echoed code, e.g. `"python"`.
  language?: string;
}

export class TerminalPresenter implements Presenter {
  private readonly out: TextSink;
  private readonly style: Style;
  private readonly language: string | undefined;

  constructor(options: TerminalPresenterOptions) {
    this.out = options.out;
    this.style = createStyle(options.color);
    this.language = options.language;
  }

  async documentation(text: string): Promise<void> {
    this.out.write(`${await renderMarkdown(text, this.style)}\n`);
  }

  async code(text: string): Promise<void> {
    const code = await highlight(text.replace(/\s+$/, ""), this.language, this.style);
    const bar = this.style.dim("│ ");
    this.out.write(`${code.split("\n").map((line) => bar + line).join("\n")}\n`);
  }

  notExecuted(): void {
    this.out.write(`${this.style.green("Code not executed")}\n`);
  }

  evaluationFailed(error: EvaluationError): void {
    const { bold, orange, red } = this.style;
    this.out.write(`${bold(orange("An error occurred:"))}\n${bold(red(error.message))}\n`);
  }

  separator(): void {
    this.out.write("\n");
  }
}
