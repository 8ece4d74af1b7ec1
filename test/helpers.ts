/// test doubles for the driver's collaborators.

import { EvaluationError } from "../src/errors.js";
import type { EvaluateOptions, Evaluator } from "../src/evaluate.js";
import type { Presenter } from "../src/present.js";
import type { Prompt } from "../src/prompt.js";

/// records every call; any snippet containing `boom` fails.
export class RecordingEvaluator implements Evaluator {
  readonly calls: { code: string; suppress: boolean }[] = [];
  closed = false;

  async evaluate(code: string, { suppressSideEffects }: EvaluateOptions): Promise<void> {
    this.calls.push({ code, suppress: suppressSideEffects });
    if (code.includes("boom")) throw new EvaluationError(`${code} failed`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class RecordingPresenter implements Presenter {
  readonly events: string[] = [];

  async documentation(text: string): Promise<void> {
    this.events.push(`doc:${text}`);
  }

  async code(text: string): Promise<void> {
    this.events.push(`code:${text}`);
  }

  notExecuted(): void {
    this.events.push("not-executed");
  }

  evaluationFailed(error: EvaluationError): void {
    this.events.push(`error:${error.message}`);
  }

  separator(): void {
    this.events.push("separator");
  }
}

/// answers from a list, then end of input.
export class ScriptedPrompt implements Prompt {
  reads = 0;
  closed = false;

  constructor(private readonly answers: string[]) {}

  async readLine(): Promise<string | null> {
    this.reads++;
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}
