/// # the stepped driver
///
/// the driver walks the segment stream in order, one segment at a time:
/// documentation is shown, code is gated and evaluated, the fast-forward
/// controller advances, and then, if a person is watching, we wait for
/// them to press enter (or `q` to stop).
///
/// evaluation order is file order and nothing runs concurrently; a later
/// snippet is allowed to depend on anything an earlier one defined. the
/// only place a run waits is the prompt between two segments.

import type { Dialect } from "./dialect.js";
import { python } from "./dialect.js";
import { ConfigurationError, EvaluationError } from "./errors.js";
import type { EvaluationContext } from "./evaluate.js";
import { FastForwardController, type FastForwardTarget } from "./fast-forward.js";
import { isExecutable } from "./gate.js";
import type { Presenter } from "./present.js";
import type { Prompt } from "./prompt.js";
import type { Segment } from "./segment.js";

export const QUIT = "q";

export interface RunOptions {
  interactive: boolean;
  fastForward?: FastForwardTarget;
  /// show each code segment before running it.
  echo?: boolean;
  dialect?: Dialect;
}

export interface RunCollaborators {
  context: EvaluationContext;
  presenter: Presenter;
  /// required for interactive runs.
  prompt?: Prompt;
}

export interface RunSummary {
  segments: number;
  /// code segments handed to the evaluator, failed ones included.
  evaluated: number;
  /// code segments the gate kept from running.
  skipped: number;
  failed: number;
  quit: boolean;
}

/// ## running a walkthrough
///
/// the fast-forward question is asked once per segment, before the
/// segment is looked at, and that one answer decides both whether its
/// side effects are suppressed and whether we pause after it. so with a
/// phrase target, the documentation segment that contains the phrase is
/// still part of the fast-forward, and the first pause comes right after
/// it.
///
/// the evaluation context is closed when the run ends, however it ends.

export async function runWalkthrough(
  segments: Iterable<Segment>,
  { context, presenter, prompt }: RunCollaborators,
  options: RunOptions,
): Promise<RunSummary> {
  const { interactive, echo = false, dialect = python } = options;

  const controller = new FastForwardController(options.fastForward);
  const summary: RunSummary = { segments: 0, evaluated: 0, skipped: 0, failed: 0, quit: false };

  try {
    if (options.fastForward && !interactive) {
      throw new ConfigurationError("--fast-forward requires --interactive");
    }
    if (interactive && !prompt) {
      throw new ConfigurationError("an interactive run needs a prompt");
    }

    for (const current of segments) {
      summary.segments++;
      const silent = interactive && controller.isFastForwarding();

      if (current.kind === "documentation") {
        await presenter.documentation(current.text);
        if (interactive) controller.onDocumentationSeen(current.text);
      } else {
        await runCode(current.text, silent || !interactive);
      }

      controller.advance();

      if (!interactive || silent) {
        presenter.separator();
        continue;
      }

      const answer = await prompt?.readLine();
      if (answer === null || answer === QUIT) {
        summary.quit = true;
        break;
      }
    }
  } finally {
    await context.close();
  }

  return summary;

  async function runCode(text: string, suppressSideEffects: boolean): Promise<void> {
    if (echo) await presenter.code(text);

    if (!isExecutable(text, dialect)) {
      summary.skipped++;
      presenter.notExecuted();
      return;
    }

    summary.evaluated++;
    try {
      await context.evaluate(text, suppressSideEffects);
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      summary.failed++;
      presenter.evaluationFailed(error);
    }
  }
}
