/// # fast-forward
///
/// fast-forwarding runs the start of a walkthrough without pausing and
/// with its interactive side effects (plots, `show(…)`) switched off, so
/// you land at a later point with all the state the earlier snippets
/// built. the target is either a snippet number or a phrase to look for
/// in the documentation.

import { ConfigurationError } from "./errors.js";

export type FastForwardTarget =
  | { kind: "ordinal"; ordinal: number }
  | { kind: "substring"; needle: string };

/// integers become snippet numbers; anything else is a phrase, matched
/// case-insensitively.
export function parseFastForward(value: string): FastForwardTarget {
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new ConfigurationError("--fast-forward needs a snippet number or some text to look for");
  }
  if (/^[+-]?\d+$/.test(trimmed)) {
    return { kind: "ordinal", ordinal: Number.parseInt(trimmed, 10) };
  }
  return { kind: "substring", needle: value.toLowerCase() };
}

/// ## the controller
///
/// `position` counts the segments already processed, so the segment being
/// handled right now is number `position + 1`. the driver calls `advance`
/// exactly once per segment, whatever the mode.
///
/// once a phrase target has been seen it stays seen.
export class FastForwardController {
  private position = 0;
  private passed = false;

  constructor(private readonly target?: FastForwardTarget) {}

  get ordinal(): number {
    return this.position + 1;
  }

  get passedTarget(): boolean {
    return this.passed;
  }

  onDocumentationSeen(text: string): void {
    const target = this.target;
    if (target?.kind !== "substring" || this.passed) return;
    if (text.toLowerCase().includes(target.needle)) {
      this.passed = true;
    }
  }

  isFastForwarding(): boolean {
    const target = this.target;
    if (!target) return false;
    if (target.kind === "ordinal") return this.ordinal <= target.ordinal;
    return !this.passed;
  }

  advance(): void {
    this.position++;
  }
}
