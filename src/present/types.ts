/// # the presenter
///
/// everything a run shows a person goes through this interface, so the
/// driver never writes to a stream itself.

import type { EvaluationError } from "../errors.js";

export interface Presenter {
  documentation(text: string): Promise<void>;
  /// only called when code echo is on.
  code(text: string): Promise<void>;
  notExecuted(): void;
  evaluationFailed(error: EvaluationError): void;
  /// the gap between segments when nobody is asked to press enter.
  separator(): void;
}

/// anything with a `write`, e.g. `process.stdout`.
export interface TextSink {
  write(text: string): unknown;
}
