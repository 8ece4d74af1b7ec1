/// # errors
///
/// two kinds of failure matter to a run. an `EvaluationError` belongs to a
/// single snippet: it gets reported and the run moves on. a
/// `ConfigurationError` is found before the first segment and ends the
/// process.
///
/// an unterminated documentation block is not an error at all; the
/// segmenter closes it at end of file.

import { types } from "node:util";

export class EvaluationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EvaluationError";
  }

  /// snippets run in another realm (a `vm` context, a python process), so
  /// `instanceof Error` can't be trusted for what they throw. anything
  /// that isn't an error object is reported by its string form.
  static from(error: unknown): EvaluationError {
    if (error instanceof EvaluationError) return error;
    if (types.isNativeError(error)) {
      return new EvaluationError(error.message || error.name, { cause: error });
    }
    return new EvaluationError(String(error), { cause: error });
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
