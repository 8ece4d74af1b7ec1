/// # evaluator types
///
/// an evaluator is the one thing here that actually runs code. it owns a
/// single namespace for the whole run: every snippet sees what the ones
/// before it defined.

export interface EvaluateOptions {
  /// switch off interactive-only effects (plot windows, `show(…)`) for
  /// this one call.
  suppressSideEffects: boolean;
}

export interface Evaluator {
  /// rejects with an `EvaluationError` when the snippet fails. bindings made
  /// before the failure stay.
  evaluate(code: string, options: EvaluateOptions): Promise<void>;
  close(): Promise<void>;
}

export type RuntimeName = "python" | "script";
