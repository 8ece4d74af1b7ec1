/// # the evaluation context
///
/// one per run. it owns the evaluator (and through it the namespace every
/// snippet shares) and makes sure that whatever goes wrong inside a
/// snippet comes out as an `EvaluationError` the driver can report.

import { EvaluationError } from "../errors.js";
import type { Evaluator } from "./types.js";

export class EvaluationContext {
  constructor(private readonly evaluator: Evaluator) {}

  async evaluate(code: string, suppressSideEffects: boolean): Promise<void> {
    try {
      await this.evaluator.evaluate(code, { suppressSideEffects });
    } catch (error) {
      throw EvaluationError.from(error);
    }
  }

  close(): Promise<void> {
    return this.evaluator.close();
  }
}
