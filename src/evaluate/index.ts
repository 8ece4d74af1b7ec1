/// # runtimes
///
/// picks the evaluator for a walkthrough. python files get a kernel
/// process; javascript and typescript run in-process.

import { PythonKernel } from "./python.js";
import { ScriptEvaluator } from "./script.js";
import type { Evaluator, RuntimeName } from "./types.js";

export interface RuntimeOptions {
  runtime: RuntimeName;
  filename: string;
  loadPaths: readonly string[];
  /// only used by the python runtime.
  python: string;
}

export async function createEvaluator(options: RuntimeOptions): Promise<Evaluator> {
  const { filename, loadPaths } = options;
  if (options.runtime === "python") {
    return PythonKernel.start({ python: options.python, filename, loadPaths });
  }
  return new ScriptEvaluator({ filename, loadPaths });
}

export { EvaluationContext } from "./context.js";
export { intercept, interceptAll, type Interception } from "./intercept.js";
export { PythonKernel, parseKernelMessage, type KernelMessage, type PythonKernelOptions } from "./python.js";
export { ScriptEvaluator, transpile, type ScriptEvaluatorOptions } from "./script.js";
export type { EvaluateOptions, Evaluator, RuntimeName } from "./types.js";
