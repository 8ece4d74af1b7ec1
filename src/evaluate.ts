/// # evaluation (re-export)
///
/// the runtimes live in `./evaluate/`; this file is the import path the
/// rest of the project uses.

export {
  createEvaluator,
  EvaluationContext,
  intercept,
  interceptAll,
  parseKernelMessage,
  PythonKernel,
  ScriptEvaluator,
  transpile,
  type EvaluateOptions,
  type Evaluator,
  type Interception,
  type KernelMessage,
  type PythonKernelOptions,
  type RuntimeName,
  type RuntimeOptions,
  type ScriptEvaluatorOptions,
} from "./evaluate/index.js";
