/// # litstep
///
/// stepped literate walkthroughs. a source file interleaves `"""`
/// documentation blocks with code; litstep shows the documentation, runs
/// the code against one namespace that lasts the whole file, and, in
/// interactive mode, waits for you between segments.
///
/// the pieces, leaf first:
///
/// 1. **segmentation**: `segment` cuts a file into documentation and code,
///    telling section markers apart from docstrings.
/// 2. **the gate**: `isExecutable` honours `# pwmc:no_exec`.
/// 3. **evaluation**: an `EvaluationContext` around a python kernel or an
///    in-process script runtime.
/// 4. **fast-forward**: `FastForwardController` decides which segments run
///    silently.
/// 5. **the driver**: `runWalkthrough` ties it all together.

export { dialects, python, script, type Dialect, type DialectName } from "./dialect.js";
export { runWalkthrough, QUIT, type RunCollaborators, type RunOptions, type RunSummary } from "./driver.js";
export { ConfigurationError, EvaluationError } from "./errors.js";
export {
  createEvaluator,
  EvaluationContext,
  PythonKernel,
  ScriptEvaluator,
  type EvaluateOptions,
  type Evaluator,
  type RuntimeName,
  type RuntimeOptions,
} from "./evaluate.js";
export { FastForwardController, parseFastForward, type FastForwardTarget } from "./fast-forward.js";
export { isExecutable, NO_EXEC } from "./gate.js";
export { findPython, parseArguments, resolveConfig, runtimeFor, type CliArguments, type RunConfig } from "./options.js";
export { renderMarkdown, TerminalPresenter, type Presenter, type TextSink } from "./present.js";
export { LinePrompt, type Prompt } from "./prompt.js";
export { LineCursor, openingDelimiter, segment, segmentFile, type Segment, type SegmentKind } from "./segment.js";
