/// # the script runtime
///
/// javascript and typescript walkthroughs run inside one `node:vm` context
/// that lives as long as the run. a `var` or a `globalThis.x = …` in one
/// snippet is visible to every later one; top-level `let`/`const` persist
/// too, but only as lexical bindings, so they can't be declared twice.
///
/// every snippet goes through the typescript compiler first, which strips
/// types and turns `import` into `require`. the `require` handed to
/// snippets looks in the load paths before the walkthrough's own folder.

import { createRequire, isBuiltin } from "node:module";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { inspect, types } from "node:util";
import vm from "node:vm";
import ts from "typescript";
import { EvaluationError } from "../errors.js";
import { interceptAll } from "./intercept.js";
import type { EvaluateOptions, Evaluator } from "./types.js";

export interface ScriptEvaluatorOptions {
  /// the walkthrough being run. relative requires and stack traces are
  /// anchored here.
  filename: string;
  loadPaths?: readonly string[];
  /// where `show(…)` prints. defaults to stdout.
  write?: (text: string) => void;
  /// globals that only matter to a person watching; they become no-ops
  /// while side effects are suppressed.
  interactiveGlobals?: readonly string[];
}

export class ScriptEvaluator implements Evaluator {
  /// the context's global object, as seen from outside.
  readonly namespace: Record<string, unknown>;
  private readonly context: vm.Context;
  private readonly filename: string;
  private readonly interactiveGlobals: readonly string[];
  private snippets = 0;

  constructor(options: ScriptEvaluatorOptions) {
    this.filename = resolve(options.filename);
    this.interactiveGlobals = options.interactiveGlobals ?? ["show"];
    const write = options.write ?? ((text: string) => {
      process.stdout.write(text);
    });

    this.namespace = {
      console,
      process,
      Buffer,
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder,
      setTimeout,
      clearTimeout,
      setInterval,
      clearInterval,
      queueMicrotask,
      structuredClone,
      exports: {},
      require: createSnippetRequire(this.filename, options.loadPaths ?? []),
      show: (...values: unknown[]) => {
        write(values.map((value) => (typeof value === "string" ? value : inspect(value))).join(" ") + "\n");
      },
    };
    this.context = vm.createContext(this.namespace);
  }

  async evaluate(code: string, { suppressSideEffects }: EvaluateOptions): Promise<void> {
    const filename = `${this.filename}#${++this.snippets}`;
    const source = transpile(code, filename);

    const guard = suppressSideEffects
      ? interceptAll(this.namespace, this.interactiveGlobals, () => undefined)
      : undefined;

    try {
      /// a snippet whose last expression is a promise gets awaited, so
      /// `await`-free async code still finishes before the next snippet.
      const completion: unknown = vm.runInContext(source, this.context, { filename });
      if (types.isPromise(completion)) await completion;
    } catch (error) {
      throw EvaluationError.from(error);
    } finally {
      guard?.restore();
    }
  }

  async close(): Promise<void> {}
}

/// ## transpiling
///
/// `transpileModule` only reports syntax errors, and a walkthrough
/// with type errors in it still runs.

export function transpile(code: string, filename: string): string {
  const output = ts.transpileModule(code, {
    fileName: `${filename}.ts`,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.CommonJS,
      moduleDetection: ts.ModuleDetectionKind.Legacy,
      esModuleInterop: true,
    },
  });

  const errors = (output.diagnostics ?? []).filter((d) => d.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    throw new EvaluationError(errors.map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n")).join("\n"));
  }
  return output.outputText;
}

/// ## require
///
/// a load path works like a python `sys.path` entry: `require("helpers")`
/// finds `<load path>/helpers.js` (or `helpers/index.js`, …) directly.
/// after the load paths comes ordinary node resolution from the
/// walkthrough's folder.

function createSnippetRequire(filename: string, loadPaths: readonly string[]): (id: string) => unknown {
  const base = createRequire(filename);
  const dirs = loadPaths.map((path) => resolve(path));

  return (id: string) => {
    if (isBuiltin(id) || id.startsWith(".") || isAbsolute(id)) {
      return base(id);
    }
    for (const dir of dirs) {
      const resolved = tryResolve(base, join(dir, id));
      if (resolved !== undefined) return base(resolved);
    }
    return base(base.resolve(id, { paths: [...dirs, dirname(filename)] }));
  };
}

function tryResolve(base: NodeRequire, request: string): string | undefined {
  try {
    return base.resolve(request);
  } catch (error) {
    if (isModuleNotFound(error)) return undefined;
    throw error;
  }
}

function isModuleNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND";
}
