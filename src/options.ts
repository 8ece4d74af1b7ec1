/// # command-line options
///
/// parsing happens in two steps. `parseArguments` turns argv into flags
/// without looking at the outside world; `resolveConfig` then checks those
/// flags against the filesystem and the environment and settles every
/// default. both throw `ConfigurationError`, and both run before the first
/// segment.

import { existsSync, statSync } from "node:fs";
import { delimiter, extname, join } from "node:path";
import { dialects, type Dialect } from "./dialect.js";
import { ConfigurationError } from "./errors.js";
import type { RuntimeName } from "./evaluate.js";
import { parseFastForward, type FastForwardTarget } from "./fast-forward.js";

export interface CliArguments {
  filename?: string;
  interactive: boolean;
  fastForward?: string;
  loadPaths: string[];
  runtime?: RuntimeName;
  python?: string;
  echo: boolean;
  /// `undefined` means "decide from the terminal and `NO_COLOR`".
  color?: boolean;
  help: boolean;
  version: boolean;
}

export interface RunConfig {
  filename: string;
  runtime: RuntimeName;
  dialect: Dialect;
  interactive: boolean;
  fastForward?: FastForwardTarget;
  loadPaths: string[];
  python: string;
  echo: boolean;
  color: boolean;
}

export const USAGE = `litstep - step through a file of """documentation""" and code

usage:
  litstep <file> [options]

options:
  -i, --interactive          pause after every segment (q to quit)
  -ff, --fast-forward <v>    run silently up to snippet <v>, or up to the first
                             documentation containing <v> (needs -i)
  -l, --load-path <dir>      extra module search directory (repeatable)
  -r, --runtime <name>       python | script (default: from the file extension)
      --python <exe>         python interpreter for the python runtime
  -e, --echo                 print each code segment before running it
      --no-color             plain output
  -h, --help                 show this help
  -v, --version              show the version

a code segment starting with "# pwmc:no_exec" (or "// pwmc:no_exec") is shown
but never run.
`;

/// ## parsing
///
/// long options also take `--name=value`. `--load-path` takes one
/// directory per occurrence, or several joined with the platform's path
/// delimiter (`:` on unix).

export function parseArguments(argv: readonly string[]): CliArguments {
  const args: CliArguments = {
    interactive: false,
    loadPaths: [],
    echo: false,
    help: false,
    version: false,
  };

  let onlyPositionals = false;

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];

    if (onlyPositionals || !raw.startsWith("-") || raw === "-") {
      if (args.filename !== undefined) {
        throw new ConfigurationError(`unexpected argument: ${raw}`);
      }
      args.filename = raw;
      continue;
    }

    if (raw === "--") {
      onlyPositionals = true;
      continue;
    }

    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const flag = eq >= 0 ? raw.slice(0, eq) : raw;
    const inline = eq >= 0 ? raw.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigurationError(`${flag} needs a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case "-i":
      case "--interactive":
        args.interactive = true;
        break;
      case "-ff":
      case "--ff":
      case "--fast-forward":
        args.fastForward = value();
        break;
      case "-l":
      case "--load-path":
        args.loadPaths.push(...value().split(delimiter).filter((path) => path !== ""));
        break;
      case "-r":
      case "--runtime":
        args.runtime = parseRuntime(value());
        break;
      case "--python":
        args.python = value();
        break;
      case "-e":
      case "--echo":
        args.echo = true;
        break;
      case "--color":
        args.color = true;
        break;
      case "--no-color":
        args.color = false;
        break;
      case "-h":
      case "--help":
        args.help = true;
        break;
      case "-v":
      case "--version":
        args.version = true;
        break;
      default:
        throw new ConfigurationError(`unknown option: ${flag}`);
    }
  }

  return args;
}

function parseRuntime(name: string): RuntimeName {
  if (name === "python" || name === "script") return name;
  throw new ConfigurationError(`unknown runtime "${name}" (expected python or script)`);
}

/// ## resolving
///
/// the runtime comes from `--runtime`, or failing that from the file
/// extension. which python to run is decided by `findPython`.

const RUNTIME_BY_EXTENSION: Record<string, RuntimeName> = {
  ".py": "python",
  ".js": "script",
  ".mjs": "script",
  ".cjs": "script",
  ".ts": "script",
  ".mts": "script",
  ".cts": "script",
};

export function runtimeFor(filename: string): RuntimeName | undefined {
  return RUNTIME_BY_EXTENSION[extname(filename).toLowerCase()];
}

export interface Environment {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  /// whether stdout is a terminal.
  isTTY: boolean;
}

export function resolveConfig(args: CliArguments, environment: Environment): RunConfig {
  const { filename } = args;
  if (filename === undefined) {
    throw new ConfigurationError("no file given (see --help)");
  }
  if (!existsSync(filename) || !statSync(filename).isFile()) {
    throw new ConfigurationError(`cannot read ${filename}`);
  }

  if (args.fastForward !== undefined && !args.interactive) {
    throw new ConfigurationError("--fast-forward requires --interactive");
  }
  const fastForward = args.fastForward === undefined ? undefined : parseFastForward(args.fastForward);

  const runtime = args.runtime ?? runtimeFor(filename);
  if (runtime === undefined) {
    throw new ConfigurationError(`don't know how to run ${filename}; pass --runtime python or --runtime script`);
  }

  for (const path of args.loadPaths) {
    if (!existsSync(path) || !statSync(path).isDirectory()) {
      throw new ConfigurationError(`load path is not a directory: ${path}`);
    }
  }

  const noColor = (environment.env.NO_COLOR ?? "") !== "";

  return {
    filename,
    runtime,
    dialect: dialects[runtime],
    interactive: args.interactive,
    fastForward,
    loadPaths: args.loadPaths,
    python: findPython(args.python, environment),
    echo: args.echo,
    color: args.color ?? (environment.isTTY && !noColor),
  };
}

/// ## finding python
///
/// an explicit `--python` wins, then `LITSTEP_PYTHON`, then the active
/// virtualenv (`VIRTUAL_ENV`), then whatever `python3` is on the `PATH`.

export function findPython(explicit: string | undefined, { env, platform }: Pick<Environment, "env" | "platform">): string {
  if (explicit) return explicit;
  if (env.LITSTEP_PYTHON) return env.LITSTEP_PYTHON;

  const windows = platform === "win32";
  if (env.VIRTUAL_ENV) {
    return windows ? join(env.VIRTUAL_ENV, "Scripts", "python.exe") : join(env.VIRTUAL_ENV, "bin", "python");
  }
  return windows ? "python" : "python3";
}
