/// # the python runtime
///
/// python walkthroughs run in a long-lived `python` child process
/// (`kernel/kernel.py`) that holds the namespace. we talk to it over a
/// line-delimited JSON protocol on two extra pipes: requests go in on file
/// descriptor 4, replies come back on file descriptor 3. stdin, stdout and
/// stderr are inherited, so a snippet prints straight to the terminal and
/// `input()` reads from it.
///
/// plot suppression happens on the python side: while a request carries
/// `suppress: true`, `matplotlib.pyplot.show` is a no-op, and it's put back
/// (with every figure closed) when the snippet finishes, however it
/// finishes.

import { spawn, type ChildProcess } from "node:child_process";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import { Readable, Writable } from "node:stream";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError, EvaluationError } from "../errors.js";
import type { EvaluateOptions, Evaluator } from "./types.js";

export const KERNEL_SCRIPT = fileURLToPath(new URL("../../kernel/kernel.py", import.meta.url));

/// ## protocol

const ReadyZ = z.object({ ready: z.literal(true) });

const ReplyZ = z.object({
  id: z.number().int(),
  ok: z.boolean(),
  error: z.string().optional(),
  type: z.string().optional(),
});

const KernelMessageZ = z.union([ReadyZ, ReplyZ]);

export type KernelMessage = z.infer<typeof KernelMessageZ>;

/// `undefined` for anything that isn't a message we know.
export function parseKernelMessage(line: string): KernelMessage | undefined {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = KernelMessageZ.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

export interface PythonKernelOptions {
  /// the interpreter to spawn, e.g. `python3` or a virtualenv's `bin/python`.
  python: string;
  filename: string;
  loadPaths?: readonly string[];
  /// what the kernel's stdin is connected to. `"ignore"` gives snippets an
  /// empty input, so `input()` fails instead of waiting.
  stdin?: "inherit" | "ignore";
}

interface Waiter {
  resolve: () => void;
  reject: (error: EvaluationError) => void;
}

/// ## the kernel

export class PythonKernel implements Evaluator {
  private readonly child: ChildProcess;
  private readonly requests: Writable;
  private readonly filename: string;
  private readonly pending = new Map<number, Waiter>();
  private readonly ready: Promise<void>;
  private settleReady: (error?: ConfigurationError) => void = () => {};
  private nextId = 1;
  /// set once the kernel is gone; every later evaluation fails with it.
  private failure: string | undefined;

  private constructor(child: ChildProcess, filename: string) {
    this.child = child;
    this.filename = filename;
    this.ready = new Promise<void>((resolve, reject) => {
      this.settleReady = (error) => (error ? reject(error) : resolve());
    });

    child.on("error", (error) => this.fail(error.message));
    child.on("close", (code, signal) => this.fail(`the python kernel exited (${signal ?? `code ${code}`})`));

    const [, , , replies, requests] = child.stdio;
    if (!(replies instanceof Readable) || !(requests instanceof Writable)) {
      /// nobody will wait on `ready` after this throw.
      this.settleReady = () => {};
      child.kill();
      throw new ConfigurationError("the python kernel has no request or reply channel");
    }
    this.requests = requests;

    createInterface({ input: replies, crlfDelay: Infinity }).on("line", (line) => this.receive(line));
    requests.on("error", (error) => this.fail(error.message));
  }

  /// spawns the kernel and waits for its `ready` message. a missing
  /// interpreter, or a kernel that dies before it's ready, is a
  /// configuration problem.
  static async start(options: PythonKernelOptions): Promise<PythonKernel> {
    const filename = resolve(options.filename);
    const args = ["-u", KERNEL_SCRIPT, filename, ...(options.loadPaths ?? []).map((path) => resolve(path))];
    const child = spawn(options.python, args, {
      stdio: [options.stdin ?? "inherit", "inherit", "inherit", "pipe", "pipe"],
    });

    const kernel = new PythonKernel(child, filename);
    await kernel.ready;
    return kernel;
  }

  async evaluate(code: string, { suppressSideEffects }: EvaluateOptions): Promise<void> {
    if (this.failure !== undefined) throw new EvaluationError(this.failure);
    const { requests } = this;

    const id = this.nextId++;
    const request = { id, code, suppress: suppressSideEffects, filename: `${this.filename}#${id}` };

    await new Promise<void>((resolve, reject) => {
      this.pending.set(id, { resolve: () => resolve(), reject });
      requests.write(JSON.stringify(request) + "\n");
    });
  }

  /// closing the request pipe ends the kernel's read loop; we wait for the
  /// process to go away.
  async close(): Promise<void> {
    if (this.child.exitCode !== null || this.child.signalCode !== null) return;
    const closed = new Promise<void>((resolve) => this.child.once("close", () => resolve()));
    this.requests.end();
    await closed;
  }

  private receive(line: string): void {
    const message = parseKernelMessage(line);
    if (message === undefined) {
      this.fail(`the python kernel sent something unexpected: ${line}`);
      return;
    }

    if ("ready" in message) {
      this.settleReady();
      return;
    }

    const waiter = this.pending.get(message.id);
    if (!waiter) return;
    this.pending.delete(message.id);

    if (message.ok) {
      waiter.resolve();
    } else {
      waiter.reject(new EvaluationError(message.error ?? message.type ?? "python error"));
    }
  }

  private fail(reason: string): void {
    this.failure ??= reason;
    this.settleReady(new ConfigurationError(`could not start the python kernel: ${reason}`));

    for (const waiter of this.pending.values()) {
      waiter.reject(new EvaluationError(reason));
    }
    this.pending.clear();
  }
}
