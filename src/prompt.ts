/// # the prompt
///
/// in interactive mode the driver waits for a line after each segment.
/// `LinePrompt` reads lines from a stream with `node:readline`. lines that
/// arrive before anyone asks are queued, so piping a script of answers in
/// works the same as typing them.
///
/// between reads the input is paused, so while a snippet runs it has the
/// terminal to itself (a python `input()` reads the same stdin).
///
/// `null` means the input is finished; the driver treats that like `q`.

import { createInterface, type Interface } from "node:readline";

export interface Prompt {
  readLine(): Promise<string | null>;
  close(): void;
}

export class LinePrompt implements Prompt {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private readonly waiting: ((line: string | null) => void)[] = [];
  private ended = false;
  private paused = false;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = createInterface({ input, crlfDelay: Infinity, terminal: false });

    this.rl.on("line", (line) => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.queued.push(line);
      }
      if (this.waiting.length === 0) this.pause();
    });

    this.rl.on("close", () => {
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) waiter(null);
    });

    this.pause();
  }

  /// whether the input is being read right now.
  get reading(): boolean {
    return !this.paused && !this.ended;
  }

  readLine(): Promise<string | null> {
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
      this.paused = false;
      this.rl.resume();
    });
  }

  private pause(): void {
    this.paused = true;
    this.rl.pause();
  }

  close(): void {
    this.rl.close();
  }
}
