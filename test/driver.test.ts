import { describe, it, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { script } from "../src/dialect.js";
import { runWalkthrough, type RunOptions } from "../src/driver.js";
import { ConfigurationError } from "../src/errors.js";
import { EvaluationContext, ScriptEvaluator } from "../src/evaluate.js";
import type { Segment } from "../src/segment.js";
import { segmentFile } from "../src/segment.js";
import { RecordingEvaluator, RecordingPresenter, ScriptedPrompt } from "./helpers.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const doc = (text: string): Segment => ({ kind: "documentation", text });
const code = (text: string): Segment => ({ kind: "code", text });

function setup(answers: string[] = []) {
  const evaluator = new RecordingEvaluator();
  const presenter = new RecordingPresenter();
  const prompt = new ScriptedPrompt(answers);
  const run = (segments: Segment[], options: RunOptions) =>
    runWalkthrough(segments, { context: new EvaluationContext(evaluator), presenter, prompt }, options);
  return { evaluator, presenter, prompt, run };
}

describe("runWalkthrough", () => {
  it("runs everything without pausing when not interactive", async () => {
    const { evaluator, presenter, prompt, run } = setup();

    const summary = await run(
      [doc("Intro"), code("a"), code("# pwmc:no_exec\nb"), code("boom"), code("c")],
      { interactive: false },
    );

    expect(evaluator.calls).toEqual([
      { code: "a", suppress: true },
      { code: "boom", suppress: true },
      { code: "c", suppress: true },
    ]);
    expect(presenter.events).toEqual([
      "doc:Intro",
      "separator",
      "separator",
      "not-executed",
      "separator",
      "error:boom failed",
      "separator",
      "separator",
    ]);
    expect(prompt.reads).toBe(0);
    expect(summary).toEqual({ segments: 5, evaluated: 3, skipped: 1, failed: 1, quit: false });
    expect(evaluator.closed).toBe(true);
  });

  it("waits after every segment in interactive mode and stops on q", async () => {
    const { evaluator, prompt, run } = setup(["", "next", "q"]);

    const summary = await run([code("a"), code("b"), code("c"), code("d"), code("e")], { interactive: true });

    expect(evaluator.calls.map((c) => c.code)).toEqual(["a", "b", "c"]);
    expect(evaluator.calls.every((c) => !c.suppress)).toBe(true);
    expect(prompt.reads).toBe(3);
    expect(summary.quit).toBe(true);
    expect(summary.segments).toBe(3);
    expect(evaluator.closed).toBe(true);
  });

  it("treats the end of input like q", async () => {
    const { evaluator, run } = setup([]);

    const summary = await run([code("a"), code("b")], { interactive: true });

    expect(evaluator.calls.map((c) => c.code)).toEqual(["a"]);
    expect(summary.quit).toBe(true);
  });

  it("keeps going after a failing snippet", async () => {
    const { evaluator, presenter, run } = setup(["", "", ""]);

    const summary = await run([code("boom"), code("after")], { interactive: true });

    expect(evaluator.calls.map((c) => c.code)).toEqual(["boom", "after"]);
    expect(presenter.events).toEqual(["error:boom failed"]);
    expect(summary.failed).toBe(1);
  });

  it("fast-forwards silently through snippet N", async () => {
    const { evaluator, presenter, prompt, run } = setup(["", ""]);

    await run([code("a"), code("b"), code("c"), code("d")], {
      interactive: true,
      fastForward: { kind: "ordinal", ordinal: 2 },
    });

    expect(evaluator.calls).toEqual([
      { code: "a", suppress: true },
      { code: "b", suppress: true },
      { code: "c", suppress: false },
      { code: "d", suppress: false },
    ]);
    expect(presenter.events).toEqual(["separator", "separator"]);
    expect(prompt.reads).toBe(2);
  });

  it("fast-forwards up to and including the first documentation with the phrase", async () => {
    const { evaluator, presenter, prompt, run } = setup(["", "", ""]);

    await run(
      [doc("Intro"), code("a"), doc("Setup the data"), code("b"), doc("More setup"), code("c")],
      { interactive: true, fastForward: { kind: "substring", needle: "setup" } },
    );

    expect(evaluator.calls).toEqual([
      { code: "a", suppress: true },
      { code: "b", suppress: false },
      { code: "c", suppress: false },
    ]);
    expect(presenter.events).toEqual([
      "doc:Intro",
      "separator",
      "separator",
      "doc:Setup the data",
      "separator",
      "doc:More setup",
    ]);
    expect(prompt.reads).toBe(3);
  });

  it("counts skipped snippets towards the fast-forward target", async () => {
    const { evaluator, prompt, run } = setup([""]);

    const summary = await run([code("# pwmc:no_exec\na"), code("b"), code("c")], {
      interactive: true,
      fastForward: { kind: "ordinal", ordinal: 2 },
    });

    expect(evaluator.calls).toEqual([
      { code: "b", suppress: true },
      { code: "c", suppress: false },
    ]);
    expect(prompt.reads).toBe(1);
    expect(summary.skipped).toBe(1);
  });

  it("echoes code before running it", async () => {
    const { presenter, run } = setup();

    await run([code("a")], { interactive: false, echo: true });

    expect(presenter.events).toEqual(["code:a", "separator"]);
  });

  it("refuses to fast-forward outside interactive mode", async () => {
    const { evaluator, run } = setup();

    await expect(
      run([code("a")], { interactive: false, fastForward: { kind: "ordinal", ordinal: 1 } }),
    ).rejects.toThrow(ConfigurationError);
    expect(evaluator.calls).toEqual([]);
    expect(evaluator.closed).toBe(true);
  });

  it("needs a prompt to run interactively", async () => {
    const evaluator = new RecordingEvaluator();

    await expect(
      runWalkthrough(
        [code("a")],
        { context: new EvaluationContext(evaluator), presenter: new RecordingPresenter() },
        { interactive: true },
      ),
    ).rejects.toThrow(ConfigurationError);
  });
});

describe("a script walkthrough", () => {
  const tour = join(__dirname, "fixtures", "tour.js");

  it("shares one namespace across snippets and survives a failure", async () => {
    const written: string[] = [];
    const evaluator = new ScriptEvaluator({ filename: tour, write: (text) => written.push(text) });
    const presenter = new RecordingPresenter();

    const summary = await runWalkthrough(
      segmentFile(tour, script),
      { context: new EvaluationContext(evaluator), presenter },
      { interactive: false, dialect: script },
    );

    expect(summary).toEqual({ segments: 10, evaluated: 4, skipped: 1, failed: 1, quit: false });
    expect(evaluator.namespace.answer).toBe(42);
    expect(evaluator.namespace.partial).toBe(1);
    expect(evaluator.namespace.after).toBe(43);
    expect(evaluator.namespace.never).toBeUndefined();
    expect(presenter.events).toContain("error:missing is not defined");
    /// side effects are suppressed when nobody is watching
    expect(written).toEqual([]);
  });

  it("shows values when run interactively", async () => {
    const written: string[] = [];
    const evaluator = new ScriptEvaluator({ filename: tour, write: (text) => written.push(text) });

    await runWalkthrough(
      segmentFile(tour, script),
      {
        context: new EvaluationContext(evaluator),
        presenter: new RecordingPresenter(),
        prompt: new ScriptedPrompt(Array.from({ length: 10 }, () => "")),
      },
      { interactive: true, dialect: script },
    );

    expect(written).toEqual(["42\n"]);
  });
});
