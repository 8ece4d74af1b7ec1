import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { FastForwardController, parseFastForward } from "../src/fast-forward.js";

describe("parseFastForward", () => {
  it("reads integers as snippet numbers", () => {
    expect(parseFastForward("3")).toEqual({ kind: "ordinal", ordinal: 3 });
    expect(parseFastForward("-1")).toEqual({ kind: "ordinal", ordinal: -1 });
  });

  it("reads anything else as a lowercased phrase", () => {
    expect(parseFastForward("Setup Phase")).toEqual({ kind: "substring", needle: "setup phase" });
    expect(parseFastForward("3rd")).toEqual({ kind: "substring", needle: "3rd" });
  });

  it("rejects an empty value", () => {
    expect(() => parseFastForward("  ")).toThrow(ConfigurationError);
  });
});

describe("FastForwardController", () => {
  it("never fast-forwards without a target", () => {
    const controller = new FastForwardController();
    expect(controller.isFastForwarding()).toBe(false);
    controller.advance();
    expect(controller.isFastForwarding()).toBe(false);
  });

  it("fast-forwards through snippet N and stops after it", () => {
    const controller = new FastForwardController({ kind: "ordinal", ordinal: 2 });
    const seen: boolean[] = [];
    for (let i = 0; i < 4; i++) {
      seen.push(controller.isFastForwarding());
      controller.advance();
    }
    expect(seen).toEqual([true, true, false, false]);
    expect(controller.ordinal).toBe(5);
  });

  it("fast-forwards until the phrase shows up, case-insensitively", () => {
    const controller = new FastForwardController({ kind: "substring", needle: "setup" });

    controller.onDocumentationSeen("Introduction");
    expect(controller.isFastForwarding()).toBe(true);

    controller.onDocumentationSeen("The SETUP step");
    expect(controller.isFastForwarding()).toBe(false);
    expect(controller.passedTarget).toBe(true);
  });

  it("stays past the target once it has been seen", () => {
    const controller = new FastForwardController({ kind: "substring", needle: "setup" });
    controller.onDocumentationSeen("setup");
    controller.onDocumentationSeen("something else");
    controller.advance();
    expect(controller.isFastForwarding()).toBe(false);
  });

  it("ignores documentation when targeting a snippet number", () => {
    const controller = new FastForwardController({ kind: "ordinal", ordinal: 1 });
    controller.onDocumentationSeen("1");
    expect(controller.passedTarget).toBe(false);
    expect(controller.isFastForwarding()).toBe(true);
  });
});
