import { describe, it, expect } from "vitest";
import { intercept, interceptAll } from "../src/evaluate.js";

describe("intercept", () => {
  it("swaps a property and puts it back", () => {
    const original = () => "shown";
    const target: Record<string, unknown> = { show: original };

    const guard = intercept(target, "show", null);
    expect(target.show).toBeNull();

    guard.restore();
    expect(target.show).toBe(original);
  });

  it("removes a property that wasn't there before", () => {
    const target: Record<string, unknown> = {};

    intercept(target, "plot", 1).restore();
    expect("plot" in target).toBe(false);
  });

  it("restores only once", () => {
    const target: Record<string, unknown> = { show: 1 };
    const guard = intercept(target, "show", 2);

    guard.restore();
    target.show = 3;
    guard.restore();
    expect(target.show).toBe(3);
  });

  it("restores several properties together", () => {
    const target: Record<string, unknown> = { a: 1, b: 2 };
    const guard = interceptAll(target, ["a", "b"], 0);

    expect(target).toEqual({ a: 0, b: 0 });
    guard.restore();
    expect(target).toEqual({ a: 1, b: 2 });
  });
});
