/// # scoped interception
///
/// suppressing a side effect means swapping one property of the
/// evaluation namespace for a stand-in, and swapping it back afterwards no
/// matter how the evaluation ended. `intercept` does the swap and hands back
/// a guard; callers release it in a `finally`.

export interface Interception {
  restore(): void;
}

export function intercept(target: Record<string, unknown>, name: string, replacement: unknown): Interception {
  const had = Object.prototype.hasOwnProperty.call(target, name);
  const original = target[name];
  target[name] = replacement;

  let restored = false;
  return {
    restore() {
      if (restored) return;
      restored = true;
      if (had) {
        target[name] = original;
      } else {
        delete target[name];
      }
    },
  };
}

/// several interceptions released together, in reverse order.
export function interceptAll(target: Record<string, unknown>, names: readonly string[], replacement: unknown): Interception {
  const guards = names.map((name) => intercept(target, name, replacement));
  return {
    restore() {
      for (const guard of [...guards].reverse()) guard.restore();
    },
  };
}
