/// # dialects
///
/// the walkthrough format itself never changes: documentation lives in
/// `"""` blocks, code lives everywhere else. what changes between languages
/// is the small set of conventions the segmenter and the snippet gate lean
/// on: how a line comment starts, and what a function or class header
/// looks like (so a docstring right under one isn't mistaken for a section
/// break).

export interface Dialect {
  name: DialectName;
  /// the marker that starts a single-line comment, e.g. `#` or `//`.
  lineComment: string;
  /// tested against the trimmed line above a `"""` inside a code segment.
  definitionHeader: RegExp;
}

export type DialectName = "python" | "script";

export const python: Dialect = {
  name: "python",
  lineComment: "#",
  definitionHeader: /^(?:async\s+def|def|class)\b.*:$/,
};

/// javascript and typescript share one dialect. a header is a line that
/// opens a function or class body.
export const script: Dialect = {
  name: "script",
  lineComment: "//",
  definitionHeader: /^(?:export\s+(?:default\s+)?)?(?:async\s+function\*?|function\*?|class)\b.*\{$/,
};

export const dialects: Record<DialectName, Dialect> = { python, script };
