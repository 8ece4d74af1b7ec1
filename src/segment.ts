/// # segmentation
///
/// this is the core parsing logic. a walkthrough file is read line by line
/// and cut into an alternating stream of **documentation** (the contents
/// of `"""` blocks) and **code** (everything else).
///
/// the only subtle part is that `"""` means two things. at the top level it
/// is a section marker; directly under a `def f():` or `class A:` header it
/// is a docstring, and a docstring belongs to the code around it. we tell
/// them apart by looking back at the last non-blank line of the code we've
/// been collecting. that is the whole heuristic: a multi-line signature or
/// a decorator-only line above the docstring fools it, and so does a bare
/// `"""` that closes a multi-line string literal.

import { readFileSync } from "fs";
import { python, type Dialect } from "./dialect.js";
import { ConfigurationError } from "./errors.js";

export type Segment =
  | { kind: "documentation"; text: string }
  | { kind: "code"; text: string };

export type SegmentKind = Segment["kind"];

const DELIMITER = '"""';

/// python-style string prefixes (`r`, `rb`, `Fr`, …) may decorate an
/// opening delimiter. each letter at most once.
const PREFIX_LETTERS = "rubf";
const MAX_PREFIX = 3;

/// ## the line cursor
///
/// a pull-based view over the file's lines. the segmenter peeks at a line
/// to decide which kind of segment it belongs to, and only advances once
/// it has decided. that's how a delimiter line that ends a code segment
/// gets re-examined as the start of the next documentation segment.
///
/// lines keep their terminators, so concatenating them gives back the file.
export class LineCursor {
  private index = 0;
  private readonly lines: readonly string[];

  constructor(content: string) {
    this.lines = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  }

  peek(): string | undefined {
    return this.lines[this.index];
  }

  next(): string | undefined {
    const line = this.lines[this.index];
    if (line !== undefined) this.index++;
    return line;
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }
}

/// if `line` opens a delimiter, returns what follows the `"""` (terminator
/// included); otherwise `null`. leading indentation is ignored, so an
/// indented docstring counts as an opening too; the code segmenter decides
/// what it means.
export function openingDelimiter(line: string): string | null {
  const body = line.trimStart();
  const at = body.indexOf(DELIMITER);
  if (at < 0 || at > MAX_PREFIX) return null;

  const prefix = body.slice(0, at).toLowerCase();
  const letters = new Set(prefix);
  if (letters.size !== prefix.length) return null;
  for (const letter of letters) {
    if (!PREFIX_LETTERS.includes(letter)) return null;
  }

  return body.slice(at + DELIMITER.length);
}

/// if `line` ends (ignoring trailing whitespace and the terminator) with a
/// delimiter, returns the content in front of it.
function closingContent(line: string): string | null {
  const body = line.replace(/\r?\n$/, "").trimEnd();
  return body.endsWith(DELIMITER) ? body.slice(0, -DELIMITER.length) : null;
}

function isBlank(text: string): boolean {
  return text.trim() === "";
}

/// ## segment
///
/// a generator, so segments are produced as the driver asks for them. it
/// reads its input once; to start over, call it again.

export function* segment(content: string, dialect: Dialect = python): Generator<Segment, void, undefined> {
  const cursor = new LineCursor(content);

  for (let line = cursor.peek(); line !== undefined; line = cursor.peek()) {
    const rest = openingDelimiter(line);
    if (rest !== null) {
      cursor.next();
      yield { kind: "documentation", text: readDocumentation(rest, cursor) };
    } else {
      yield { kind: "code", text: readCode(cursor, dialect) };
    }
  }
}

/// reads a whole file, right away, and segments it. a leading byte-order
/// mark is dropped. a file we can't read is a `ConfigurationError`.
export function segmentFile(path: string, dialect: Dialect = python): Generator<Segment, void, undefined> {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`cannot read ${path}: ${reason}`, { cause: error });
  }
  return segment(content.replace(/^\uFEFF/, ""), dialect);
}

/// ### documentation
///
/// `rest` is the opening line after its delimiter. `"""like this"""` on one
/// line is an inline block. otherwise we keep appending lines until one ends
/// with `"""`. a bare opening line (nothing after the `"""`) is dropped
/// whole, and so is a bare closing line; a closing line with content gives
/// that content, minus its terminator.
///
/// running out of file before the closing delimiter just ends the block.

function readDocumentation(rest: string, cursor: LineCursor): string {
  const inline = closingContent(rest);
  if (inline !== null) return inline;

  let text = isBlank(rest) ? "" : rest;

  for (let line = cursor.next(); line !== undefined; line = cursor.next()) {
    const content = closingContent(line);
    if (content !== null) {
      return isBlank(content) ? text : text + content;
    }
    text += line;
  }

  return text;
}

/// ### code
///
/// code lines are taken verbatim. when a delimiter line shows up, the last
/// non-blank line we took decides: a definition header makes it a docstring,
/// which we swallow up to its closing delimiter; anything else ends the
/// segment without consuming the delimiter line.

function readCode(cursor: LineCursor, dialect: Dialect): string {
  let text = "";
  let previous = "";

  const take = (line: string) => {
    text += line;
    if (!isBlank(line)) previous = line.trim();
  };

  for (let line = cursor.peek(); line !== undefined; line = cursor.peek()) {
    const rest = openingDelimiter(line);

    if (rest !== null) {
      if (!dialect.definitionHeader.test(previous)) break;

      cursor.next();
      take(line);
      if (closingContent(rest) === null) {
        for (let inner = cursor.next(); inner !== undefined; inner = cursor.next()) {
          take(inner);
          if (closingContent(inner) !== null) break;
        }
      }
      continue;
    }

    cursor.next();
    take(line);
  }

  return text;
}
