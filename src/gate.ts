/// # the snippet gate
///
/// a code segment can opt out of being run by starting with a comment that
/// carries the `pwmc:no_exec` keyword, e.g. `# pwmc:no_exec` in python or
/// `//pwmc:no_exec` in a script walkthrough. one space after the comment
/// marker is allowed, no more.

import { python, type Dialect } from "./dialect.js";

export const NO_EXEC = "pwmc:no_exec";

export function isExecutable(text: string, dialect: Dialect = python): boolean {
  const snippet = text.trim();
  const marker = dialect.lineComment;
  return !(snippet.startsWith(`${marker} ${NO_EXEC}`) || snippet.startsWith(`${marker}${NO_EXEC}`));
}
