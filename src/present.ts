/// # presentation (re-export)

export { createStyle, type Style } from "./present/ansi.js";
export { highlight, resolveLanguage } from "./present/highlight.js";
export { renderMarkdown } from "./present/markdown.js";
export { TerminalPresenter, type TerminalPresenterOptions } from "./present/terminal.js";
export type { Presenter, TextSink } from "./present/types.js";
