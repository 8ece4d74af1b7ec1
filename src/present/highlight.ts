/// # terminal syntax highlighting
///
/// shiki does the tokenizing, exactly as it would for html, but instead of
/// `<span style="color:…">` we ask it for the raw tokens and paint each one
/// with a 24-bit ansi colour.
///
/// loading grammars is the expensive part, so there is one highlighter per
/// process, created the first time something needs colour.

import { createHighlighter, type BundledLanguage, type BundledTheme, type HighlighterGeneric } from "shiki";
import type { Style } from "./ansi.js";

const THEME = "github-dark";
const LANGUAGES = ["python", "typescript", "javascript", "json", "bash"] as const satisfies readonly BundledLanguage[];

type Language = (typeof LANGUAGES)[number];

const ALIASES: Record<string, Language> = {
  py: "python",
  ts: "typescript",
  js: "javascript",
  sh: "bash",
  shell: "bash",
};

let loading: Promise<HighlighterGeneric<BundledLanguage, BundledTheme>> | null = null;

function getHighlighter(): Promise<HighlighterGeneric<BundledLanguage, BundledTheme>> {
  loading ??= createHighlighter({ themes: [THEME], langs: [...LANGUAGES] });
  return loading;
}

/// fence info strings and runtime names both end up here. unknown
/// languages aren't highlighted.
export function resolveLanguage(name: string | undefined): Language | undefined {
  const key = (name ?? "").trim().toLowerCase();
  return LANGUAGES.find((language) => language === key) ?? ALIASES[key];
}

export async function highlight(code: string, language: string | undefined, style: Style): Promise<string> {
  const lang = resolveLanguage(language);
  if (!style.enabled || lang === undefined) return code;

  const highlighter = await getHighlighter();
  const lines = highlighter.codeToTokensBase(code, { lang, theme: THEME });
  return lines.map((tokens) => tokens.map((token) => style.hex(token.color, token.content)).join("")).join("\n");
}
