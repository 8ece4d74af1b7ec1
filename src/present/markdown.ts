/// # documentation rendering
///
/// documentation blocks are markdown. we let [marked](https://github.com/markedjs/marked)
/// lex them and then walk the tokens ourselves, writing terminal text
/// instead of html: headings and paragraphs in bold, code fences
/// highlighted and indented, lists with bullets, quotes behind a bar.
///
/// blocks are separated by one blank line. the result never ends in a
/// newline; the presenter adds that.

import { Lexer, type Token } from "marked";
import type { Style } from "./ansi.js";
import { highlight } from "./highlight.js";

const RULE_WIDTH = 40;

export async function renderMarkdown(text: string, style: Style): Promise<string> {
  return renderBlocks(Lexer.lex(text), style);
}

async function renderBlocks(tokens: Token[], style: Style): Promise<string> {
  const blocks: string[] = [];
  for (const token of tokens) {
    const block = await renderBlock(token, style);
    if (block !== null) blocks.push(block);
  }
  return blocks.join("\n\n");
}

async function renderBlock(token: Token, style: Style): Promise<string | null> {
  switch (token.type) {
    case "space":
      return null;

    case "heading": {
      const text = renderInline(token.tokens ?? [], style);
      return token.depth === 1 ? style.bold(style.underline(text)) : style.bold(text);
    }

    case "paragraph":
      return style.bold(renderInline(token.tokens ?? [], style));

    /// marked files inline html tags under "text" too; those have no children.
    case "text":
      return "tokens" in token && token.tokens ? renderInline(token.tokens, style) : decodeEntities(token.text);

    case "code": {
      const code = await highlight(token.text, token.lang, style);
      return indent(code, "  ");
    }

    case "blockquote": {
      const inner = await renderBlocks(token.tokens ?? [], style);
      return prefixLines(inner, style.dim("│ "));
    }

    case "list": {
      const items: string[] = [];
      let number = typeof token.start === "number" ? token.start : 1;
      for (const item of token.items) {
        const marker = token.ordered ? `${number++}.` : "•";
        const body = await renderBlocks(item.tokens ?? [], style);
        items.push(`${marker} ${indent(body, " ".repeat(marker.length + 1)).trimStart()}`);
      }
      return items.join("\n");
    }

    case "hr":
      return style.dim("─".repeat(RULE_WIDTH));

    case "table": {
      const row = (cells: { tokens: Token[] }[]) => cells.map((cell) => renderInline(cell.tokens, style)).join(" | ");
      return [style.bold(row(token.header)), ...token.rows.map(row)].join("\n");
    }

    case "html":
      return token.text.trimEnd();

    default:
      return token.raw.trimEnd();
  }
}

/// ## inline tokens

function renderInline(tokens: Token[], style: Style): string {
  return tokens.map((token) => renderSpan(token, style)).join("");
}

function renderSpan(token: Token, style: Style): string {
  switch (token.type) {
    case "text":
      return "tokens" in token && token.tokens ? renderInline(token.tokens, style) : decodeEntities(token.text);
    case "escape":
      return decodeEntities(token.text);
    case "strong":
      return style.bold(renderInline(token.tokens ?? [], style));
    case "em":
      return style.italic(renderInline(token.tokens ?? [], style));
    case "del":
      return style.dim(renderInline(token.tokens ?? [], style));
    case "codespan":
      return style.cyan(decodeEntities(token.text));
    case "br":
      return "\n";
    case "link": {
      const label = renderInline(token.tokens ?? [], style);
      return label === token.href ? style.underline(label) : `${style.underline(label)} (${token.href})`;
    }
    case "image":
      return `[${token.text || "image"}]`;
    default:
      return decodeEntities(token.raw);
  }
}

/// depending on the marked release, text can reach us html-escaped.
function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

function indent(text: string, prefix: string): string {
  return prefixLines(text, prefix);
}

function prefixLines(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}
