/// # ansi styling
///
/// a handful of SGR escapes, switched off wholesale when colour is off
/// (`--no-color`, `NO_COLOR`, or output that isn't a terminal). with colour
/// off every style is the identity function, which is what the tests see.

export interface Style {
  enabled: boolean;
  bold(text: string): string;
  dim(text: string): string;
  italic(text: string): string;
  underline(text: string): string;
  red(text: string): string;
  green(text: string): string;
  yellow(text: string): string;
  cyan(text: string): string;
  orange(text: string): string;
  /// 24-bit foreground from a `#rrggbb` (or `#rrggbbaa`) colour.
  hex(color: string | undefined, text: string): string;
}

const identity = (text: string) => text;

export function createStyle(enabled: boolean): Style {
  const sgr = (open: string, close: string) =>
    enabled ? (text: string) => `\x1b[${open}m${text}\x1b[${close}m` : identity;

  return {
    enabled,
    bold: sgr("1", "22"),
    dim: sgr("2", "22"),
    italic: sgr("3", "23"),
    underline: sgr("4", "24"),
    red: sgr("31", "39"),
    green: sgr("32", "39"),
    yellow: sgr("33", "39"),
    cyan: sgr("36", "39"),
    orange: sgr("38;5;166", "39"),
    hex(color, text) {
      const match = enabled && color ? /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})/i.exec(color) : null;
      if (!match) return text;
      const [r, g, b] = match.slice(1).map((part) => Number.parseInt(part, 16));
      return `\x1b[38;2;${r};${g};${b}m${text}\x1b[39m`;
    },
  };
}
