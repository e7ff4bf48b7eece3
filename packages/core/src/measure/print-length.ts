import { parseAnsi, type ParseOptions } from "../parse/index";
import type { AnsiToken } from "../tokenizer/types";
import { tokenDisplayWidth } from "./string-width";

/** Printable length of one token: text by content length, a complex glyph counts 1 */
export function tokenPrintLength(token: AnsiToken): number {
  switch (token.kind) {
    case "text":
      return token.content.length;
    case "complex":
      return 1;
    case "escape":
    case "zero-width":
      return 0;
  }
}

/** Number of printable characters in `input`, ignoring escape codes */
export function printLength(input: string, options?: ParseOptions): number {
  let length = 0;
  for (const token of parseAnsi(input, options)) {
    length += tokenPrintLength(token);
  }
  return length;
}

/** Terminal columns `input` occupies, counting wide glyphs as 2 */
export function displayWidth(input: string, options?: ParseOptions): number {
  let width = 0;
  for (const token of parseAnsi(input, options)) {
    width += tokenDisplayWidth(token);
  }
  return width;
}
