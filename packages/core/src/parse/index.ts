import { type AnsiToken, EMPTY_COLORS } from "../tokenizer/types";
import { parseAscii } from "./ascii";
import { parseUnicode } from "./unicode";

export { parseAscii } from "./ascii";
export type { AsciiPassResult } from "./ascii";
export { parseUnicode } from "./unicode";

export interface ParseOptions {
  /**
   * Try the ASCII-only pass first and switch to the grapheme-aware pass at the
   * first non-ASCII character (default true). Token boundaries are identical
   * either way; disabling it only costs speed on ASCII input.
   */
  fastPath?: boolean;
}

/**
 * Parse a string containing ANSI escape codes into its full token sequence.
 * Unlike `AnsiTokenizer`, every non-ASCII glyph becomes its own `complex` token.
 */
export function parseAnsi(input: string, options: ParseOptions = {}): AnsiToken[] {
  if (options.fastPath === false) {
    return parseUnicode(input, 0, EMPTY_COLORS);
  }

  const ascii = parseAscii(input, 0, EMPTY_COLORS);
  if (ascii.consumed >= input.length) return ascii.tokens;

  // Didn't consume everything: the rest contains non-ASCII characters
  return [...ascii.tokens, ...parseUnicode(input, ascii.consumed, ascii.colors)];
}
