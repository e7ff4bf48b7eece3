import { parseAnsi } from "../parse/index";
import { type AnsiToken, makeToken } from "../tokenizer/types";

/** Remove every escape code, keeping text, glyphs and zero-width characters */
export function stripTokens(tokens: Iterable<AnsiToken>): string {
  let out = "";
  for (const token of tokens) {
    if (token.kind !== "escape") out += token.content;
  }
  return out;
}

export function stripAnsi(input: string): string {
  return stripTokens(parseAnsi(input));
}

/**
 * Split a token sequence into lines at each "\n" inside text tokens.
 * The newline itself is dropped; a "\r" before it stays with its line.
 * Pieces keep the colors of the token they came from, so color state
 * carries across lines. Always returns at least one (possibly empty) line.
 */
export function splitLines(tokens: Iterable<AnsiToken>): AnsiToken[][] {
  let line: AnsiToken[] = [];
  const lines: AnsiToken[][] = [line];

  for (const token of tokens) {
    if (token.kind !== "text" || !token.content.includes("\n")) {
      line.push(token);
      continue;
    }

    const pieces = token.content.split("\n");
    pieces.forEach((piece, index) => {
      if (index > 0) {
        line = [];
        lines.push(line);
      }
      if (piece) {
        line.push(makeToken("text", piece, token, token.isAscii));
      }
    });
  }

  return lines;
}
