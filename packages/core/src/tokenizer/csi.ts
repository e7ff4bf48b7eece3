import { resolveSGR } from "./sgr";
import { type AnsiToken, type ColorState, makeToken } from "./types";

const SGR_FINAL = 0x6d; // m

/**
 * Scan a CSI sequence starting at `start` (the ESC of `ESC [`).
 *
 * CSI: ESC [ followed by parameter bytes (0x30-0x3F), intermediate bytes (0x20-0x2F),
 * and a final byte (0x40-0x7E). A sequence cut short by end of input, or by a byte
 * outside these ranges, closes where scanning stopped.
 *
 * The returned token's length is `token.content.length`.
 */
export function scanCSI(input: string, start: number, colors: ColorState): AnsiToken {
  let i = start + 2; // Skip ESC [

  // Parameter bytes (digits, semicolons, colons, question marks, etc.)
  while (i < input.length && input.charCodeAt(i) >= 0x30 && input.charCodeAt(i) <= 0x3f) {
    i++;
  }
  const paramsEnd = i;

  // Intermediate bytes
  while (i < input.length && input.charCodeAt(i) >= 0x20 && input.charCodeAt(i) <= 0x2f) {
    i++;
  }

  // Final byte
  let command = 0;
  if (i < input.length && input.charCodeAt(i) >= 0x40 && input.charCodeAt(i) <= 0x7e) {
    command = input.charCodeAt(i);
    i++;
  }

  const content = input.slice(start, i);
  if (command === SGR_FINAL) {
    return makeToken("escape", content, resolveSGR(input.slice(start + 2, paramsEnd), colors));
  }
  // Cursor movement and every other command leave colors untouched
  return makeToken("escape", content, colors);
}
