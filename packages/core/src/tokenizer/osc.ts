import { type AnsiToken, BEL, type ColorState, ESC, makeToken } from "./types";

/**
 * Scan an OSC sequence starting at `start` (the ESC of `ESC ]`).
 * Terminated by BEL or the string terminator `ESC \`, both included in the token.
 * An unterminated sequence runs to end of input. Colors pass through unchanged.
 */
export function scanOSC(input: string, start: number, colors: ColorState): AnsiToken {
  let i = start + 2; // Skip ESC ]

  while (i < input.length) {
    const c = input.charCodeAt(i);
    if (c === BEL) {
      i++;
      break;
    }
    if (c === ESC && i + 1 < input.length && input.charCodeAt(i + 1) === 0x5c) {
      i += 2; // ESC \
      break;
    }
    i++;
  }

  return makeToken("escape", input.slice(start, i), colors);
}
