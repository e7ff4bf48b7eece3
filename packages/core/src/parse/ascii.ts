import { classifyAt } from "../tokenizer/classifier";
import { scanCSI } from "../tokenizer/csi";
import { scanOSC } from "../tokenizer/osc";
import { type AnsiToken, type ColorState, makeToken } from "../tokenizer/types";

export interface AsciiPassResult {
  tokens: AnsiToken[];
  /**
   * Where the Unicode-aware pass must resume. Equal to `input.length` when the
   * whole input was ASCII. When a non-ASCII character interrupted an open text
   * run, this is the start of that run, so a combining mark or modifier can
   * still join the character before it.
   */
  consumed: number;
  colors: ColorState;
}

/**
 * Fast path for input made only of ASCII: every character is either one
 * column wide or part of an escape code. Stops at the first non-ASCII code unit.
 */
export function parseAscii(input: string, start: number, colors: ColorState): AsciiPassResult {
  const tokens: AnsiToken[] = [];
  let current = colors;
  let runStart = -1;
  let i = start;

  const finishRun = (end: number) => {
    if (runStart === -1) return;
    tokens.push(makeToken("text", input.slice(runStart, end), current, true));
    runStart = -1;
  };

  while (i < input.length) {
    const cls = classifyAt(input, i);

    if (cls === "multibyte") {
      const resume = runStart === -1 ? i : runStart;
      return { tokens, consumed: resume, colors: current };
    }

    if (cls === "plain") {
      if (runStart === -1) runStart = i;
      i++;
      continue;
    }

    finishRun(i);

    if (cls === "zero-width") {
      tokens.push(makeToken("zero-width", input.slice(i, i + 1), current));
      i++;
      continue;
    }

    const escape = cls === "csi" ? scanCSI(input, i, current) : scanOSC(input, i, current);
    current = { fg: escape.fg, bg: escape.bg };
    tokens.push(escape);
    i += escape.content.length;
  }

  finishRun(i);
  return { tokens, consumed: i, colors: current };
}
