import { classifyAt } from "../tokenizer/classifier";
import { scanCSI } from "../tokenizer/csi";
import { scanOSC } from "../tokenizer/osc";
import { type AnsiToken, type ColorState, makeToken } from "../tokenizer/types";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function isAsciiOnly(str: string): boolean {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 0x7f) return false;
  }
  return true;
}

/** End of the text chunk starting at `start`: the next escape introducer, BEL, or end of input */
function textChunkEnd(input: string, start: number): number {
  let end = start + 1;
  while (end < input.length) {
    const cls = classifyAt(input, end);
    if (cls === "csi" || cls === "osc" || cls === "zero-width") break;
    end++;
  }
  return end;
}

/**
 * Unicode-aware pass. Text between escape codes is split into grapheme clusters:
 * clusters made only of ASCII extend a `text` run, every other cluster becomes
 * one `complex` token (emoji with skin tones, ZWJ sequences, combining marks, CJK).
 */
export function parseUnicode(input: string, start: number, colors: ColorState): AnsiToken[] {
  const tokens: AnsiToken[] = [];
  let current = colors;
  let i = start;

  const pushText = (chunk: string) => {
    let run = "";
    for (const { segment } of segmenter.segment(chunk)) {
      if (isAsciiOnly(segment)) {
        run += segment;
        continue;
      }
      if (run) {
        tokens.push(makeToken("text", run, current, true));
        run = "";
      }
      tokens.push(makeToken("complex", segment, current));
    }
    if (run) tokens.push(makeToken("text", run, current, true));
  };

  while (i < input.length) {
    const cls = classifyAt(input, i);

    if (cls === "csi" || cls === "osc") {
      const escape = cls === "csi" ? scanCSI(input, i, current) : scanOSC(input, i, current);
      current = { fg: escape.fg, bg: escape.bg };
      tokens.push(escape);
      i += escape.content.length;
      continue;
    }

    if (cls === "zero-width") {
      tokens.push(makeToken("zero-width", input.slice(i, i + 1), current));
      i++;
      continue;
    }

    const end = textChunkEnd(input, i);
    pushText(input.slice(i, end));
    i = end;
  }

  return tokens;
}
