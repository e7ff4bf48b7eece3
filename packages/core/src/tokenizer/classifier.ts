import { BEL, type CharClass, ESC } from "./types";

/**
 * Classify the code unit at `index`, looking one unit ahead for escape introducers.
 * A lone ESC (at end of input, or not followed by `[` or `]`) is plain text.
 */
export function classifyAt(input: string, index: number): CharClass {
  const c = input.charCodeAt(index);

  if (c === ESC && index + 1 < input.length) {
    const next = input.charCodeAt(index + 1);
    if (next === 0x5b) return "csi"; // [
    if (next === 0x5d) return "osc"; // ]
    return "plain";
  }

  if (c === BEL) return "zero-width";

  // Surrogate halves are both above 0x7F, so a code point is never split
  if (c > 0x7f) return "multibyte";

  return "plain";
}
