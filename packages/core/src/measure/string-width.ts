import type { AnsiToken } from "../tokenizer/types";
import wideEmoji from "./wide-emoji.json";

// Emoji-presentation code points outside the pictograph blocks, as inclusive hex ranges
const WIDE_EMOJI_RANGES: ReadonlyArray<readonly [number, number]> = wideEmoji.map(
  ([start, end]) => [Number.parseInt(start, 16), Number.parseInt(end, 16)] as const,
);

function isWideEmoji(codePoint: number): boolean {
  return WIDE_EMOJI_RANGES.some(([start, end]) => codePoint >= start && codePoint <= end);
}

function isRegionalIndicator(codePoint: number): boolean {
  return codePoint >= 0x1f1e6 && codePoint <= 0x1f1ff;
}

/**
 * Get the terminal display width of a Unicode code point.
 * CJK / Hangul / fullwidth characters and emoji occupy 2 columns, combining
 * marks and joiners 0, most others 1.
 */
export function charDisplayWidth(codePoint: number): number {
  // Combining diacritics, ZWJ / ZWNJ, variation selectors, skin tone modifiers
  if (codePoint >= 0x0300 && codePoint <= 0x036f) return 0;
  if (codePoint >= 0x200b && codePoint <= 0x200f) return 0;
  if (codePoint >= 0xfe00 && codePoint <= 0xfe0f) return 0;
  if (codePoint >= 0x1f3fb && codePoint <= 0x1f3ff) return 0;
  // Hangul Jamo (initial consonants — always wide in terminals)
  if (codePoint >= 0x1100 && codePoint <= 0x115f) return 2;
  // CJK Radicals, Kangxi Radicals, Ideographic Description, CJK Symbols
  if (codePoint >= 0x2e80 && codePoint <= 0x303e) return 2;
  // Hiragana, Katakana, Bopomofo, Hangul Compatibility Jamo, Kanbun, etc.
  if (codePoint >= 0x3040 && codePoint <= 0x33bf) return 2;
  // CJK Unified Ideographs Extension A
  if (codePoint >= 0x3400 && codePoint <= 0x4dbf) return 2;
  // CJK Unified Ideographs
  if (codePoint >= 0x4e00 && codePoint <= 0x9fff) return 2;
  // Hangul Syllables (가–힣)
  if (codePoint >= 0xac00 && codePoint <= 0xd7af) return 2;
  // CJK Compatibility Ideographs
  if (codePoint >= 0xf900 && codePoint <= 0xfaff) return 2;
  // Vertical / Small / Compatibility Forms
  if (codePoint >= 0xfe10 && codePoint <= 0xfe6f) return 2;
  // Fullwidth Forms (！through ～)
  if (codePoint >= 0xff01 && codePoint <= 0xff60) return 2;
  // Fullwidth currency / symbol variants
  if (codePoint >= 0xffe0 && codePoint <= 0xffe6) return 2;
  // Emoji and pictographs
  if (codePoint >= 0x1f300 && codePoint <= 0x1faff) return 2;
  if (codePoint >= 0x231a && codePoint <= 0x2b55 && isWideEmoji(codePoint)) return 2;
  if (codePoint >= 0x1f004 && codePoint <= 0x1f265 && isWideEmoji(codePoint)) return 2;
  // CJK Unified Ideographs Extension B–F + Supplementary
  if (codePoint >= 0x20000 && codePoint <= 0x2fa1f) return 2;
  return 1;
}

/**
 * Measure the terminal display width of a plain string (no ANSI codes).
 * Iterates by code point so surrogate pairs are handled correctly. A pair of
 * regional indicators is one flag, two columns wide.
 */
export function stringDisplayWidth(str: string): number {
  // Fast path: pure ASCII
  let allAscii = true;
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 0x7f) {
      allAscii = false;
      break;
    }
  }
  if (allAscii) return str.length;

  let width = 0;
  let openFlag = false;
  for (const ch of str) {
    const cp = ch.codePointAt(0);
    if (cp === undefined) continue;
    if (isRegionalIndicator(cp)) {
      openFlag = !openFlag;
      if (!openFlag) continue;
    } else {
      openFlag = false;
    }
    width += charDisplayWidth(cp);
  }
  return width;
}

/** Columns a token occupies on screen */
export function tokenDisplayWidth(token: AnsiToken): number {
  switch (token.kind) {
    case "text":
      return token.isAscii ? token.content.length : stringDisplayWidth(token.content);
    case "complex": {
      // A glyph always takes at least one cell, even a stray combining mark
      const cp = token.content.codePointAt(0);
      return cp === undefined ? 1 : Math.max(1, charDisplayWidth(cp));
    }
    case "escape":
    case "zero-width":
      return 0;
  }
}
