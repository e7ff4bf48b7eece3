/**
 * Token kinds produced by the tokenizer.
 *
 * - `text`: a run of plain characters, each one column wide
 * - `escape`: a CSI or OSC escape sequence
 * - `complex`: one printable glyph spanning several code units
 *   (emoji with modifiers, ZWJ sequences, combining marks, CJK)
 * - `zero-width`: a control character that prints nothing (BEL)
 */
export type TokenKind = "text" | "escape" | "complex" | "zero-width";

export interface AnsiToken {
  kind: TokenKind;
  /** Exact slice of the input covered by this token */
  content: string;
  /**
   * Active foreground after this token, as raw SGR text
   * ("31", "38;5;208", "38;2;0;63;255"), or "" when uncolored.
   */
  fg: string;
  /** Active background after this token, same encoding as `fg` */
  bg: string;
  /** Set on text tokens: true when every code unit is below 0x80 */
  isAscii?: boolean;
}

export interface ColorState {
  fg: string;
  bg: string;
}

export const EMPTY_COLORS: ColorState = Object.freeze({ fg: "", bg: "" });

/** Character classes, decided from the current code unit and one of lookahead */
export type CharClass = "csi" | "osc" | "zero-width" | "multibyte" | "plain";

export const ESC = 0x1b;
export const BEL = 0x07;

export function makeToken(
  kind: TokenKind,
  content: string,
  colors: ColorState,
  isAscii?: boolean,
): AnsiToken {
  const token: AnsiToken = { kind, content, fg: colors.fg, bg: colors.bg };
  if (isAscii !== undefined) token.isAscii = isAscii;
  return Object.freeze(token);
}
