import type { ColorState } from "./types";

const BRIGHT_FOREGROUND = new Set(["90", "91", "92", "93", "94", "95", "96", "97"]);
const BRIGHT_BACKGROUND = new Set(["100", "101", "102", "103", "104", "105", "106", "107"]);

/**
 * Resolve a Select Graphic Rendition parameter string against the active colors.
 *
 * `params` is the parameter text between `ESC [` and the final `m`,
 * e.g. "31;42" or "38;2;0;63;255". Fields apply left to right, so a later
 * field overrides an earlier one. Extended color tags are sliced from
 * `params` verbatim rather than re-serialized.
 *
 * Unrecognized fields are ignored. Note that "1" resets both colors,
 * same as "0", instead of selecting bold.
 */
export function resolveSGR(params: string, colors: ColorState): ColorState {
  if (params.length === 0) {
    return { fg: "", bg: "" };
  }

  let fg = colors.fg;
  let bg = colors.bg;
  let pos = 0;

  // End offset (exclusive) of the field most recently returned by readField
  let fieldEnd = 0;

  const readField = (): string | undefined => {
    if (pos >= params.length) return undefined;
    const start = pos;
    while (pos < params.length && params[pos] !== ";") pos++;
    fieldEnd = pos;
    const field = params.slice(start, pos);
    if (pos < params.length) pos++; // consume ;
    return field;
  };

  /** Returns the verbatim tag for `38;5;n` / `38;2;r;g;b`, or undefined if a field is missing or empty */
  const readExtendedColor = (fieldStart: number): string | undefined => {
    const selector = readField();
    let required: number;
    if (selector === "5") required = 1;
    else if (selector === "2") required = 3;
    else return undefined;

    for (let i = 0; i < required; i++) {
      const value = readField();
      if (value === undefined || value === "") return undefined;
    }
    return params.slice(fieldStart, fieldEnd);
  };

  while (pos < params.length) {
    const fieldStart = pos;
    const field = readField();
    if (field === undefined) break;

    if (field === "0" || field === "1") {
      fg = "";
      bg = "";
    } else if (field === "39") {
      fg = "";
    } else if (field === "49") {
      bg = "";
    } else if (field === "38") {
      fg = readExtendedColor(fieldStart) ?? fg;
    } else if (field === "48") {
      bg = readExtendedColor(fieldStart) ?? bg;
    } else if ((field.length === 2 && field[0] === "3") || BRIGHT_FOREGROUND.has(field)) {
      fg = field;
    } else if ((field.length === 2 && field[0] === "4") || BRIGHT_BACKGROUND.has(field)) {
      bg = field;
    }
  }

  return { fg, bg };
}
