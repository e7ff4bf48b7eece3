export { classifyAt } from "./classifier";
export { scanCSI } from "./csi";
export { AnsiTokenizer, createTokenizer } from "./cursor";
export { scanOSC } from "./osc";
export { resolveSGR } from "./sgr";
export type { AnsiToken, CharClass, ColorState, TokenKind } from "./types";
export { BEL, EMPTY_COLORS, ESC, makeToken } from "./types";
