// Config
export type { AnsitokConfig, LoadConfigOptions } from "./config/index";
export { AnsitokConfigSchema, DEFAULT_CONFIG, loadAnsitokConfig, mergeConfig, OutputFormat } from "./config/index";
// Measure
export {
  charDisplayWidth,
  displayWidth,
  printLength,
  splitLines,
  stringDisplayWidth,
  stripAnsi,
  stripTokens,
  tokenDisplayWidth,
  tokenPrintLength,
} from "./measure/index";
// Parse
export type { AsciiPassResult, ParseOptions } from "./parse/index";
export { parseAnsi, parseAscii, parseUnicode } from "./parse/index";
// Tokenizer
export type { AnsiToken, CharClass, ColorState, TokenKind } from "./tokenizer/index";
export {
  AnsiTokenizer,
  BEL,
  classifyAt,
  createTokenizer,
  EMPTY_COLORS,
  ESC,
  makeToken,
  resolveSGR,
  scanCSI,
  scanOSC,
} from "./tokenizer/index";
