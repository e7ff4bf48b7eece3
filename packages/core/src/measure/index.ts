export { splitLines, stripAnsi, stripTokens } from "./lines";
export { displayWidth, printLength, tokenPrintLength } from "./print-length";
export { charDisplayWidth, stringDisplayWidth, tokenDisplayWidth } from "./string-width";
