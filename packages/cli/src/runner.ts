import type { AnsiToken } from "@ansitok/core";
import { AnsiTokenizer, parseAnsi, splitLines, stripTokens, tokenDisplayWidth, tokenPrintLength } from "@ansitok/core";
import type { AppConfig } from "./config";
import type { DebugLogger } from "./debug-logger";

export interface InputSource {
  /** File path, or "-" for stdin */
  name: string;
  text: string;
}

export interface Output {
  write(chunk: string): void;
}

/** Tokenizes each input and writes it in the configured format */
export class Runner {
  constructor(
    private config: AppConfig,
    private out: Output,
    private logger?: DebugLogger,
  ) {}

  run(inputs: InputSource[]): number {
    for (const input of inputs) {
      const tokens = this.tokenize(input.text);
      this.logger?.logInput({
        source: input.name,
        length: input.text.length,
        tokenCount: tokens.length,
        printLength: tokens.reduce((sum, token) => sum + tokenPrintLength(token), 0),
        parser: this.config.stream ? "stream" : "batch",
      });
      const rendered = this.render(tokens, input.text.endsWith("\n"));
      if (rendered) this.out.write(rendered);
    }
    return 0;
  }

  tokenize(text: string): AnsiToken[] {
    if (this.config.stream) {
      return [...new AnsiTokenizer(text)];
    }
    return parseAnsi(text, { fastPath: this.config.fastPath });
  }

  render(tokens: AnsiToken[], endsWithNewline: boolean): string {
    switch (this.config.format) {
      case "tokens":
        return tokens.map((token) => formatToken(token) + "\n").join("");
      case "strip":
        return stripTokens(tokens);
      case "length":
        return measureLines(tokens, endsWithNewline, tokenPrintLength);
      case "width":
        return measureLines(tokens, endsWithNewline, tokenDisplayWidth);
    }
  }
}

function formatToken(token: AnsiToken): string {
  return JSON.stringify({ kind: token.kind, content: token.content, fg: token.fg, bg: token.bg });
}

/**
 * One number per line; the empty line after a final newline is not reported.
 * A "\r" that ends a line's text belongs to a CRLF line ending and is not counted.
 */
function measureLines(tokens: AnsiToken[], endsWithNewline: boolean, measure: (token: AnsiToken) => number): string {
  const lines = splitLines(tokens);
  if (endsWithNewline && lines.length > 1 && lines[lines.length - 1].length === 0) {
    lines.pop();
  }
  return lines
    .map((line) => `${line.reduce((sum, token) => sum + measure(token), 0) - carriageReturnWidth(line)}\n`)
    .join("");
}

function carriageReturnWidth(line: AnsiToken[]): number {
  for (let i = line.length - 1; i >= 0; i--) {
    const token = line[i];
    if (token.kind === "escape" || token.kind === "zero-width") continue;
    return token.kind === "text" && token.content.endsWith("\r") ? 1 : 0;
  }
  return 0;
}
