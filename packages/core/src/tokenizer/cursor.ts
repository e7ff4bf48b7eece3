import { classifyAt } from "./classifier";
import { scanCSI } from "./csi";
import { scanOSC } from "./osc";
import { type AnsiToken, type ColorState, EMPTY_COLORS, makeToken } from "./types";

/**
 * Resumable, single-pass tokenizer. Each call to `next()` produces at most one token.
 *
 * Text runs are emitted lazily, when interrupted by an escape code, a BEL or the end
 * of input. Non-ASCII characters are folded into the current text run; use
 * `parseAnsi()` to get one `complex` token per glyph instead.
 *
 * ```ts
 * const tokenizer = new AnsiTokenizer("\x1b[31mred\x1b[39m");
 * while (tokenizer.next()) {
 *   console.log(tokenizer.token);
 * }
 * ```
 */
export class AnsiTokenizer implements Iterable<AnsiToken> {
  private input: string;
  private position = 0;
  private colors: ColorState = EMPTY_COLORS;
  private current: AnsiToken | undefined;
  private done = false;

  constructor(input: string) {
    this.input = input;
  }

  /** The token produced by the last successful `next()` call */
  get token(): AnsiToken | undefined {
    return this.current;
  }

  /** Offset of the first code unit not yet consumed */
  get offset(): number {
    return this.position;
  }

  /** True once the last token has been produced */
  get isDone(): boolean {
    return this.done;
  }

  /** Restart at position 0 with no active colors, optionally over new input */
  reset(input: string = this.input): void {
    this.input = input;
    this.position = 0;
    this.colors = EMPTY_COLORS;
    this.current = undefined;
    this.done = false;
  }

  /** Advance by one token. Returns false once the input is exhausted. */
  next(): boolean {
    if (this.done) return false;

    const str = this.input;
    const runStart = this.position;
    let runAscii = true;

    while (this.position < str.length) {
      const cls = classifyAt(str, this.position);

      if (cls === "plain") {
        this.position++;
        continue;
      }
      if (cls === "multibyte") {
        runAscii = false;
        this.position++;
        continue;
      }

      // Everything else interrupts the text run; flush it first so ordering holds
      if (this.position > runStart) {
        return this.emit(makeToken("text", str.slice(runStart, this.position), this.colors, runAscii));
      }

      if (cls === "zero-width") {
        this.position++;
        return this.emit(makeToken("zero-width", str.slice(runStart, this.position), this.colors));
      }

      const escape = cls === "csi" ? scanCSI(str, this.position, this.colors) : scanOSC(str, this.position, this.colors);
      this.position += escape.content.length;
      this.colors = { fg: escape.fg, bg: escape.bg };
      return this.emit(escape);
    }

    if (this.position > runStart) {
      return this.emit(makeToken("text", str.slice(runStart, this.position), this.colors, runAscii));
    }

    this.done = true;
    return false;
  }

  /** Advance and return the new token, or undefined once exhausted */
  nextToken(): AnsiToken | undefined {
    return this.next() ? this.current : undefined;
  }

  *[Symbol.iterator](): Iterator<AnsiToken> {
    let token = this.nextToken();
    while (token !== undefined) {
      yield token;
      token = this.nextToken();
    }
  }

  private emit(token: AnsiToken): boolean {
    this.current = token;
    this.done = this.position >= this.input.length;
    return true;
  }
}

/** Create a fresh cursor over `input` */
export function createTokenizer(input: string): AnsiTokenizer {
  return new AnsiTokenizer(input);
}
