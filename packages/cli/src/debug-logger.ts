import { appendFileSync, writeFileSync } from "node:fs";

/**
 * Debug logger. Enabled by setting ANSITOK_DEBUG=/path/to/file.jsonl
 * (or `debugLog` in ansitok.jsonc).
 *
 * Records one line per processed input so you can see what the tokenizer
 * produced for it without re-running with `--format tokens`.
 */

export interface InputEntry {
  type: "input";
  seq: number;
  ts: number;
  source: string;
  /** Input length in UTF-16 code units */
  length: number;
  tokenCount: number;
  printLength: number;
  parser: "batch" | "stream";
}

export type DebugEntry = InputEntry;

export class DebugLogger {
  private path: string;
  private seq = 0;
  private enabled: boolean;

  constructor(path: string | undefined) {
    this.path = path ?? "";
    this.enabled = !!path;
    if (this.enabled) {
      // Truncate / create the file at startup
      try {
        writeFileSync(this.path, "");
      } catch (err) {
        console.warn(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}`);
        this.enabled = false;
      }
    }
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  logInput(entry: Omit<InputEntry, "type" | "seq" | "ts">): void {
    if (!this.enabled) return;
    this._write({
      type: "input",
      seq: ++this.seq,
      ts: Date.now(),
      ...entry,
    });
  }

  private _write(entry: DebugEntry): void {
    try {
      appendFileSync(this.path, JSON.stringify(entry) + "\n");
    } catch (err) {
      this.enabled = false;
      console.warn(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
