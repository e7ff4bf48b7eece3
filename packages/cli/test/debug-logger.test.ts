import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DebugLogger } from "../src/debug-logger";

const TEST_ROOT = join(tmpdir(), `ansitok-debug-log-test-${process.pid}-${Date.now()}`);

beforeEach(async () => {
  await mkdir(TEST_ROOT, { recursive: true });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(TEST_ROOT, { recursive: true, force: true });
});

const ENTRY = { source: "a.log", length: 12, tokenCount: 3, printLength: 3, parser: "batch" as const };

describe("DebugLogger", () => {
  test("disabled without a path", () => {
    const logger = new DebugLogger(undefined);
    expect(logger.isEnabled).toBe(false);
    logger.logInput(ENTRY);
  });

  test("truncates the file at startup and appends JSON lines", async () => {
    const path = join(TEST_ROOT, "debug.jsonl");
    await writeFile(path, "stale\n");

    const logger = new DebugLogger(path);
    expect(logger.isEnabled).toBe(true);
    logger.logInput(ENTRY);
    logger.logInput({ ...ENTRY, source: "b.log" });

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);

    const first = JSON.parse(lines[0]);
    expect(first).toMatchObject({ type: "input", seq: 1, source: "a.log", tokenCount: 3, parser: "batch" });
    expect(typeof first.ts).toBe("number");
    expect(JSON.parse(lines[1])).toMatchObject({ seq: 2, source: "b.log" });
  });

  test("unwritable path disables the log with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new DebugLogger(join(TEST_ROOT, "missing-dir", "debug.jsonl"));

    expect(logger.isEnabled).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
