import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { loadConfig } from "../src/config";

const TEST_ROOT = join(tmpdir(), `ansitok-cli-config-test-${process.pid}-${Date.now()}`);
const GLOBAL = join(TEST_ROOT, "global");

afterEach(async () => {
  await rm(TEST_ROOT, { recursive: true, force: true });
});

describe("loadConfig", () => {
  test("uses defaults when nothing is configured", async () => {
    const dir = join(TEST_ROOT, "defaults");
    await mkdir(dir, { recursive: true });

    const config = await loadConfig(dir, {}, { env: {}, globalDir: GLOBAL });
    expect(config.format).toBe("tokens");
    expect(config.fastPath).toBe(true);
    expect(config.stream).toBe(false);
    expect(config.debugLog).toBeUndefined();
    expect(config.sources).toEqual([]);
  });

  test("reads the project ansitok.jsonc", async () => {
    const dir = join(TEST_ROOT, "project");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "ansitok.jsonc"), `{ "format": "width", "stream": true }`);

    const config = await loadConfig(dir, {}, { env: {}, globalDir: GLOBAL });
    expect(config.format).toBe("width");
    expect(config.stream).toBe(true);
    expect(config.sources).toEqual([join(dir, "ansitok.jsonc")]);
  });

  test("CLI overrides win over files and env", async () => {
    const dir = join(TEST_ROOT, "overrides");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "ansitok.jsonc"), `{ "format": "width", "fastPath": true }`);

    const config = await loadConfig(
      dir,
      { format: "strip", fastPath: false },
      { env: { ANSITOK_FORMAT: "length" }, globalDir: GLOBAL },
    );
    expect(config.format).toBe("strip");
    expect(config.fastPath).toBe(false);
  });

  test("ANSITOK_FORMAT applies when no flag is given", async () => {
    const dir = join(TEST_ROOT, "env-format");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "ansitok.jsonc"), `{ "format": "width" }`);

    const config = await loadConfig(dir, {}, { env: { ANSITOK_FORMAT: "length" }, globalDir: GLOBAL });
    expect(config.format).toBe("length");
  });

  test("debug log path comes from ANSITOK_DEBUG", async () => {
    const dir = join(TEST_ROOT, "debug");
    await mkdir(dir, { recursive: true });

    const config = await loadConfig(dir, {}, { env: { ANSITOK_DEBUG: "/tmp/ansitok-test.jsonl" }, globalDir: GLOBAL });
    expect(config.debugLog).toBe("/tmp/ansitok-test.jsonl");
  });
});
