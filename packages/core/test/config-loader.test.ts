import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadAnsitokConfig, mergeConfig } from "../src/config/loader";
import type { AnsitokConfig } from "../src/config/schema";

const TEST_ROOT = join(tmpdir(), `ansitok-config-test-${process.pid}-${Date.now()}`);
const PROJECT = join(TEST_ROOT, "project");
const GLOBAL = join(TEST_ROOT, "global");

async function setup(project?: string, global?: string) {
  await mkdir(PROJECT, { recursive: true });
  await mkdir(GLOBAL, { recursive: true });
  if (project !== undefined) await writeFile(join(PROJECT, "ansitok.jsonc"), project);
  if (global !== undefined) await writeFile(join(GLOBAL, "ansitok.jsonc"), global);
}

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(TEST_ROOT, { recursive: true, force: true });
});

describe("mergeConfig", () => {
  it("override replaces scalar values", () => {
    const base: AnsitokConfig = { format: "tokens", fastPath: true };
    const override: AnsitokConfig = { format: "strip" };
    expect(mergeConfig(base, override)).toEqual({ format: "strip", fastPath: true });
  });

  it("undefined values in override are ignored", () => {
    const base: AnsitokConfig = { stream: true };
    const override: AnsitokConfig = { stream: undefined };
    expect(mergeConfig(base, override).stream).toBe(true);
  });

  it("false overrides true", () => {
    expect(mergeConfig({ fastPath: true }, { fastPath: false }).fastPath).toBe(false);
  });
});

describe("loadAnsitokConfig", () => {
  it("returns default config when no files exist", async () => {
    await setup();
    const { config, sources } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(config).toEqual({ format: "tokens", fastPath: true, stream: false });
    expect(sources).toEqual([]);
  });

  it("loads project config with JSONC comments", async () => {
    await setup(`{
      // per-line widths for this repo
      "format": "width",
      "stream": true,
    }`);

    const { config, sources } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(config.format).toBe("width");
    expect(config.stream).toBe(true);
    expect(sources).toEqual([join(PROJECT, "ansitok.jsonc")]);
  });

  it("project config overrides global config", async () => {
    await setup(`{ "format": "length" }`, `{ "format": "strip", "fastPath": false }`);

    const { config, sources } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(config.format).toBe("length");
    expect(config.fastPath).toBe(false);
    expect(sources).toEqual([join(GLOBAL, "ansitok.jsonc"), join(PROJECT, "ansitok.jsonc")]);
  });

  it("env ANSITOK_FORMAT overrides project config", async () => {
    await setup(`{ "format": "length" }`);
    const { config } = await loadAnsitokConfig(PROJECT, { env: { ANSITOK_FORMAT: "strip" }, globalDir: GLOBAL });
    expect(config.format).toBe("strip");
  });

  it("invalid ANSITOK_FORMAT warns and is ignored", async () => {
    await setup();
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { config } = await loadAnsitokConfig(PROJECT, { env: { ANSITOK_FORMAT: "html" }, globalDir: GLOBAL });
    expect(config.format).toBe("tokens");
    expect(warn).toHaveBeenCalledWith('Config warning: ignoring ANSITOK_FORMAT="html"');
  });

  it("env ANSITOK_DEBUG sets debugLog", async () => {
    await setup();
    const { config } = await loadAnsitokConfig(PROJECT, { env: { ANSITOK_DEBUG: "/tmp/x.jsonl" }, globalDir: GLOBAL });
    expect(config.debugLog).toBe("/tmp/x.jsonl");
  });

  it("template substitution replaces {env:VAR}", async () => {
    await setup(`{ "debugLog": "{env:LOG_DIR}/ansitok.jsonl" }`);
    const { config } = await loadAnsitokConfig(PROJECT, { env: { LOG_DIR: "/var/log" }, globalDir: GLOBAL });
    expect(config.debugLog).toBe("/var/log/ansitok.jsonl");
  });

  it("template substitution with missing env var yields empty string", async () => {
    await setup(`{ "debugLog": "prefix-{env:MISSING}-suffix" }`);
    const { config } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(config.debugLog).toBe("prefix--suffix");
  });

  it("invalid config file warns and is skipped", async () => {
    await setup(`{ "unknownKey": true }`);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const { config, sources } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(sources).toEqual([]);
    expect(config.format).toBe("tokens");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("malformed JSONC warns and is skipped", async () => {
    await setup(`{ "format": `);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const { sources } = await loadAnsitokConfig(PROJECT, { env: {}, globalDir: GLOBAL });
    expect(sources).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
