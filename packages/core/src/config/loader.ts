import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseJsonc, type ParseError, printParseErrorCode } from "jsonc-parser";
import { type AnsitokConfig, AnsitokConfigSchema, DEFAULT_CONFIG, OutputFormat } from "./schema";

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Directory holding the global ansitok.jsonc, defaults to ~/.config/ansitok */
  globalDir?: string;
}

/** Load and merge config from all sources (global < project < env) */
export async function loadAnsitokConfig(
  cwd: string,
  options: LoadConfigOptions = {},
): Promise<{ config: AnsitokConfig; sources: string[] }> {
  const env = options.env ?? process.env;
  const sources: string[] = [];

  // Layer 1: Global config
  const globalPath = join(options.globalDir ?? join(homedir(), ".config", "ansitok"), "ansitok.jsonc");
  const globalConfig = await loadConfigFile(globalPath, env);
  if (globalConfig) sources.push(globalPath);

  // Layer 2: Project config
  const projectPath = join(cwd, "ansitok.jsonc");
  const projectConfig = await loadConfigFile(projectPath, env);
  if (projectConfig) sources.push(projectPath);

  let merged: AnsitokConfig = { ...DEFAULT_CONFIG };
  if (globalConfig) merged = mergeConfig(merged, globalConfig);
  if (projectConfig) merged = mergeConfig(merged, projectConfig);

  // Layer 3: Environment variable overrides
  merged = applyEnvOverrides(merged, env);

  return { config: merged, sources };
}

/** Parse JSONC file, validate with Zod. Returns null when the file is missing or invalid. */
async function loadConfigFile(path: string, env: Record<string, string | undefined>): Promise<AnsitokConfig | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    console.warn(`Config warning: cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    console.warn(`Config warning: ${path}\n${printParseErrorCode(first.error)} at offset ${first.offset}`);
    return null;
  }

  const substituted = substituteTemplates(parsed, env);
  const result = AnsitokConfigSchema.safeParse(substituted);
  if (!result.success) {
    console.warn(`Config warning: ${path}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Shallow merge; undefined values in `override` are ignored */
export function mergeConfig(base: AnsitokConfig, override: AnsitokConfig): AnsitokConfig {
  const merged: AnsitokConfig = { ...base };
  if (override.format !== undefined) merged.format = override.format;
  if (override.fastPath !== undefined) merged.fastPath = override.fastPath;
  if (override.stream !== undefined) merged.stream = override.stream;
  if (override.debugLog !== undefined) merged.debugLog = override.debugLog;
  return merged;
}

/** Environment variable overrides (Layer 3) */
function applyEnvOverrides(config: AnsitokConfig, env: Record<string, string | undefined>): AnsitokConfig {
  const result = { ...config };
  if (env.ANSITOK_FORMAT) {
    const format = OutputFormat.safeParse(env.ANSITOK_FORMAT);
    if (format.success) {
      result.format = format.data;
    } else {
      console.warn(`Config warning: ignoring ANSITOK_FORMAT="${env.ANSITOK_FORMAT}"`);
    }
  }
  if (env.ANSITOK_DEBUG) {
    result.debugLog = env.ANSITOK_DEBUG;
  }
  return result;
}

/** Template substitution: {env:VAR_NAME} → env[VAR_NAME] */
function substituteTemplates(obj: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\{env:([^}]+)\}/g, (_, varName: string) => env[varName] ?? "");
  }
  if (Array.isArray(obj)) return obj.map((item) => substituteTemplates(item, env));
  if (typeof obj === "object" && obj !== null) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = substituteTemplates(v, env);
    }
    return result;
  }
  return obj;
}
