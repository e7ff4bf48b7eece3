import type { LoadConfigOptions, OutputFormat } from "@ansitok/core";
import { loadAnsitokConfig } from "@ansitok/core";

export interface AppConfig {
  format: OutputFormat;
  fastPath: boolean;
  stream: boolean;
  debugLog?: string;
  sources: string[];
}

/** Command-line flags, applied on top of every config layer */
export interface CliOverrides {
  format?: OutputFormat;
  fastPath?: boolean;
  stream?: boolean;
}

export async function loadConfig(
  cwd: string = process.cwd(),
  overrides: CliOverrides = {},
  options?: LoadConfigOptions,
): Promise<AppConfig> {
  const { config, sources } = await loadAnsitokConfig(cwd, options);

  return {
    format: overrides.format ?? config.format ?? "tokens",
    fastPath: overrides.fastPath ?? config.fastPath ?? true,
    stream: overrides.stream ?? config.stream ?? false,
    debugLog: config.debugLog,
    sources,
  };
}
