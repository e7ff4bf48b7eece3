import { parseArgs } from "node:util";
import { OutputFormat } from "@ansitok/core";
import { version as pkgVersion } from "../package.json";
import { type CliOverrides, loadConfig } from "./config";
import { DebugLogger } from "./debug-logger";
import { readInputs } from "./input";
import { type Output, Runner } from "./runner";

const USAGE = [
  "Usage: ansitok [files...] [options]",
  "",
  "Options:",
  "  -f, --format <tokens|length|width|strip>  output format (default: tokens)",
  "  -s, --stream                              use the incremental tokenizer",
  "      --no-fast-path                        skip the ASCII-only first pass",
  "  -v, --version                             print the version",
  "  -h, --help                                print this help",
].join("\n");

export interface MainIO {
  stdout: Output;
  stderr: Output;
  stdin?: AsyncIterable<string | Buffer>;
  cwd?: string;
  env?: Record<string, string | undefined>;
  /** Directory holding the global ansitok.jsonc */
  globalConfigDir?: string;
}

/** Run the CLI with `argv` (without the node / script entries). Resolves to the exit code. */
export async function main(argv: string[], io: MainIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: "string", short: "f" },
      stream: { type: "boolean", short: "s" },
      "no-fast-path": { type: "boolean" },
      version: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.version) {
    io.stdout.write(`ansitok ${pkgVersion}\n`);
    return 0;
  }
  if (values.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const overrides: CliOverrides = {};
  if (values.format !== undefined) {
    const format = OutputFormat.safeParse(values.format);
    if (!format.success) {
      io.stderr.write(`Error: invalid format "${values.format}". Valid formats: ${OutputFormat.options.join(", ")}\n`);
      return 1;
    }
    overrides.format = format.data;
  }
  if (values.stream) overrides.stream = true;
  if (values["no-fast-path"]) overrides.fastPath = false;

  const config = await loadConfig(io.cwd ?? process.cwd(), overrides, { env: io.env, globalDir: io.globalConfigDir });
  const logger = new DebugLogger(config.debugLog);
  const inputs = await readInputs(positionals, io.stdin);

  return new Runner(config, io.stdout, logger).run(inputs);
}
