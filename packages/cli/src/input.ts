import { readFile } from "node:fs/promises";
import { InputError } from "./errors";
import type { InputSource } from "./runner";

export async function readStdin(stdin: AsyncIterable<string | Buffer> = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Read every named file in order; no names (or "-") means stdin */
export async function readInputs(
  paths: string[],
  stdin: AsyncIterable<string | Buffer> = process.stdin,
): Promise<InputSource[]> {
  if (paths.length === 0) {
    return [{ name: "-", text: await readStdin(stdin) }];
  }

  const inputs: InputSource[] = [];
  for (const path of paths) {
    if (path === "-") {
      inputs.push({ name: path, text: await readStdin(stdin) });
      continue;
    }
    try {
      inputs.push({ name: path, text: await readFile(path, "utf-8") });
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      throw new InputError(`cannot read ${path}: ${cause?.message ?? String(err)}`, path, cause);
    }
  }
  return inputs;
}
