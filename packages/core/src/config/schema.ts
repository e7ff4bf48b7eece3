import { z } from "zod";

export const OutputFormat = z
  .enum(["tokens", "length", "width", "strip"])
  .describe("What the CLI writes for each input: tokens as JSON lines, per-line lengths or widths, or stripped text");

export const AnsitokConfigSchema = z
  .object({
    $schema: z.string().optional(),

    format: OutputFormat.optional(),

    // Parser behavior
    fastPath: z.boolean().optional(),
    stream: z.boolean().optional(),

    // JSONL debug log, same as ANSITOK_DEBUG
    debugLog: z.string().optional(),
  })
  .strict();

export type AnsitokConfig = z.infer<typeof AnsitokConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormat>;

export const DEFAULT_CONFIG: AnsitokConfig = {
  format: "tokens",
  fastPath: true,
  stream: false,
};
