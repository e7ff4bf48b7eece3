export type { LoadConfigOptions } from "./loader";
export { loadAnsitokConfig, mergeConfig } from "./loader";
export type { AnsitokConfig } from "./schema";
export { AnsitokConfigSchema, DEFAULT_CONFIG, OutputFormat } from "./schema";
