export type { LoadConfigOptions } from "./loader";
export { CONFIG_FILE_NAME, loadStrainerConfig, mergeConfig, resolveConfig } from "./loader";
export type { ResolvedConfig, StrainerConfig } from "./schema";
export { DEFAULT_CONFIG, StrainerConfigSchema } from "./schema";
