import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseJsonc } from "jsonc-parser";
import { DEFAULT_CONFIG, type ResolvedConfig, type StrainerConfig, StrainerConfigSchema } from "./schema";

export const CONFIG_FILE_NAME = "strainer.jsonc";

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Directory holding the global config; defaults to ~/.config/strainer */
  globalDir?: string;
}

/** Load and merge config from all sources: global < project < env */
export async function loadStrainerConfig(
  cwd: string,
  options: LoadConfigOptions = {},
): Promise<{ config: ResolvedConfig; sources: string[] }> {
  const env = options.env ?? process.env;
  const sources: string[] = [];

  // Layer 1: Global config
  const globalPath = join(options.globalDir ?? join(homedir(), ".config", "strainer"), CONFIG_FILE_NAME);
  const globalConfig = await loadConfigFile(globalPath, env);
  if (globalConfig) sources.push(globalPath);

  // Layer 2: Project config
  const projectPath = join(cwd, CONFIG_FILE_NAME);
  const projectConfig = await loadConfigFile(projectPath, env);
  if (projectConfig) sources.push(projectPath);

  let merged: StrainerConfig = {};
  if (globalConfig) merged = mergeConfig(merged, globalConfig);
  if (projectConfig) merged = mergeConfig(merged, projectConfig);

  // Layer 3: Environment variable overrides
  merged = applyEnvOverrides(merged, env);

  return { config: resolveConfig(merged), sources };
}

/** Parse JSONC file, validate with Zod */
async function loadConfigFile(path: string, env: Record<string, string | undefined>): Promise<StrainerConfig | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch {
    return null;
  }
  const parsed: unknown = parseJsonc(text);
  const substituted = substituteTemplates(parsed, env);
  const result = StrainerConfigSchema.safeParse(substituted);
  if (!result.success) {
    console.warn(`Config warning: ${path}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

/** Shallow merge; the nested `log` object is merged key by key */
export function mergeConfig(base: StrainerConfig, override: StrainerConfig): StrainerConfig {
  const merged: StrainerConfig = { ...base };
  if (override.pollIntervalMs !== undefined) merged.pollIntervalMs = override.pollIntervalMs;
  if (override.batchSize !== undefined) merged.batchSize = override.batchSize;
  if (override.prompt !== undefined) merged.prompt = override.prompt;
  if (override.log !== undefined) merged.log = { ...base.log, ...override.log };
  return merged;
}

export function resolveConfig(config: StrainerConfig): ResolvedConfig {
  return {
    pollIntervalMs: config.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs,
    batchSize: config.batchSize ?? DEFAULT_CONFIG.batchSize,
    prompt: config.prompt ?? DEFAULT_CONFIG.prompt,
    log: {
      enabled: config.log?.enabled ?? DEFAULT_CONFIG.log.enabled,
      dir: config.log?.dir,
    },
  };
}

/** Environment variable overrides; values the schema would reject are ignored */
function applyEnvOverrides(config: StrainerConfig, env: Record<string, string | undefined>): StrainerConfig {
  const overrides: StrainerConfig = {};
  const pollIntervalMs = parseInteger(env.STRAINER_POLL_MS);
  if (pollIntervalMs !== undefined) overrides.pollIntervalMs = pollIntervalMs;
  const batchSize = parseInteger(env.STRAINER_BATCH_SIZE);
  if (batchSize !== undefined) overrides.batchSize = batchSize;

  const log: NonNullable<StrainerConfig["log"]> = {};
  if (env.STRAINER_LOG !== undefined) log.enabled = env.STRAINER_LOG === "1" || env.STRAINER_LOG === "true";
  if (env.STRAINER_LOG_DIR) log.dir = env.STRAINER_LOG_DIR;
  if (log.enabled !== undefined || log.dir !== undefined) overrides.log = log;

  const result = StrainerConfigSchema.safeParse(overrides);
  if (!result.success) {
    console.warn(`Config warning: environment\n${result.error.message}`);
    return config;
  }
  return mergeConfig(config, result.data);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isInteger(n) ? n : undefined;
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
