import { tmpdir } from "node:os";
import type { LoadConfigOptions, ResolvedConfig } from "@strainer/core";
import { createLogFile, Logger, loadStrainerConfig, silentLogger } from "@strainer/core";

export interface AppConfig {
  settings: ResolvedConfig;
  logger: Logger;
  /** Config files that contributed, lowest precedence first */
  sources: string[];
}

export interface CliFlags {
  /** --log: overrides every config layer */
  log?: boolean;
}

export async function loadConfig(
  cwd: string = process.cwd(),
  flags: CliFlags = {},
  options: LoadConfigOptions = {},
): Promise<AppConfig> {
  const { config, sources } = await loadStrainerConfig(cwd, options);
  const settings: ResolvedConfig = {
    ...config,
    log: { ...config.log, enabled: flags.log ?? config.log.enabled },
  };

  let logger = silentLogger;
  if (settings.log.enabled) {
    const path = createLogFile(settings.log.dir ?? tmpdir());
    logger = new Logger(path);
    logger.info("logging started", { sources, pollIntervalMs: settings.pollIntervalMs, batchSize: settings.batchSize });
  }

  return { settings, logger, sources };
}
