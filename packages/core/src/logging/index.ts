export type { LogEntry, LogLevel } from "./logger";
export { createLogFile, Logger, logFileStem, silentLogger } from "./logger";
