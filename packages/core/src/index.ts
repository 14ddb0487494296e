// Config
export type { LoadConfigOptions, ResolvedConfig, StrainerConfig } from "./config/index";
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadStrainerConfig,
  mergeConfig,
  resolveConfig,
  StrainerConfigSchema,
} from "./config/index";
// Errors
export { BufferSealedError, BusClosedError, InterruptError, UsageError } from "./errors";
// Event bus
export { EventBus } from "./event-bus";
// Events
export type { KeyEvent, LineEvent, PagerEvent, ResizeEvent } from "./events";
export { endOfInput, keyEvent, lineEvent, resizeEvent } from "./events";
// Filter
export { BACKSPACE, FilterState, filterEntries, QUIT_COMMAND } from "./filter";
// Line buffer
export type { LineEntry } from "./line-buffer";
export { END_MARKER_TEXT, LineBuffer } from "./line-buffer";
// Logging
export type { LogEntry, LogLevel } from "./logging/index";
export { createLogFile, Logger, logFileStem, silentLogger } from "./logging/index";
