export { KeystrokeReader, type KeystrokeReaderOptions } from "./keystroke-reader";
export { ResizeNotifier } from "./resize-notifier";
export { StreamReader, type StreamReaderOptions } from "./stream-reader";
