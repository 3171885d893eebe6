export {
  ProbesFrom,
  ProbesLive,
} from "./layers.js";
export type { Probes } from "./layers.js";

export {
  prettyLogger,
  renderMessage,
  parseLogLevel,
  normalizeLogLevel,
  LoggerLive,
} from "./logging.js";

export { resolveDetectConfig } from "./config.js";
export type { ArgMap } from "./config.js";
