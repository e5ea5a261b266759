export {
  RngLive,
  RngFrom,
  ModelStoreFrom,
} from "./layers.js";

export {
  prettyLogger,
  PrettyLoggerLive,
  withSpan,
  parseLogLevel,
  setMinimumLogLevel,
  getMinimumLogLevel,
  logSync,
  type SyncLogLevel,
} from "./logging.js";
