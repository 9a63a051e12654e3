export {
  debug,
  info,
  warn,
  error,
  withContext,
  setLogLevel,
  getLogLevel,
  resolveLogLevel,
} from "./logger";
