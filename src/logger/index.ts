export {
  debug,
  info,
  warn,
  error,
  withContext,
  setLogLevel,
  getLogLevel,
  errorMessage,
} from "./logger";
