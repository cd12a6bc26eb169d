export { loadConfig, ConfigValidationError } from "./config";
