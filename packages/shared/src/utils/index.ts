export { createLogger, type Logger } from "./logger.js";
export {
  validateEnvironment,
  type EnvRequirement,
  type EnvSource,
  type EnvValidationResult,
} from "./env-validator.js";
