export { createLogger } from "./logger.js";
export {
  validateEnvironment,
  envInt,
  type EnvRequirement,
  type EnvValidationResult,
  INGEST_ENV_REQUIREMENTS,
} from "./env-validator.js";
