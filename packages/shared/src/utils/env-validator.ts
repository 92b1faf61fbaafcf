/**
 * Environment Variable Validator
 *
 * Checks the environment a service starts with against a list of
 * requirements and resolves defaults for the optional ones.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the service refuses to start without it */
  required: boolean;
  /** Value used when an optional variable is unset */
  default?: string;
  /** Shown in error and warning messages */
  description?: string;
  /** Reject values that do not parse as a base-10 integer */
  integer?: boolean;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

/**
 * Validate environment variables against a set of requirements.
 *
 * @param requirements - Variables the service reads
 * @param exitOnError - process.exit(1) on validation failure. Default: true
 * @returns Validation result with resolved values
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  exitOnError = true,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = process.env[req.name];
    const suffix = req.description ? ` (${req.description})` : "";

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(`Missing required env var: ${req.name}${suffix}`);
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        warnings.push(`${req.name} not set, using default: "${req.default}"`);
      } else {
        warnings.push(`Optional env var ${req.name} not set${suffix}`);
      }
      continue;
    }

    if (req.integer && !/^-?\d+$/.test(value)) {
      errors.push(`Env var ${req.name} must be an integer, got "${value}"`);
      continue;
    }

    values[req.name] = value;
  }

  if (warnings.length > 0) {
    logger.warn({ warnings }, "Environment variable warnings");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
    if (exitOnError) {
      process.exit(1);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

/**
 * Read an integer from a validation result, falling back when absent.
 */
export function envInt(
  result: EnvValidationResult,
  name: string,
  fallback: number,
): number {
  const raw = result.values[name];
  return raw === undefined ? fallback : parseInt(raw, 10);
}

// ---------------------------------------------------------------------------
// Ingest service requirements
// ---------------------------------------------------------------------------

export const INGEST_ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "INGEST_PORT", required: false, default: "3009", integer: true, description: "HTTP port" },
  { name: "INGEST_HOST", required: false, default: "0.0.0.0", description: "HTTP bind address" },
  { name: "INGEST_TOPOLOGY_PATH", required: false, default: "config/topology.json", description: "Machine id, filters, shards and replication settings" },
  { name: "SUBMIT_TIMEOUT_MS", required: false, default: "5000", integer: true, description: "Per-submission deadline" },
  { name: "LOG_RETENTION_DAYS", required: false, default: "30", integer: true },
  { name: "INTERNAL_API_KEY", required: false, description: "Shared key checked on every route except /health" },
  { name: "REDIS_URL", required: false, description: "Enables the logs:* intake and shared rate limits" },
  { name: "DATABASE_URL", required: false, description: "Stores shard primaries in PostgreSQL instead of memory" },
];
