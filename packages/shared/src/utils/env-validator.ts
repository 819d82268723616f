/**
 * Environment Variable Validator
 *
 * Resolves the environment variables a process needs at startup, applying
 * defaults for optional ones. Missing required variables are a setup
 * mistake, so by default the process exits instead of limping along.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (process won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Validate environment variables against a set of requirements.
 *
 * @param requirements - Variables to resolve
 * @param exitOnError - If true, process.exit(1) on validation failure. Default: true
 * @param env - Where to read variables from. Default: process.env
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  exitOnError = true,
  env: EnvSource = process.env,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(
          `Missing required env var: ${req.name}${req.description ? ` (${req.description})` : ""}`,
        );
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        warnings.push(`${req.name} not set, using default: "${req.default}"`);
      } else {
        warnings.push(
          `Optional env var ${req.name} not set${req.description ? ` (${req.description})` : ""}`,
        );
      }
    } else {
      values[req.name] = value;
    }
  }

  if (warnings.length > 0) {
    logger.debug({ warnings }, "Environment variable warnings");
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
