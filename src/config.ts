/**
 * Centralized Configuration Module
 *
 * Loads the application settings from environment variables and validates
 * them with a Zod schema. Invalid values are collected and reported
 * together in a single {@link ConfigValidationError}.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig();
 *   console.log(config.storage.dataPath);
 *
 * @module config
 */

import { z } from 'zod';
import { parseIsoDate } from './core/dates';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for the resolved configuration.
 */
const configSchema = z.object({
  app: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    debug: z.boolean().default(false),
  }),

  storage: z.object({
    dataPath: z.string().min(1).default('./data/program.json'),
    autoSave: z.boolean().default(true),
  }),

  dashboard: z.object({
    referenceDate: z.date().nullable().default(null),
    criticalHorizonDays: z.number().int().nonnegative().default(60),
    displayCriticalLimit: z.number().int().positive().max(10).default(8),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variables the configuration reads.
 */
export type ConfigEnv = Record<string, string | undefined>;

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with the offending variables.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

// =============================================================================
// Environment Variable Loading
// =============================================================================

type Invalid = { name: string; reason: string };

/**
 * Parse an integer variable, recording a problem when it is set but not an integer.
 */
function parseIntVar(env: ConfigEnv, name: string, invalid: Invalid[]): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    invalid.push({ name, reason: `expected an integer, got "${value}"` });
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Parse a boolean variable. Accepts 1/0, true/false, yes/no, on/off.
 */
function parseBoolVar(env: ConfigEnv, name: string, invalid: Invalid[]): boolean | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  invalid.push({ name, reason: `expected a boolean, got "${value}"` });
  return undefined;
}

/**
 * Parse a `YYYY-MM-DD` variable.
 */
function parseDateVar(env: ConfigEnv, name: string, invalid: Invalid[]): Date | null {
  const value = env[name];
  if (value === undefined || value.trim() === '') return null;
  const parsed = parseIsoDate(value.trim());
  if (parsed === null) {
    invalid.push({ name, reason: `expected a date as YYYY-MM-DD, got "${value}"` });
  }
  return parsed;
}

/**
 * Load raw configuration values from environment variables.
 */
function loadFromEnvironment(env: ConfigEnv, invalid: Invalid[]): z.input<typeof configSchema> {
  const nodeEnv = env.NODE_ENV ?? 'development';
  if (!['development', 'production', 'test'].includes(nodeEnv)) {
    invalid.push({ name: 'NODE_ENV', reason: `unknown environment "${nodeEnv}"` });
  }

  return {
    app: {
      nodeEnv: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
      debug: parseBoolVar(env, 'DEBUG', invalid),
    },
    storage: {
      dataPath: env.STUDY_DATA_PATH?.trim() || undefined,
      autoSave: parseBoolVar(env, 'STUDY_AUTO_SAVE', invalid),
    },
    dashboard: {
      referenceDate: parseDateVar(env, 'STUDY_REFERENCE_DATE', invalid),
      criticalHorizonDays: parseIntVar(env, 'STUDY_CRITICAL_HORIZON_DAYS', invalid),
      displayCriticalLimit: parseIntVar(env, 'STUDY_DISPLAY_CRITICAL_LIMIT', invalid),
    },
  };
}

/** Maps schema paths back to the variables that feed them. */
const VARIABLE_FOR_PATH: Record<string, string> = {
  'storage.dataPath': 'STUDY_DATA_PATH',
  'dashboard.criticalHorizonDays': 'STUDY_CRITICAL_HORIZON_DAYS',
  'dashboard.displayCriticalLimit': 'STUDY_DISPLAY_CRITICAL_LIMIT',
};

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * Loads and validates the configuration.
 *
 * @param env - Variables to read; defaults to `process.env`
 * @throws {ConfigValidationError} If any variable is malformed or out of range
 *
 * @example
 * ```typescript
 * try {
 *   const config = loadConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Invalid vars:', error.invalidVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function loadConfig(env: ConfigEnv = process.env): Config {
  const invalidVars: Invalid[] = [];
  const raw = loadFromEnvironment(env, invalidVars);
  const parseResult = configSchema.safeParse(raw);

  if (!parseResult.success) {
    for (const issue of parseResult.error.issues) {
      const path = issue.path.join('.');
      invalidVars.push({ name: VARIABLE_FOR_PATH[path] ?? path, reason: issue.message });
    }
  }

  if (invalidVars.length > 0 || !parseResult.success) {
    const descriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${descriptions}`, invalidVars);
  }

  return parseResult.data;
}
