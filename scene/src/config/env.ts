/**
 * Centralized Environment Configuration
 *
 * This module is the single source of truth for the environment variables
 * the scene package reads. Values are validated with a Zod schema when the
 * module loads.
 *
 * Usage:
 *   import { LOG_LEVEL, isDebugLevel } from '../config/env.js';
 *
 * DO NOT use process.env directly elsewhere in the package.
 */

import { z } from 'zod';

import { ConfigError } from '../errors/sceneErrors.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

const verboseModeSchema = z
  .enum(['off', 'on', 'debug', ''])
  .optional()
  .transform((val) => (val === undefined || val === '' ? 'off' : val));

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;
export type VerboseMode = z.infer<typeof verboseModeSchema>;

/**
 * Environment configuration schema
 */
const envSchema = z.object({
  NODE_ENV: optionalString('development'),

  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------
  VERBOSE_MODE: verboseModeSchema,
  LOG_LEVEL: logLevelSchema.optional(), // Computed below if not set
});

export interface SceneEnv {
  NODE_ENV: string;
  VERBOSE_MODE: VerboseMode;
  LOG_LEVEL: LogLevel;
}

/**
 * Parse and validate an environment record.
 * Throws ConfigError listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): SceneEnv {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Environment validation failed', { issues });
  }

  const parsed = parseResult.data;

  // Compute LOG_LEVEL based on VERBOSE_MODE if not explicitly set
  const logLevel = parsed.LOG_LEVEL ?? (parsed.VERBOSE_MODE === 'debug' ? 'debug' : 'info');

  return {
    NODE_ENV: parsed.NODE_ENV,
    VERBOSE_MODE: parsed.VERBOSE_MODE,
    LOG_LEVEL: logLevel,
  };
}

function loadEnv(): SceneEnv {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Environment validation failed:');
      for (const issue of error.issues) {
        console.error(`  ${issue}`);
      }
    }
    throw error;
  }
}

const parsedEnv = loadEnv();

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const NODE_ENV = parsedEnv.NODE_ENV;
export const VERBOSE_MODE = parsedEnv.VERBOSE_MODE;
export const LOG_LEVEL = parsedEnv.LOG_LEVEL;

/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return VERBOSE_MODE !== 'off';
}

/**
 * Check if debug level logging is enabled
 */
export function isDebugLevel(): boolean {
  return VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug';
}
