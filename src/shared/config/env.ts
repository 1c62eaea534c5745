/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * engine and its tools read, validates them, and exposes a typed result.
 */

import { z } from 'zod';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Handling of moves that carry only an origin or only a target.
 */
export const PartialMovesSchema = z.enum(['pass', 'reject']);

/**
 * Handling of jumps whose origin square is empty.
 */
export const EmptyOriginJumpsSchema = z.enum(['allow', 'reject']);

/**
 * Board/notation display style names.
 */
export const DisplayStyleNameSchema = z.enum([
  'circles',
  'lowercase_ascii',
  'uppercase_ascii',
  'greek',
]);
export type DisplayStyleName = z.infer<typeof DisplayStyleNameSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the shared logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of a JSON log file */
  LOG_FILE: z.string().min(1).optional(),

  // ===================================================================
  // RULES
  // ===================================================================

  /** Default handling of partial moves for new games */
  QUORUM_PARTIAL_MOVES: PartialMovesSchema.default('pass'),

  /** Default handling of empty-origin jumps for new games */
  QUORUM_EMPTY_ORIGIN_JUMPS: EmptyOriginJumpsSchema.default('allow'),

  // ===================================================================
  // DISPLAY
  // ===================================================================

  /** Display style used by notation and board rendering */
  QUORUM_DISPLAY_STYLE: DisplayStyleNameSchema.default('circles'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * Empty strings are treated as unset so that `LOG_LEVEL=` in a .env file
 * falls back to the default instead of failing validation.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

export const isTest = (env: RawEnv): boolean => env.NODE_ENV === 'test';
