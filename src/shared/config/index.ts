/**
 * Configuration Module - Canonical Entry Point
 *
 * Parses environment variables with the Zod schema from `env.ts` and
 * exports a frozen, typed config object. All engine and tooling code reads
 * settings from here:
 *
 *   import { config } from '../config';
 */

import dotenv from 'dotenv';

import { ConfigurationError } from '../errors/GameDomainErrors';
import type { EmptyOriginJumpHandling, PartialMoveHandling } from '../types/game';
import { isJestRuntime, isTestEnvironment } from '../utils/envFlags';
import {
  parseEnv,
  isTest,
  type DisplayStyleName,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
} from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  rules: {
    partialMoves: PartialMoveHandling;
    emptyOriginJumps: EmptyOriginJumpHandling;
  };
  display: {
    style: DisplayStyleName;
  };
}

/**
 * Build a config object from an environment map. Throws ConfigurationError
 * listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const result = parseEnv(env);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid environment configuration: ${result.errors
        .map((e) => `${e.path || 'root'}: ${e.message}`)
        .join('; ')}`,
      { errors: result.errors }
    );
  }

  const raw = result.data;
  return Object.freeze({
    nodeEnv: raw.NODE_ENV,
    isTest: isTest(raw),
    logging: Object.freeze({
      level: raw.LOG_LEVEL,
      format: raw.LOG_FORMAT,
      file: raw.LOG_FILE,
    }),
    rules: Object.freeze({
      partialMoves: raw.QUORUM_PARTIAL_MOVES,
      emptyOriginJumps: raw.QUORUM_EMPTY_ORIGIN_JUMPS,
    }),
    display: Object.freeze({
      style: raw.QUORUM_DISPLAY_STYLE,
    }),
  });
}

// Load .env into process.env before reading anything from it. Skipped under
// test so a developer's .env cannot leak into test expectations.
if (!isTestEnvironment() && !isJestRuntime()) {
  dotenv.config();
}

export const config: Readonly<AppConfig> = loadConfig();

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  PartialMovesSchema,
  EmptyOriginJumpsSchema,
  DisplayStyleNameSchema,
  parseEnv,
} from './env';

export type {
  RawEnv,
  EnvValidationResult,
  NodeEnv,
  LogLevel,
  LogFormat,
  DisplayStyleName,
} from './env';
