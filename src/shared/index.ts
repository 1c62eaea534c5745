export * from './engine';
export * from './errors';
export { replayGame } from './replay/replayGame';
export type { ReplayFailure, ReplayOptions, ReplayResult } from './replay/replayGame';
export { config, loadConfig } from './config';
export type { AppConfig } from './config';
export { createLogger, logger } from './utils/logger';
