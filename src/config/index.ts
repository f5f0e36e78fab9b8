/**
 * Config barrel — re-exports config types, constants and the loader.
 *
 * @module config
 */

export type { BlogsServerConfig, LogLevel, TransportType } from './types.js';
export { DEFAULTS, LOG_LEVELS, TRANSPORTS, FETCH_TIMEOUT_MS, FAN_OUT_CATEGORIES, SEARCH_OVERFETCH_FACTOR } from './types.js';
export { loadConfig, getConfig, env, intEnv, resolveLogLevel } from './loader.js';
