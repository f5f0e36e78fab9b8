/**
 * Config types — settings interface, defaults and fixed operational constants.
 *
 * Kept apart from the loader so modules can import the types and constants
 * without triggering a config load.
 *
 * @module config/types
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const TRANSPORTS = ['stdio', 'http'] as const;
export type TransportType = typeof TRANSPORTS[number];

export interface BlogsServerConfig {
    /** Minimum level written to stderr */
    logLevel: LogLevel;
    /** How MCP clients reach the server */
    transport: TransportType;
    /** Bind address for the http transport */
    host: string;
    /** Port for the http transport */
    port: number;
    /** User-Agent header sent with every blog and feed request */
    userAgent: string;
    /** NDJSON activity log file. Undefined disables it. */
    activityLogPath?: string;
}

export const DEFAULTS: BlogsServerConfig = {
    logLevel: 'warn',
    transport: 'stdio',
    host: '127.0.0.1',
    port: 3333,
    userAgent:
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
        '(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
};

// ── Fixed constants (not configurable) ─────────────────

/** Timeout for every feed and page request */
export const FETCH_TIMEOUT_MS = 30_000;

/** How many registry categories a multi-feed request fans out over */
export const FAN_OUT_CATEGORIES = 5;

/** Entries read per requested search result, since scoring discards non-matches */
export const SEARCH_OVERFETCH_FACTOR = 2;
