/**
 * Config loader — .env file + environment variables over built-in defaults.
 *
 * Singleton pattern: loads once and caches. Call `loadConfig(true)` to force reload.
 *
 * Resolution order:
 *   1. Environment variables (a .env file in cwd is loaded into them first)
 *   2. Built-in defaults
 *
 * @module config/loader
 */

import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import type { BlogsServerConfig, LogLevel, TransportType } from './types.js';
import { DEFAULTS, LOG_LEVELS, TRANSPORTS } from './types.js';

let _config: BlogsServerConfig | null = null;
let _envLoaded = false;

/** Read a trimmed env var; empty counts as unset. */
export function env(key: string): string | undefined {
    const val = process.env[key];
    return val && val.trim() !== '' ? val.trim() : undefined;
}

/** Read an env var as an integer; returns undefined if not set or NaN. */
export function intEnv(key: string): number | undefined {
    const v = env(key);
    if (v === undefined) return undefined;
    const n = parseInt(v, 10);
    return isNaN(n) ? undefined : n;
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

function isTransport(value: string): value is TransportType {
    return (TRANSPORTS as readonly string[]).includes(value);
}

/** Accepts the usual aliases ("warning", "WARN", "fatal") on top of the canonical names. */
export function resolveLogLevel(raw: string | undefined): LogLevel | undefined {
    if (!raw) return undefined;
    const value = raw.toLowerCase();
    if (value === 'warning') return 'warn';
    if (value === 'critical' || value === 'fatal') return 'error';
    if (value === 'trace') return 'debug';
    return isLogLevel(value) ? value : undefined;
}

/**
 * Load the server config. Reads the environment once and caches.
 * Call with `force: true` to re-read it (tests do this after changing process.env).
 */
export function loadConfig(force = false): BlogsServerConfig {
    if (_config && !force) return _config;

    if (!_envLoaded) {
        loadEnv({ path: resolve(process.cwd(), '.env') });
        _envLoaded = true;
    }

    const rawLevel = env('BLOGS_MCP_LOG_LEVEL');
    const logLevel = resolveLogLevel(rawLevel);
    if (rawLevel && !logLevel) {
        console.warn(`[config] Unknown BLOGS_MCP_LOG_LEVEL "${rawLevel}", using "${DEFAULTS.logLevel}"`);
    }

    const rawTransport = env('BLOGS_MCP_TRANSPORT')?.toLowerCase();
    const transport = rawTransport && isTransport(rawTransport) ? rawTransport : undefined;
    if (rawTransport && !transport) {
        console.warn(`[config] Unknown BLOGS_MCP_TRANSPORT "${rawTransport}", using "${DEFAULTS.transport}"`);
    }

    const port = intEnv('BLOGS_MCP_PORT');
    if (env('BLOGS_MCP_PORT') && (port === undefined || port <= 0 || port > 65535)) {
        console.warn(`[config] Invalid BLOGS_MCP_PORT "${env('BLOGS_MCP_PORT')}", using ${DEFAULTS.port}`);
    }

    const config: BlogsServerConfig = {
        logLevel: logLevel ?? DEFAULTS.logLevel,
        transport: transport ?? DEFAULTS.transport,
        host: env('BLOGS_MCP_HOST') ?? DEFAULTS.host,
        port: port !== undefined && port > 0 && port <= 65535 ? port : DEFAULTS.port,
        userAgent: env('BLOGS_MCP_USER_AGENT') ?? DEFAULTS.userAgent,
        activityLogPath: env('BLOGS_MCP_ACTIVITY_LOG'),
    };

    _config = config;
    return config;
}

/** Get the cached config (loads on first call if not yet loaded). */
export function getConfig(): BlogsServerConfig {
    if (!_config) return loadConfig();
    return _config;
}
