// src/logs/logger.ts — Module-tagged logger
// All output goes to stderr (stdout carries the stdio MCP protocol) and is mirrored
// to the activity log when one is configured.
// Usage:
//   import { log } from "../logs/logger.js";
//   const logger = log("blogs/feeds");
//   logger.info("Fetching feed", url);     // → [blogs/feeds] Fetching feed https://...
//   logger.error("Failed", err);           // → [blogs/feeds] Failed <message>

import { activity } from "./activity-log.js";
import { getConfig, type LogLevel } from "../config/index.js";

export interface Logger {
    debug: (msg: string, ...args: unknown[]) => void;
    info: (msg: string, ...args: unknown[]) => void;
    warn: (msg: string, ...args: unknown[]) => void;
    error: (msg: string, ...args: unknown[]) => void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[getConfig().logLevel];
}

function render(msg: string, args: unknown[]): string {
    if (!args.length) return msg;
    const parts = args.map(a =>
        a instanceof Error ? a.message : typeof a === "string" ? a : JSON.stringify(a));
    return `${msg} ${parts.join(" ")}`;
}

/**
 * Create a tagged logger for a module.
 * @param module - Short identifier e.g. "server", "tools", "blogs/search"
 */
export function log(module: string): Logger {
    return {
        debug(msg: string, ...args: unknown[]) {
            if (!enabled("debug")) return;
            console.error(`[${module}] ${render(msg, args)}`);
        },
        info(msg: string, ...args: unknown[]) {
            if (!enabled("info")) return;
            const text = render(msg, args);
            console.error(`[${module}] ${text}`);
            activity.info(module, text);
        },
        warn(msg: string, ...args: unknown[]) {
            if (!enabled("warn")) return;
            const text = render(msg, args);
            console.error(`[${module}] ${text}`);
            activity.warn(module, text);
        },
        error(msg: string, ...args: unknown[]) {
            if (!enabled("error")) return;
            const text = render(msg, args);
            console.error(`[${module}] ${text}`);
            // Pull full stack from first Error argument if present
            const err = args.find((a): a is Error => a instanceof Error);
            activity.error(module, text, err);
        },
    };
}
