// src/logs/activity-log.ts — Optional persistent activity recorder
// Every tool call, tool result and error can be written here.
// Format: NDJSON — one JSON object per line, easy to tail/grep/parse.
// File: BLOGS_MCP_ACTIVITY_LOG (unset = disabled)

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config/index.js";
import { describeError } from "../errors.js";

// ── Event types ───────────────────────────────────────────────────────────────

export type ActivityEventType =
    | "tool_call"     // a client invoked a tool
    | "tool_result"   // a tool returned
    | "info"
    | "warn"
    | "error";

export interface ActivityEvent {
    type: ActivityEventType;
    /** Source module e.g. "tools", "blogs/feeds" */
    module?: string;
    /** Tool name for tool_call / tool_result events */
    tool?: string;
    /** Log message */
    text?: string;
    /** Tool input arguments */
    args?: unknown;
    /** Wall-clock duration in ms for timed events */
    durationMs?: number;
    /** Whether the tool result was flagged as an error */
    isError?: boolean;
    /** Any extra context — freeform */
    [key: string]: unknown;
}

const createdDirs = new Set<string>();

// ── Core writer ───────────────────────────────────────────────────────────────

/**
 * Append a single activity event to the configured log file.
 * Never throws: a broken log file must not fail a tool call.
 */
export function logActivity(event: ActivityEvent): void {
    const file = getConfig().activityLogPath;
    if (!file) return;

    const line = JSON.stringify({ ts: new Date().toISOString(), ...event }) + "\n";
    try {
        const dir = dirname(file);
        if (!createdDirs.has(dir)) {
            mkdirSync(dir, { recursive: true });
            createdDirs.add(dir);
        }
        appendFileSync(file, line);
    } catch (err) {
        process.stderr.write(`[activity-log] write to ${file} failed: ${describeError(err)}\n`);
    }
}

// ── Convenience helpers ───────────────────────────────────────────────────────

export const activity = {
    toolCall(tool: string, args: unknown) {
        logActivity({ type: "tool_call", tool, args });
    },

    toolResult(tool: string, durationMs: number, isError: boolean, size: number) {
        logActivity({ type: "tool_result", tool, durationMs, isError, size });
    },

    info(module: string, text: string) {
        logActivity({ type: "info", module, text });
    },

    warn(module: string, text: string) {
        logActivity({ type: "warn", module, text });
    },

    error(module: string, text: string, err?: Error) {
        logActivity({ type: "error", module, text, stack: err?.stack });
    },
};
