import { afterEach, describe, it, expect, vi } from "vitest";
import { DEFAULTS, loadConfig, resolveLogLevel } from "../src/config/index.js";

afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    loadConfig(true);
});

describe("loadConfig", () => {
    it("uses defaults when nothing is set", () => {
        for (const key of ["LOG_LEVEL", "TRANSPORT", "HOST", "PORT", "USER_AGENT", "ACTIVITY_LOG"]) {
            vi.stubEnv(`BLOGS_MCP_${key}`, "");
        }
        expect(loadConfig(true)).toEqual({ ...DEFAULTS, activityLogPath: undefined });
    });

    it("reads every setting from the environment", () => {
        vi.stubEnv("BLOGS_MCP_LOG_LEVEL", "INFO");
        vi.stubEnv("BLOGS_MCP_TRANSPORT", "http");
        vi.stubEnv("BLOGS_MCP_HOST", "0.0.0.0");
        vi.stubEnv("BLOGS_MCP_PORT", "8080");
        vi.stubEnv("BLOGS_MCP_USER_AGENT", "test-agent/1.0");
        vi.stubEnv("BLOGS_MCP_ACTIVITY_LOG", "/tmp/blogs-activity.ndjson");

        expect(loadConfig(true)).toEqual({
            logLevel: "info",
            transport: "http",
            host: "0.0.0.0",
            port: 8080,
            userAgent: "test-agent/1.0",
            activityLogPath: "/tmp/blogs-activity.ndjson",
        });
    });

    it("warns about and ignores invalid values", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        vi.stubEnv("BLOGS_MCP_LOG_LEVEL", "loud");
        vi.stubEnv("BLOGS_MCP_TRANSPORT", "carrier-pigeon");
        vi.stubEnv("BLOGS_MCP_PORT", "70000");

        const config = loadConfig(true);

        expect(config.logLevel).toBe(DEFAULTS.logLevel);
        expect(config.transport).toBe(DEFAULTS.transport);
        expect(config.port).toBe(DEFAULTS.port);
        expect(warn).toHaveBeenCalledTimes(3);
        expect(warn).toHaveBeenCalledWith('[config] Unknown BLOGS_MCP_LOG_LEVEL "loud", using "warn"');
    });

    it("caches until forced", () => {
        vi.stubEnv("BLOGS_MCP_HOST", "first.local");
        const first = loadConfig(true);
        vi.stubEnv("BLOGS_MCP_HOST", "second.local");

        expect(loadConfig()).toBe(first);
        expect(loadConfig(true).host).toBe("second.local");
    });
});

describe("resolveLogLevel", () => {
    it("accepts canonical names and common aliases", () => {
        expect(resolveLogLevel("debug")).toBe("debug");
        expect(resolveLogLevel("WARNING")).toBe("warn");
        expect(resolveLogLevel("critical")).toBe("error");
        expect(resolveLogLevel("fatal")).toBe("error");
        expect(resolveLogLevel("trace")).toBe("debug");
        expect(resolveLogLevel("verbose")).toBeUndefined();
        expect(resolveLogLevel(undefined)).toBeUndefined();
    });
});
