import { jest } from "@jest/globals";
import { createLogger, isLogLevel, resolveLogLevel } from "../../utils/StructuredLogger.js";

describe("StructuredLogger", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("should resolve the level from the environment", () => {
        expect(resolveLogLevel({})).toBe("info");
        expect(resolveLogLevel({ LEPTOS_MCP_DEBUG: "true" })).toBe("debug");
        expect(resolveLogLevel({ LEPTOS_MCP_LOG_LEVEL: "WARN", LEPTOS_MCP_DEBUG: "true" })).toBe("warn");
        expect(resolveLogLevel({ LEPTOS_MCP_LOG_LEVEL: "verbose" })).toBe("info");
    });

    it("should recognise log levels", () => {
        expect(isLogLevel("error")).toBe(true);
        expect(isLogLevel("trace")).toBe(false);
        expect(isLogLevel("toString")).toBe(false);
    });

    it("should drop entries below the configured level", () => {
        const info = jest.spyOn(console, "info").mockImplementation(() => undefined);
        const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

        const logger = createLogger("Autofixer", "warn");
        logger.info("ignored");
        logger.warn("kept", { findings: 2 });

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatchObject({
            level: "warn",
            component: "Autofixer",
            message: "kept",
            findings: 2
        });
    });

    it("should route errors to console.error", () => {
        const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
        createLogger("cli", "debug").error("boom");
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toMatchObject({ level: "error", component: "cli", message: "boom" });
    });
});
