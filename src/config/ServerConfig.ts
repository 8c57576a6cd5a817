import * as path from "path";
import { z } from "zod";
import type { LogLevel } from "../utils/StructuredLogger.js";
import type { ReportFormat } from "../analysis/DiagnosticFormatter.js";

export const DEFAULT_MAX_CODE_LENGTH = 1_000_000;

/** Packaged docs: `<package>/docs`, two levels above `src/config` and `dist/config`. */
export const DEFAULT_DOCS_DIR = path.resolve(__dirname, "..", "..", "docs");

export interface ServerConfig {
    logLevel: LogLevel;
    docsDir: string;
    autofixFormat: ReportFormat;
    maxCodeLength: number;
    allowStdoutLogs: boolean;
}

const booleanFlag = z.enum(["true", "false"]).optional().transform(value => value === "true");

/**
 * Environment schema. Empty strings count as unset, the same as a variable
 * exported without a value.
 */
const EnvSchema = z.object({
    LEPTOS_MCP_LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(["debug", "info", "warn", "error"])).optional(),
    LEPTOS_MCP_DEBUG: booleanFlag,
    LEPTOS_MCP_DOCS_DIR: z.string().optional(),
    LEPTOS_MCP_AUTOFIX_FORMAT: z.enum(["text", "json"]).default("text"),
    LEPTOS_MCP_MAX_CODE_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MAX_CODE_LENGTH),
    LEPTOS_MCP_ALLOW_STDOUT_LOGS: booleanFlag
});

export class ConfigError extends Error {
    constructor(message: string, public readonly variable: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim().length > 0) {
            values[key] = value.trim();
        }
    }
    return values;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = EnvSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = String(issue?.path[0] ?? "environment");
        throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? "invalid value"}`, variable);
    }

    const values = parsed.data;
    const debug = values.LEPTOS_MCP_DEBUG;
    return {
        logLevel: values.LEPTOS_MCP_LOG_LEVEL ?? (debug ? "debug" : "info"),
        docsDir: values.LEPTOS_MCP_DOCS_DIR ? path.resolve(values.LEPTOS_MCP_DOCS_DIR) : DEFAULT_DOCS_DIR,
        autofixFormat: values.LEPTOS_MCP_AUTOFIX_FORMAT,
        maxCodeLength: values.LEPTOS_MCP_MAX_CODE_LENGTH,
        allowStdoutLogs: values.LEPTOS_MCP_ALLOW_STDOUT_LOGS
    };
}
