import util from "util";
import { resolveLogLevel } from "./StructuredLogger.js";

export interface StdoutGuardOptions {
    /** Keep console.debug output */
    debug: boolean;
    /** Leave the console untouched */
    allowStdoutLogs: boolean;
}

export function stdoutGuardOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): StdoutGuardOptions {
    return {
        debug: resolveLogLevel(env) === "debug",
        allowStdoutLogs: env.LEPTOS_MCP_ALLOW_STDOUT_LOGS === "true"
    };
}

/**
 * Stdout belongs to the JSON-RPC stream. Routes console.log/info/debug to
 * stderr so stray log lines cannot corrupt protocol frames.
 * Returns a function that restores the original console methods.
 */
export function installStdoutGuard(options: StdoutGuardOptions = stdoutGuardOptionsFromEnv()): () => void {
    if (options.allowStdoutLogs) {
        return () => undefined;
    }
    const debugEnabled = options.debug;
    const original = {
        log: console.log,
        info: console.info,
        debug: console.debug
    };

    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && !debugEnabled) {
            return;
        }
        process.stderr.write(util.format(...args) + "\n");
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");

    return () => {
        console.log = original.log;
        console.info = original.info;
        console.debug = original.debug;
    };
}
