#!/usr/bin/env node

import { ConfigError, loadServerConfig } from "./config/ServerConfig.js";
import { LeptosMcpServer } from "./server.js";
import { createLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("cli");

async function main(): Promise<void> {
    const config = loadServerConfig();
    const server = new LeptosMcpServer({ config });
    await server.run();
}

main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        logger.error("invalid configuration", { variable: error.variable, error: error.message });
    } else {
        logger.error("server failed to start", { error: error instanceof Error ? error.stack ?? error.message : String(error) });
    }
    process.exit(1);
});
