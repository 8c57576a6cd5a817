import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { Autofixer } from "./analysis/Autofixer.js";
import { loadServerConfig, type ServerConfig } from "./config/ServerConfig.js";
import {
    DocumentationRegistry,
    renderSection,
    renderSectionList,
    sectionNotFoundMessage
} from "./docs/DocumentationRegistry.js";
import { ErrorEnhancer } from "./errors/ErrorEnhancer.js";
import {
    createAutofixerSchema,
    GET_DOCUMENTATION,
    GetDocumentationSchema,
    LEPTOS_AUTOFIXER,
    LIST_SECTIONS,
    ListSectionsSchema,
    TOOL_DEFINITIONS
} from "./tools/ToolDefinitions.js";
import { textResult, ToolRegistry, type ToolResult } from "./tools/ToolRegistry.js";
import { installStdoutGuard } from "./utils/StdoutGuard.js";
import { createLogger, type Logger } from "./utils/StructuredLogger.js";

export const SERVER_NAME = "leptos-mcp-server";
export const SERVER_VERSION = "0.1.0";

export interface LeptosMcpServerOptions {
    config?: ServerConfig;
    registry?: DocumentationRegistry;
    autofixer?: Autofixer;
    logger?: Logger;
}

/**
 * MCP server over stdio exposing the Leptos documentation and the autofixer.
 */
export class LeptosMcpServer {
    private readonly server: Server;
    private readonly config: ServerConfig;
    private readonly docs: DocumentationRegistry;
    private readonly autofixer: Autofixer;
    private readonly logger: Logger;
    private readonly tools = new ToolRegistry();
    private readonly autofixerSchema: ReturnType<typeof createAutofixerSchema>;
    private restoreConsole?: () => void;
    private shutdownRequested = false;

    constructor(options: LeptosMcpServerOptions = {}) {
        this.config = options.config ?? loadServerConfig();
        this.logger = options.logger ?? createLogger("LeptosMcpServer", this.config.logLevel);
        this.docs = options.registry ?? new DocumentationRegistry(this.config.docsDir);
        this.autofixer = options.autofixer ?? new Autofixer(undefined, createLogger("Autofixer", this.config.logLevel));
        this.autofixerSchema = createAutofixerSchema(this.config.maxCodeLength);

        this.server = new Server({
            name: SERVER_NAME,
            version: SERVER_VERSION
        }, {
            capabilities: { tools: {} }
        });

        this.registerTools();
        this.setupHandlers();
    }

    private registerTools(): void {
        const definition = (name: string): Tool => {
            const tool = TOOL_DEFINITIONS.find(candidate => candidate.name === name);
            if (!tool) throw new Error(`Missing tool definition: ${name}`);
            return tool;
        };
        this.tools.register(definition(LIST_SECTIONS), async (args) => this.listSectionsRaw(args));
        this.tools.register(definition(GET_DOCUMENTATION), async (args) => this.getDocumentationRaw(args));
        this.tools.register(definition(LEPTOS_AUTOFIXER), async (args) => this.autofixRaw(args));
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.listTools()
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            return this.handleCallTool(request.params.name, request.params.arguments);
        });
    }

    public listTools(): Tool[] {
        return this.tools.getDefinitions();
    }

    public async handleCallTool(name: string, args: unknown): Promise<ToolResult> {
        const startedAt = Date.now();
        try {
            return await this.tools.execute(name, args);
        } finally {
            this.logger.debug("tool call finished", { tool: name, durationMs: Date.now() - startedAt });
        }
    }

    private parseArgs<T extends z.ZodTypeAny>(toolName: string, schema: T, args: unknown): z.infer<T> {
        const parsed = schema.safeParse(args ?? {});
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue =>
                issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message);
            const details = ErrorEnhancer.enhanceInvalidArguments(toolName, issues);
            throw new McpError(ErrorCode.InvalidParams, details.nextActionHint, {
                suggestions: details.toolSuggestions
            });
        }
        return parsed.data;
    }

    private listSectionsRaw(args: unknown): ToolResult {
        this.parseArgs(LIST_SECTIONS, ListSectionsSchema, args);
        return textResult(renderSectionList(this.docs.listSections()));
    }

    private getDocumentationRaw(args: unknown): ToolResult {
        const { section } = this.parseArgs(GET_DOCUMENTATION, GetDocumentationSchema, args);
        const found = this.docs.getSection(section);
        if (found) {
            return textResult(renderSection(found));
        }
        const details = ErrorEnhancer.enhanceSectionNotFound(section, this.docs.getSectionPaths());
        this.logger.debug("documentation section not found", { section, similar: details.similarSections });
        const lines = [sectionNotFoundMessage(section)];
        if (details.similarSections && details.similarSections.length > 0) {
            lines.push(details.nextActionHint);
        }
        lines.push(...ErrorEnhancer.formatSuggestions(details.toolSuggestions));
        return textResult(lines.join("\n"));
    }

    private autofixRaw(args: unknown): ToolResult {
        const { code, format } = this.parseArgs(LEPTOS_AUTOFIXER, this.autofixerSchema, args);
        return textResult(this.autofixer.render(code, format ?? this.config.autofixFormat));
    }

    public async run(): Promise<void> {
        this.restoreConsole = installStdoutGuard({
            debug: this.config.logLevel === "debug",
            allowStdoutLogs: this.config.allowStdoutLogs
        });
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.setupShutdownHooks();
        this.logger.info("Leptos MCP server running on stdio", { version: SERVER_VERSION, docsDir: this.config.docsDir });
    }

    private setupShutdownHooks(): void {
        const handle = (reason: string) => {
            if (this.shutdownRequested) return;
            this.shutdownRequested = true;
            this.logger.info("shutdown requested", { reason });
            this.shutdown()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    this.logger.error("shutdown failed", { error: String(error) });
                    process.exit(1);
                });
        };

        process.on("SIGTERM", () => handle("SIGTERM"));
        process.on("SIGINT", () => handle("SIGINT"));
        process.stdin.on("end", () => handle("stdin_end"));
        process.stdin.on("close", () => handle("stdin_close"));
    }

    public async shutdown(): Promise<void> {
        await this.server.close();
        this.restoreConsole?.();
        this.restoreConsole = undefined;
    }
}
