import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";

export type ToolResult = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

interface RegisteredTool {
    definition: Tool;
    handler: ToolHandler;
}

export function textResult(text: string): ToolResult {
    return { content: [{ type: "text", text }] };
}

/**
 * Tool definitions and their handlers, in registration order.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();

    public register(definition: Tool, handler: ToolHandler): void {
        if (this.tools.has(definition.name)) {
            throw new Error(`Tool already registered: ${definition.name}`);
        }
        this.tools.set(definition.name, { definition, handler });
    }

    /**
     * Runs a tool by name. Unknown names are a protocol error.
     */
    public async execute(name: string, args: unknown): Promise<ToolResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            const details = ErrorEnhancer.enhanceUnknownTool(name, this.getRegisteredTools());
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}. ${details.nextActionHint}`, {
                suggestions: details.toolSuggestions
            });
        }
        return tool.handler(args);
    }

    public getDefinitions(): Tool[] {
        return Array.from(this.tools.values(), tool => tool.definition);
    }

    public getRegisteredTools(): string[] {
        return Array.from(this.tools.keys());
    }
}
