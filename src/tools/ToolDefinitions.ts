import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export const LIST_SECTIONS = "list-sections";
export const GET_DOCUMENTATION = "get-documentation";
export const LEPTOS_AUTOFIXER = "leptos-autofixer";

// -----------------------------------------------------------------------------
// Argument schemas
// -----------------------------------------------------------------------------

export const ListSectionsSchema = z.object({}).passthrough();

export const GetDocumentationSchema = z.object({
    section: z.string().describe("Section name or path to retrieve")
});

export function createAutofixerSchema(maxCodeLength: number) {
    return z.object({
        code: z.string()
            .max(maxCodeLength, `code must be at most ${maxCodeLength} characters`)
            .describe("Leptos code to analyze"),
        format: z.enum(["text", "json"]).optional().describe("Report format")
    });
}

// -----------------------------------------------------------------------------
// Tool listing
// -----------------------------------------------------------------------------

export const TOOL_DEFINITIONS: Tool[] = [
    {
        name: LIST_SECTIONS,
        description: "List all available Leptos documentation sections with their use cases",
        inputSchema: {
            type: "object",
            properties: {}
        }
    },
    {
        name: GET_DOCUMENTATION,
        description: "Get Leptos documentation for a specific section. Pass section name like 'signals', 'components', 'routing'",
        inputSchema: {
            type: "object",
            properties: {
                section: { type: "string", description: "Section name or path to retrieve" }
            },
            required: ["section"]
        }
    },
    {
        name: LEPTOS_AUTOFIXER,
        description: "Analyze Leptos code and suggest fixes for common issues: eager signal reads in views, missing move captures, resource fetchers that track signals, uncontrolled inputs, raw HTML injection and more",
        inputSchema: {
            type: "object",
            properties: {
                code: { type: "string", description: "Leptos code to analyze" },
                format: {
                    type: "string",
                    enum: ["text", "json"],
                    description: "Report format: readable text (default) or the JSON report"
                }
            },
            required: ["code"]
        }
    }
];
