export interface ToolSuggestion {
    toolName: string;
    rationale: string;
    exampleArgs?: Record<string, unknown>;
    priority?: "high" | "medium" | "low";
}

export interface EnhancedErrorDetails {
    similarSections?: string[];
    nextActionHint: string;
    toolSuggestions: ToolSuggestion[];
}

/** Characters of the query that also occur in the candidate, counted once each. */
function sharedCharacters(query: string, candidate: string): number {
    const pool = new Set(candidate.toLowerCase());
    let score = 0;
    for (const char of new Set(query.toLowerCase())) {
        if (/\w/.test(char) && pool.has(char)) score++;
    }
    return score;
}

export class ErrorEnhancer {
    /**
     * Enhance "Section not found" errors with the closest section paths
     */
    static enhanceSectionNotFound(query: string, availablePaths: readonly string[], limit = 3): EnhancedErrorDetails {
        const similar = availablePaths
            .map((sectionPath, index) => ({ sectionPath, index, score: sharedCharacters(query, sectionPath) }))
            .filter(entry => entry.score > 0)
            .sort((a, b) => b.score - a.score || a.index - b.index)
            .slice(0, limit)
            .map(entry => entry.sectionPath);

        const suggestions: ToolSuggestion[] = [
            {
                toolName: "list-sections",
                rationale: "List every documentation section with its path and use cases.",
                priority: "high"
            }
        ];
        if (similar.length > 0) {
            suggestions.push({
                toolName: "get-documentation",
                rationale: "Retry with the closest matching section path.",
                exampleArgs: { section: similar[0] },
                priority: "medium"
            });
        }

        return {
            similarSections: similar,
            nextActionHint: similar.length > 0
                ? `Did you mean: ${similar.join(", ")}?`
                : "Use list-sections to see available sections.",
            toolSuggestions: suggestions
        };
    }

    static enhanceUnknownTool(name: string, knownTools: readonly string[]): EnhancedErrorDetails {
        return {
            nextActionHint: `Tool '${name}' does not exist. Available tools: ${knownTools.join(", ")}.`,
            toolSuggestions: knownTools.map(toolName => ({
                toolName,
                rationale: "Registered tool.",
                priority: "low"
            }))
        };
    }

    /**
     * Enhance argument validation failures
     */
    static enhanceInvalidArguments(toolName: string, issues: readonly string[]): EnhancedErrorDetails {
        const exampleArgs: Record<string, Record<string, unknown>> = {
            "get-documentation": { section: "signals" },
            "leptos-autofixer": { code: "#[component]\nfn App() -> impl IntoView { view! { <p>\"hi\"</p> } }" },
            "list-sections": {}
        };
        return {
            nextActionHint: `Fix the arguments for '${toolName}': ${issues.join("; ")}`,
            toolSuggestions: [
                {
                    toolName,
                    rationale: "Call again with arguments matching the input schema.",
                    exampleArgs: exampleArgs[toolName],
                    priority: "high"
                }
            ]
        };
    }

    /**
     * Text lines for suggestions, for tool results that carry plain text
     */
    static formatSuggestions(suggestions: readonly ToolSuggestion[]): string[] {
        if (suggestions.length === 0) return [];
        return [
            "Suggested next calls:",
            ...suggestions.map(suggestion => {
                const args = suggestion.exampleArgs ? ` ${JSON.stringify(suggestion.exampleArgs)}` : "";
                return `- ${suggestion.toolName}${args}: ${suggestion.rationale}`;
            })
        ];
    }
}
