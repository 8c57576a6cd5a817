import { ErrorEnhancer } from "../../errors/ErrorEnhancer.js";

const PATHS = ["getting-started", "components", "signals", "views", "routing", "error-handling"];

describe("ErrorEnhancer", () => {
    describe("enhanceSectionNotFound", () => {
        it("should rank paths by shared characters", () => {
            const details = ErrorEnhancer.enhanceSectionNotFound("signalz", PATHS);
            expect(details.similarSections).toEqual(["signals", "getting-started", "error-handling"]);
            expect(details.nextActionHint).toBe("Did you mean: signals, getting-started, error-handling?");
            expect(details.toolSuggestions.map(suggestion => suggestion.toolName)).toEqual(["list-sections", "get-documentation"]);
            expect(details.toolSuggestions[1].exampleArgs).toEqual({ section: "signals" });
        });

        it("should fall back to list-sections when nothing is close", () => {
            const details = ErrorEnhancer.enhanceSectionNotFound("zzz", PATHS);
            expect(details.similarSections).toEqual([]);
            expect(details.nextActionHint).toBe("Use list-sections to see available sections.");
            expect(details.toolSuggestions).toHaveLength(1);
        });

        it("should honor the limit", () => {
            expect(ErrorEnhancer.enhanceSectionNotFound("signalz", PATHS, 1).similarSections).toEqual(["signals"]);
        });
    });

    it("should name the available tools for an unknown tool", () => {
        const details = ErrorEnhancer.enhanceUnknownTool("fix", ["list-sections", "leptos-autofixer"]);
        expect(details.nextActionHint).toBe("Tool 'fix' does not exist. Available tools: list-sections, leptos-autofixer.");
        expect(details.toolSuggestions).toHaveLength(2);
    });

    it("should list argument issues with an example", () => {
        const details = ErrorEnhancer.enhanceInvalidArguments("get-documentation", ["section: Required", "extra"]);
        expect(details.nextActionHint).toBe("Fix the arguments for 'get-documentation': section: Required; extra");
        expect(details.toolSuggestions[0].exampleArgs).toEqual({ section: "signals" });
    });

    describe("formatSuggestions", () => {
        it("should print one line per suggestion with its example arguments", () => {
            const details = ErrorEnhancer.enhanceSectionNotFound("signalz", PATHS);
            expect(ErrorEnhancer.formatSuggestions(details.toolSuggestions)).toEqual([
                "Suggested next calls:",
                "- list-sections: List every documentation section with its path and use cases.",
                "- get-documentation {\"section\":\"signals\"}: Retry with the closest matching section path."
            ]);
        });

        it("should print nothing without suggestions", () => {
            expect(ErrorEnhancer.formatSuggestions([])).toEqual([]);
        });
    });
});
