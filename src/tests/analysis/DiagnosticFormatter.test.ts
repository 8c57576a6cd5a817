import {
    formatReport,
    NO_ISSUES_MESSAGE,
    renderReport,
    renderText
} from "../../analysis/DiagnosticFormatter.js";
import type { RankedFinding } from "../../analysis/RuleEngine.js";

function ranked(rule_id: string, line: number, column: number, ruleIndex: number, extra: Partial<RankedFinding> = {}): RankedFinding {
    return { rule_id, severity: "warning", line, column, message: `${rule_id} message`, ruleIndex, ...extra };
}

describe("DiagnosticFormatter", () => {
    describe("formatReport", () => {
        it("should drop duplicates on rule, line and column", () => {
            const report = formatReport([
                ranked("a", 1, 1, 0, { message: "first" }),
                ranked("a", 1, 1, 0, { message: "second" }),
                ranked("a", 1, 2, 0)
            ]);
            expect(report.findings.map(finding => [finding.column, finding.message])).toEqual([
                [1, "first"],
                [2, "a message"]
            ]);
        });

        it("should sort by line, then column, then catalog index", () => {
            const report = formatReport([
                ranked("z", 2, 1, 5),
                ranked("b", 1, 4, 1),
                ranked("c", 1, 4, 0),
                ranked("d", 1, 2, 9)
            ]);
            expect(report.findings.map(finding => finding.rule_id)).toEqual(["d", "c", "b", "z"]);
        });

        it("should count severities and strip the ranking", () => {
            const report = formatReport([
                ranked("a", 1, 1, 0, { severity: "error", suggested_fix: "fixed" }),
                ranked("b", 2, 1, 1)
            ]);
            expect(report.summary).toEqual({ warnings: 1, errors: 1 });
            expect(report.findings[0]).toEqual({
                rule_id: "a",
                severity: "error",
                line: 1,
                column: 1,
                message: "a message",
                suggested_fix: "fixed"
            });
            expect(report.findings[1]).not.toHaveProperty("suggested_fix");
        });
    });

    describe("renderText", () => {
        it("should print the no-issues line for an empty report", () => {
            expect(renderText(formatReport([]))).toBe(NO_ISSUES_MESSAGE);
        });

        it("should print one line per finding, its fix and the summary", () => {
            const report = formatReport([
                ranked("eager-event-handler", 3, 7, 2, { severity: "error", message: "runs once", suggested_fix: "move |_| go()" }),
                ranked("prefer-tracing", 1, 1, 7, { message: "use tracing" })
            ]);
            expect(renderText(report)).toBe([
                "WARNING [prefer-tracing] 1:1 use tracing",
                "ERROR [eager-event-handler] 3:7 runs once",
                "  fix: move |_| go()",
                "1 warning(s), 1 error(s)"
            ].join("\n"));
        });
    });

    describe("renderReport", () => {
        it("should print indented JSON", () => {
            const report = formatReport([ranked("a", 1, 1, 0)]);
            expect(renderReport(report, "json")).toBe(JSON.stringify(report, null, 2));
            expect(renderReport(report, "text")).toBe(renderText(report));
        });
    });
});
