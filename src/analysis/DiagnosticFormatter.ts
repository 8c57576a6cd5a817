import type { AnalysisReport, Finding } from './types.js';
import type { RankedFinding } from './RuleEngine.js';

export const NO_ISSUES_MESSAGE = "✓ No issues found. Code looks good!";

export type ReportFormat = "text" | "json";

/**
 * Drops exact duplicates (rule, line, column), then orders by line, column
 * and catalog index. Array.prototype.sort is stable, so equal keys keep
 * evaluation order.
 */
export function formatReport(raw: readonly RankedFinding[]): AnalysisReport {
    const seen = new Set<string>();
    const unique: RankedFinding[] = [];
    for (const finding of raw) {
        const key = `${finding.rule_id}\u0000${finding.line}\u0000${finding.column}`;
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(finding);
    }

    unique.sort((a, b) =>
        a.line - b.line
        || a.column - b.column
        || a.ruleIndex - b.ruleIndex);

    const findings = unique.map(toFinding);
    return {
        findings,
        summary: {
            warnings: findings.filter(finding => finding.severity === "warning").length,
            errors: findings.filter(finding => finding.severity === "error").length
        }
    };
}

function toFinding(finding: RankedFinding): Finding {
    const result: Finding = {
        rule_id: finding.rule_id,
        severity: finding.severity,
        line: finding.line,
        column: finding.column,
        message: finding.message
    };
    if (finding.suggested_fix !== undefined) {
        result.suggested_fix = finding.suggested_fix;
    }
    return result;
}

export function renderText(report: AnalysisReport): string {
    if (report.findings.length === 0) {
        return NO_ISSUES_MESSAGE;
    }
    const lines: string[] = [];
    for (const finding of report.findings) {
        lines.push(`${finding.severity.toUpperCase()} [${finding.rule_id}] ${finding.line}:${finding.column} ${finding.message}`);
        if (finding.suggested_fix !== undefined) {
            lines.push(`  fix: ${finding.suggested_fix}`);
        }
    }
    const { warnings, errors } = report.summary;
    lines.push(`${warnings} warning(s), ${errors} error(s)`);
    return lines.join("\n");
}

export function renderReport(report: AnalysisReport, format: ReportFormat): string {
    return format === "json" ? JSON.stringify(report, null, 2) : renderText(report);
}
