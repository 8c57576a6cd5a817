import { createLogger, type Logger } from '../utils/StructuredLogger.js';
import { formatReport, renderReport, type ReportFormat } from './DiagnosticFormatter.js';
import { PATTERN_CATALOG } from './PatternCatalog.js';
import { RuleEngine } from './RuleEngine.js';
import { SourceScanner } from './SourceScanner.js';
import type { AnalysisReport, CatalogRule } from './types.js';

/**
 * Facade over scan -> evaluate -> format. Holds no per-call state, so one
 * instance serves every request.
 */
export class Autofixer {
    private readonly engine: RuleEngine;
    private readonly logger: Logger;

    constructor(catalog: readonly CatalogRule[] = PATTERN_CATALOG, logger: Logger = createLogger("Autofixer")) {
        this.engine = new RuleEngine(catalog);
        this.logger = logger;
    }

    public analyze(code: string): AnalysisReport {
        const raw = this.engine.evaluate(code, new SourceScanner(code));
        const report = formatReport(raw);
        this.logger.debug("analysis finished", {
            length: code.length,
            raw: raw.length,
            findings: report.findings.length,
            warnings: report.summary.warnings,
            errors: report.summary.errors
        });
        return report;
    }

    public render(code: string, format: ReportFormat = "text"): string {
        return renderReport(this.analyze(code), format);
    }
}

export function analyze(code: string): AnalysisReport {
    return defaultAutofixer().analyze(code);
}

let shared: Autofixer | undefined;

function defaultAutofixer(): Autofixer {
    shared ??= new Autofixer();
    return shared;
}
