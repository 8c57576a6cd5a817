export { Autofixer, analyze } from "./analysis/Autofixer.js";
export { SourceScanner, scanSource } from "./analysis/SourceScanner.js";
export { RuleEngine } from "./analysis/RuleEngine.js";
export { PATTERN_CATALOG, defineRule, findRule } from "./analysis/PatternCatalog.js";
export { formatReport, renderReport, renderText, NO_ISSUES_MESSAGE } from "./analysis/DiagnosticFormatter.js";
export type { ReportFormat } from "./analysis/DiagnosticFormatter.js";
export type {
    AnalysisReport,
    AnalysisSummary,
    CatalogRule,
    Finding,
    Rule,
    Severity,
    SourceUnit,
    UnitKind
} from "./analysis/types.js";
export { DocumentationRegistry } from "./docs/DocumentationRegistry.js";
export type { DocumentationSection, SectionInfo } from "./docs/DocumentationRegistry.js";
export { loadServerConfig, ConfigError } from "./config/ServerConfig.js";
export type { ServerConfig } from "./config/ServerConfig.js";
export { LeptosMcpServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
