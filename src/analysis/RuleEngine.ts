import { LineCounter } from '../utils/LineCounter.js';
import { renderTemplate } from '../utils/TemplateRenderer.js';
import { PATTERN_CATALOG } from './PatternCatalog.js';
import type {
    AnalysisContext,
    CatalogRule,
    Finding,
    SignalDeclarationUnit,
    SourceUnit,
    UnitsByKind
} from './types.js';

/** A finding plus the catalog index of its rule, used as the final tie-break. */
export interface RankedFinding extends Finding {
    ruleIndex: number;
}

function assertNever(value: never): never {
    throw new Error(`Unhandled source unit: ${JSON.stringify(value)}`);
}

export function groupUnits(units: Iterable<SourceUnit>): UnitsByKind {
    const groups: UnitsByKind = {
        "reactive-read": [],
        "closure-body": [],
        "component-decl": [],
        "server-function": [],
        "attribute-binding": [],
        "event-handler": [],
        "markup-element": [],
        "resource-call": [],
        "signal-declaration": [],
        "macro-call": [],
        "opaque": []
    };
    for (const unit of units) {
        switch (unit.kind) {
            case "reactive-read":
                groups[unit.kind].push(unit);
                break;
            case "closure-body":
                groups[unit.kind].push(unit);
                break;
            case "component-decl":
                groups[unit.kind].push(unit);
                break;
            case "server-function":
                groups[unit.kind].push(unit);
                break;
            case "attribute-binding":
                groups[unit.kind].push(unit);
                break;
            case "event-handler":
                groups[unit.kind].push(unit);
                break;
            case "markup-element":
                groups[unit.kind].push(unit);
                break;
            case "resource-call":
                groups[unit.kind].push(unit);
                break;
            case "signal-declaration":
                groups[unit.kind].push(unit);
                break;
            case "macro-call":
                groups[unit.kind].push(unit);
                break;
            case "opaque":
                groups[unit.kind].push(unit);
                break;
            default:
                assertNever(unit);
        }
    }
    return groups;
}

export function buildContext(declarations: readonly SignalDeclarationUnit[]): AnalysisContext {
    const setters = new Map<string, string>();
    const signalNames = new Set<string>();
    for (const declaration of declarations) {
        declaration.bindings.forEach(name => signalNames.add(name));
        if (declaration.getter !== null && declaration.setter !== null) {
            setters.set(declaration.getter, declaration.setter);
        }
    }
    return { setters, signalNames };
}

/**
 * Evaluates every catalog rule against the units of its target kind. Rules
 * are independent; the order only fixes the sequence of raw findings.
 */
export class RuleEngine {
    constructor(private readonly catalog: readonly CatalogRule[] = PATTERN_CATALOG) {}

    public evaluate(source: string, units: Iterable<SourceUnit>): RankedFinding[] {
        const groups = groupUnits(units);
        const context = buildContext(groups["signal-declaration"]);
        const lines = new LineCounter(source);
        const findings: RankedFinding[] = [];

        this.catalog.forEach((rule, ruleIndex) => {
            for (const hit of rule.evaluate(groups, context)) {
                const { line, column } = lines.locate(hit.match.offset ?? hit.unit.start);
                const finding: RankedFinding = {
                    rule_id: rule.id,
                    severity: rule.severity,
                    line,
                    column,
                    message: renderTemplate(rule.message, hit.match.bindings),
                    ruleIndex
                };
                if (rule.fix !== undefined) {
                    finding.suggested_fix = renderTemplate(rule.fix, hit.match.bindings);
                }
                findings.push(finding);
            }
        });
        return findings;
    }
}
