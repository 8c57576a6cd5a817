import type { TemplateBindings } from '../utils/TemplateRenderer.js';

export type Severity = "warning" | "error";

export type RuleCategory = "reactivity" | "correctness" | "security" | "style";

/** Where an expression sits relative to `view!` markup. */
export type ViewPosition = "text" | "attribute" | "event" | "code";

interface UnitBase {
    /** 0-based offset of the first character */
    start: number;
    /** 0-based offset one past the last character */
    end: number;
    text: string;
}

export interface HandleReference {
    /** Full receiver path, e.g. `state.count` */
    receiver: string;
    /** First path segment, e.g. `state` */
    root: string;
    method: string;
    offset: number;
}

export interface ReactiveReadUnit extends UnitBase {
    kind: "reactive-read";
    receiver: string;
    root: string;
    /** `get`, `read`, `with`, ... or `call` for `count()` syntax */
    method: string;
    tracked: boolean;
    inView: boolean;
    /** True when an enclosing closure re-runs the read */
    deferred: boolean;
    position: ViewPosition;
    /** Text of the enclosing view expression (text block body or attribute value) */
    expression: string | null;
    /** Attribute name when position is `attribute` or `event` */
    attribute: string | null;
}

export interface ClosureBodyUnit extends UnitBase {
    kind: "closure-body";
    /** `||` or `|params|` as written, without `move` */
    head: string;
    isMove: boolean;
    params: string[];
    inView: boolean;
    /** Inside another closure of the same view expression */
    nested: boolean;
    position: ViewPosition;
    handles: HandleReference[];
}

export interface ComponentProp {
    name: string;
    type: string;
}

export interface ComponentDeclUnit extends UnitBase {
    kind: "component-decl";
    name: string;
    props: ComponentProp[];
    /** Outer attribute bodies, e.g. `component`, `prop(optional)` */
    attributes: string[];
    hasComponentAttribute: boolean;
    returnsView: boolean;
}

export interface ServerFunctionUnit extends UnitBase {
    kind: "server-function";
    name: string;
    returnType: string;
    attributes: string[];
}

export interface AttributeBindingUnit extends UnitBase {
    kind: "attribute-binding";
    element: string;
    name: string;
    value: string;
}

export interface EventHandlerUnit extends UnitBase {
    kind: "event-handler";
    element: string;
    event: string;
    handler: string;
    isClosure: boolean;
}

export interface MarkupAttribute {
    name: string;
    /** Null for valueless attributes such as `disabled` */
    value: string | null;
    start: number;
}

export interface MarkupElementUnit extends UnitBase {
    kind: "markup-element";
    tag: string;
    attributes: MarkupAttribute[];
    selfClosing: boolean;
}

export interface ArgumentSpan {
    start: number;
    end: number;
    text: string;
}

export interface ResourceCallUnit extends UnitBase {
    kind: "resource-call";
    factory: string;
    args: ArgumentSpan[];
    fetcherParams: string[];
    /** Tracked reads inside the fetcher argument */
    fetcherReads: HandleReference[];
}

export interface SignalDeclarationUnit extends UnitBase {
    kind: "signal-declaration";
    factory: string;
    bindings: string[];
    destructured: boolean;
    /** Argument text of the constructor call */
    args: string;
    getter: string | null;
    setter: string | null;
}

export interface MacroCallUnit extends UnitBase {
    kind: "macro-call";
    name: string;
    args: string;
}

/** Remainder of the input after structural inference stopped */
export interface OpaqueUnit extends UnitBase {
    kind: "opaque";
}

export type SourceUnit =
    | ReactiveReadUnit
    | ClosureBodyUnit
    | ComponentDeclUnit
    | ServerFunctionUnit
    | AttributeBindingUnit
    | EventHandlerUnit
    | MarkupElementUnit
    | ResourceCallUnit
    | SignalDeclarationUnit
    | MacroCallUnit
    | OpaqueUnit;

export type UnitKind = SourceUnit["kind"];

export type UnitOf<K extends UnitKind> = Extract<SourceUnit, { kind: K }>;

export type UnitsByKind = { [K in UnitKind]: Array<UnitOf<K>> };

/** Read-only facts gathered from the whole input before rules run. */
export interface AnalysisContext {
    /** getter name -> setter name, for tuple signal constructors */
    readonly setters: ReadonlyMap<string, string>;
    /** every name bound by a signal constructor */
    readonly signalNames: ReadonlySet<string>;
}

export interface RuleMatch {
    bindings: TemplateBindings;
    /** Offset to report instead of the unit start */
    offset?: number;
}

export interface Rule<K extends UnitKind = UnitKind> {
    readonly id: string;
    readonly target: K;
    readonly severity: Severity;
    readonly category: RuleCategory;
    readonly description: string;
    /** `{{name}}` placeholders are filled from the match bindings */
    readonly message: string;
    readonly fix?: string;
    readonly match: (unit: UnitOf<K>, context: AnalysisContext) => RuleMatch | null;
}

export interface RuleHit {
    unit: SourceUnit;
    match: RuleMatch;
}

/**
 * Catalog entry: a rule with its target kind erased. `evaluate` closes over
 * the typed matcher, so the catalog stays a flat ordered list.
 */
export interface CatalogRule {
    readonly id: string;
    readonly target: UnitKind;
    readonly severity: Severity;
    readonly category: RuleCategory;
    readonly description: string;
    readonly message: string;
    readonly fix?: string;
    readonly evaluate: (units: UnitsByKind, context: AnalysisContext) => RuleHit[];
}

export interface Finding {
    rule_id: string;
    severity: Severity;
    line: number;
    column: number;
    message: string;
    suggested_fix?: string;
}

export interface AnalysisSummary {
    warnings: number;
    errors: number;
}

export interface AnalysisReport {
    findings: Finding[];
    summary: AnalysisSummary;
}
