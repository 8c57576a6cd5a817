import {
    escapeRegExp,
    isLiteral,
    readClosureHead,
    splitTopLevel,
    stripBraces,
    toPascalCase
} from './SourceText.js';
import { TUPLE_SIGNAL_FACTORIES } from './SourceScanner.js';
import type {
    AnalysisContext,
    CatalogRule,
    MarkupAttribute,
    MarkupElementUnit,
    Rule,
    RuleHit,
    UnitKind,
    UnitsByKind
} from './types.js';

const PASCAL_CASE = /^[A-Z][A-Za-z0-9]*$/;
const WRITE_METHODS = "set|update|write|try_set|try_update|set_untracked|update_untracked";
const EAGER_HANDLER_CALL = /\.(?:set|update|write|try_set|try_update|get|with|read)\s*\(/;
const RAW_HTML_ATTRIBUTES = new Set(["inner_html", "prop:innerHTML", "prop:inner_html"]);
const VALUE_ATTRIBUTES = new Set(["value", "prop:value"]);
const BOUND_ATTRIBUTES = new Set(["bind:value", "bind:checked"]);
/** `on:input`, `on:change` and their typed-target forms such as `on:input:target` */
const INPUT_EVENT = /^on:(?:input|change)(?::target)?$/;
const BARE_PATH = /^[A-Za-z_]\w*(?:::[A-Za-z_]\w*)*$/;

const DEPRECATED_CONSTRUCTORS: Readonly<Record<string, string>> = {
    create_signal: "signal",
    create_rw_signal: "RwSignal::new",
    create_memo: "Memo::new"
};

const TRACING_LEVELS: Readonly<Record<string, string>> = {
    println: "info",
    print: "info",
    eprintln: "error",
    eprint: "error",
    dbg: "debug"
};

/**
 * Wraps a typed rule into a catalog entry. The matcher only ever sees units
 * of its own target kind.
 */
export function defineRule<K extends UnitKind>(rule: Rule<K>): CatalogRule {
    const { match, ...record } = rule;
    return Object.freeze({
        ...record,
        evaluate: (units: UnitsByKind, context: AnalysisContext): RuleHit[] => {
            const hits: RuleHit[] = [];
            for (const unit of units[rule.target]) {
                const result = match(unit, context);
                if (result) hits.push({ unit, match: result });
            }
            return hits;
        }
    });
}

function findAttribute(element: MarkupElementUnit, names: ReadonlySet<string>): MarkupAttribute | undefined {
    return element.attributes.find(attribute => names.has(attribute.name));
}

/** First identifier of a value such as `move || name.get()` or `{name}`. */
function signalRoot(value: string): string | null {
    const inner = stripBraces(value);
    const head = readClosureHead(inner);
    const body = head ? inner.slice(inner.indexOf(head.head) + head.head.length) : inner;
    const match = /^\s*\{?\s*([A-Za-z_]\w*)/.exec(body);
    return match ? match[1] : null;
}

/**
 * True when the handler writes through one of the writers: `x.set(..)` and
 * friends for any of them, or `set_x(..)` call syntax for setters.
 */
function writesTo(handler: string, signal: string, setters: readonly string[]): boolean {
    return [signal, ...setters].some(writer => {
        const name = escapeRegExp(writer);
        if (new RegExp(`\\b${name}\\s*\\.(?:${WRITE_METHODS})\\s*\\(`).test(handler)) return true;
        return writer !== signal && new RegExp(`\\b${name}\\s*\\(`).test(handler);
    });
}

function okType(returnType: string): string {
    const trimmed = returnType.trim();
    if (trimmed.length === 0) return "()";
    const result = /^Result\s*<([\s\S]*)>$/.exec(trimmed);
    if (!result) return trimmed;
    return splitTopLevel(result[1])[0] ?? "()";
}

/** Catalog order is ascending rule id; findings at one location follow it. */
export const PATTERN_CATALOG: readonly CatalogRule[] = Object.freeze([
    defineRule({
        id: "component-name-case",
        target: "component-decl",
        severity: "warning",
        category: "style",
        description: "Component functions are used as tags and must be PascalCase.",
        message: "component `{{name}}` should be PascalCase so it can be used as `<{{pascal}}/>`",
        fix: "fn {{pascal}}",
        match: unit => {
            if (!unit.hasComponentAttribute || PASCAL_CASE.test(unit.name)) return null;
            return { bindings: { name: unit.name, pascal: toPascalCase(unit.name) } };
        }
    }),
    defineRule({
        id: "deprecated-create-signal",
        target: "signal-declaration",
        severity: "warning",
        category: "style",
        description: "The create_* reactive constructors are deprecated since Leptos 0.7.",
        message: "`{{factory}}` is deprecated; use `{{replacement}}`",
        fix: "{{replacement}}({{args}})",
        match: unit => {
            const replacement = DEPRECATED_CONSTRUCTORS[unit.factory];
            if (replacement === undefined) return null;
            return { bindings: { factory: unit.factory, replacement, args: unit.args } };
        }
    }),
    defineRule({
        id: "eager-event-handler",
        target: "event-handler",
        severity: "error",
        category: "correctness",
        description: "Event handlers must be closures; a call runs once while the view is built.",
        message: "`on:{{event}}` runs `{{handler}}` once while building the view instead of on each event",
        fix: "on:{{event}}=move |_| {{handler}}",
        match: unit => {
            if (unit.isClosure || !EAGER_HANDLER_CALL.test(unit.handler)) return null;
            return { bindings: { event: unit.event, handler: stripBraces(unit.handler) } };
        }
    }),
    defineRule({
        id: "eager-read-in-view",
        target: "reactive-read",
        severity: "warning",
        category: "reactivity",
        description: "A signal read directly in markup is evaluated once and never updates.",
        message: "`{{read}}` is read once when the view is built; wrap it in a closure to keep it reactive",
        fix: "{{prefix}}move || {{expression}}{{suffix}}",
        match: unit => {
            if (!unit.tracked || !unit.inView || unit.deferred) return null;
            if (unit.position !== "text" && unit.position !== "attribute") return null;
            const expression = stripBraces(unit.expression ?? unit.text);
            const inAttribute = unit.position === "attribute" && unit.attribute !== null;
            return {
                bindings: {
                    read: unit.text,
                    expression,
                    prefix: inAttribute ? `${unit.attribute}=` : "{",
                    suffix: inAttribute ? "" : "}"
                }
            };
        }
    }),
    defineRule({
        id: "missing-component-attribute",
        target: "component-decl",
        severity: "error",
        category: "correctness",
        description: "Functions returning impl IntoView used as components need #[component].",
        message: "`{{name}}` returns `impl IntoView` but is missing `#[component]`",
        fix: "#[component] fn {{name}}",
        match: unit => {
            if (unit.hasComponentAttribute || !unit.returnsView || !/^[A-Z]/.test(unit.name)) return null;
            return { bindings: { name: unit.name } };
        }
    }),
    defineRule({
        id: "missing-move-capture",
        target: "closure-body",
        severity: "warning",
        category: "reactivity",
        description: "View closures outlive the component body and must capture handles by value.",
        message: "closure uses `{{handle}}` from the enclosing scope without `move`",
        fix: "move {{head}}",
        match: unit => {
            if (!unit.inView || unit.nested || unit.isMove || unit.handles.length === 0) return null;
            return { bindings: { handle: unit.handles[0].root, head: unit.head } };
        }
    }),
    defineRule({
        id: "prefer-prop-value",
        target: "markup-element",
        severity: "warning",
        category: "correctness",
        description: "The value attribute only sets the initial state of a form control.",
        message: "`value` on <{{tag}}> only sets the initial value; use `prop:value` to keep it in sync",
        fix: "prop:value={{value}}",
        match: unit => {
            if (unit.tag !== "input" && unit.tag !== "textarea") return null;
            const attribute = unit.attributes.find(candidate => candidate.name === "value");
            if (!attribute || attribute.value === null || isLiteral(attribute.value)) return null;
            return { bindings: { tag: unit.tag, value: attribute.value }, offset: attribute.start };
        }
    }),
    defineRule({
        id: "prefer-signal-tuple",
        target: "signal-declaration",
        severity: "warning",
        category: "style",
        description: "Tuple signal constructors return a (getter, setter) pair.",
        message: "`{{factory}}` returns a (getter, setter) pair; destructure it instead of binding `{{name}}`",
        fix: "let ({{name}}, set_{{name}}) = {{factory}}({{args}})",
        match: unit => {
            const isTuple = TUPLE_SIGNAL_FACTORIES.some(factory => factory === unit.factory);
            if (!isTuple || unit.destructured || unit.bindings.length !== 1) return null;
            return { bindings: { factory: unit.factory, name: unit.bindings[0], args: unit.args } };
        }
    }),
    defineRule({
        id: "prefer-tracing",
        target: "macro-call",
        severity: "warning",
        category: "style",
        description: "Console printing macros bypass structured logging.",
        message: "`{{name}}!` writes straight to the process output; use `tracing::{{level}}!`",
        fix: "tracing::{{level}}!({{args}})",
        match: unit => {
            const level = TRACING_LEVELS[unit.name];
            if (level === undefined) return null;
            let args = unit.args.length > 0 ? unit.args : '""';
            if (unit.name === "dbg") args = `"{:?}", ${args}`;
            return { bindings: { name: unit.name, level, args } };
        }
    }),
    defineRule({
        id: "raw-markup-injection",
        target: "attribute-binding",
        severity: "warning",
        category: "security",
        description: "inner_html renders its value without escaping.",
        message: "`{{name}}` injects `{{value}}` as unescaped HTML; sanitize it first",
        fix: "{{name}}={{sanitized}}",
        match: unit => {
            if (!RAW_HTML_ATTRIBUTES.has(unit.name) || isLiteral(unit.value)) return null;
            const inner = stripBraces(unit.value);
            const head = readClosureHead(inner);
            const body = head ? inner.slice(inner.indexOf(head.head) + head.head.length).trim() : inner;
            const clean = `ammonia::clean(&${stripBraces(body)})`;
            return {
                bindings: {
                    name: unit.name,
                    value: unit.value,
                    sanitized: head ? `move || ${clean}` : clean
                }
            };
        }
    }),
    defineRule({
        id: "resource-fetcher-tracks-source",
        target: "resource-call",
        severity: "warning",
        category: "reactivity",
        description: "A resource fetcher should receive its inputs from the source closure.",
        message: "the fetcher of `{{factory}}` reads `{{read}}` directly; read it in the source argument and take it as a parameter",
        match: unit => {
            const first = unit.fetcherReads[0];
            if (unit.args.length < 2 || first === undefined) return null;
            return {
                bindings: { factory: unit.factory, read: `${first.receiver}.${first.method}()` },
                offset: first.offset
            };
        }
    }),
    defineRule({
        id: "server-fn-error-type",
        target: "server-function",
        severity: "warning",
        category: "correctness",
        description: "Server functions report transport failures through ServerFnError.",
        message: "server function `{{name}}` should return `Result<_, ServerFnError>`",
        fix: "-> Result<{{ok}}, ServerFnError>",
        match: unit => {
            if (unit.returnType.includes("ServerFnError")) return null;
            return { bindings: { name: unit.name, ok: okType(unit.returnType) } };
        }
    }),
    defineRule({
        id: "uncontrolled-input-binding",
        target: "markup-element",
        severity: "warning",
        category: "reactivity",
        description: "A form control bound to a signal needs an input handler that writes it back.",
        message: "<{{tag}}> shows `{{signal}}` but no on:input or on:change handler updates it",
        fix: "{{event}}=move |ev| {{setter}}.set(event_target_value(&ev))",
        match: (unit, context) => {
            if (unit.tag !== "input" && unit.tag !== "textarea" && unit.tag !== "select") return null;
            if (findAttribute(unit, BOUND_ATTRIBUTES)) return null;

            const binding = unit.attributes.find(attribute =>
                VALUE_ATTRIBUTES.has(attribute.name) && attribute.value !== null && !isLiteral(attribute.value));
            if (!binding || binding.value === null) return null;
            const signal = signalRoot(binding.value);
            if (signal === null) return null;
            const readsSignal = context.signalNames.has(signal) || /\.(?:get|read|with)\s*\(/.test(binding.value);
            if (!readsSignal) return null;

            const setter = context.setters.get(signal);
            const setters = setter === undefined || setter === signal ? [`set_${signal}`] : [`set_${signal}`, setter];
            const handlers = unit.attributes.flatMap(attribute =>
                INPUT_EVENT.test(attribute.name) && attribute.value !== null ? [stripBraces(attribute.value)] : []);
            // A named handler such as `on:input=on_input` cannot be inspected
            const paired = handlers.some(handler => BARE_PATH.test(handler) || writesTo(handler, signal, setters));
            if (paired) return null;

            return {
                bindings: {
                    tag: unit.tag,
                    signal,
                    setter: setter ?? `set_${signal}`,
                    event: unit.tag === "select" ? "on:change" : "on:input"
                }
            };
        }
    })
]);

export function findRule(id: string): CatalogRule | undefined {
    return PATTERN_CATALOG.find(rule => rule.id === id);
}
