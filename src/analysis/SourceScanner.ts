import { tokenize, type Token } from './Tokenizer.js';
import { parseClosureParams, readClosureHead, splitTopLevel } from './SourceText.js';
import type {
    ArgumentSpan,
    ClosureBodyUnit,
    ComponentProp,
    HandleReference,
    MarkupAttribute,
    ReactiveReadUnit,
    SourceUnit,
    ViewPosition
} from './types.js';

const TRACKED_READS = new Set(["get", "read", "with"]);
const UNTRACKED_READS = new Set(["get_untracked", "read_untracked", "with_untracked"]);
const ZERO_ARG_METHODS = new Set(["get", "read", "get_untracked", "read_untracked", "write"]);
const WRITES = new Set(["set", "update", "write", "try_set", "try_update", "set_untracked", "update_untracked"]);

export const TUPLE_SIGNAL_FACTORIES = ["signal", "signal_local", "create_signal", "arc_signal"] as const;
export const HANDLE_SIGNAL_FACTORIES = ["RwSignal::new", "RwSignal::new_local", "ArcRwSignal::new", "create_rw_signal"] as const;
export const MEMO_FACTORIES = ["Memo::new", "create_memo"] as const;
export const RESOURCE_FACTORIES = [
    "Resource::new",
    "Resource::new_blocking",
    "LocalResource::new",
    "ArcResource::new",
    "create_resource",
    "create_blocking_resource",
    "create_local_resource"
] as const;

const SIGNAL_FACTORIES: readonly string[] = [...TUPLE_SIGNAL_FACTORIES, ...HANDLE_SIGNAL_FACTORIES, ...MEMO_FACTORIES];

/** Keywords that cannot end an operand: a `|` after them opens a closure. */
const EXPRESSION_KEYWORDS = new Set([
    "move", "return", "in", "if", "while", "match", "else", "break", "yield",
    "async", "let", "mut", "ref", "dyn", "impl", "for", "loop", "unsafe", "as"
]);
/** Keywords that continue an attribute value after a complete operand. */
const CONTINUATION_KEYWORDS = new Set(["else", "as"]);
const FN_QUALIFIERS = new Set(["pub", "async", "const", "unsafe", "extern", "default"]);
const CLOSING: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const MAX_CLOSURE_HEAD_TOKENS = 64;
/** Bound on forward scans for generics, return types and `let` type annotations */
const MAX_LOOKAHEAD_TOKENS = 256;

interface ExpressionHolder {
    position: ViewPosition;
    attribute: string | null;
    reads: ReactiveReadUnit[];
}

interface PendingElement {
    tag: string;
    start: number;
    attributes: MarkupAttribute[];
}

interface PendingAttribute {
    name: string;
    start: number;
    valueStart: number;
    valueTokens: number;
    holder: ExpressionHolder;
}

interface MarkupState {
    state: "children" | "tag" | "value";
    element: PendingElement | null;
    attribute: PendingAttribute | null;
}

interface PendingMacro {
    name: string;
    start: number;
}

interface PendingResource {
    factory: string;
    start: number;
    commas: number[];
    reads: HandleReference[];
}

interface Frame {
    open: Token;
    /** Set on `view!` frames: tokens directly inside are markup */
    markup: MarkupState | null;
    holder: ExpressionHolder | null;
    ownsHolder: boolean;
    macro: PendingMacro | null;
    resource: PendingResource | null;
}

interface PendingClosure {
    start: number;
    head: string;
    isMove: boolean;
    params: string[];
    /** Stack length when the closure opened; it lives in that frame */
    depth: number;
    holder: ExpressionHolder | null;
    nested: boolean;
    position: ViewPosition;
    handles: HandleReference[];
}

interface FrameOptions {
    view?: boolean;
    macro?: PendingMacro;
    resource?: PendingResource;
}

/**
 * Lazy, restartable sequence of structural units found in Leptos source.
 * Each iteration runs a fresh single pass; nothing is cached between passes.
 */
export class SourceScanner implements Iterable<SourceUnit> {
    constructor(private readonly source: string) {}

    [Symbol.iterator](): Iterator<SourceUnit> {
        return new ScanPass(this.source).run();
    }
}

export function scanSource(source: string): SourceUnit[] {
    return [...new SourceScanner(source)];
}

class ScanPass {
    private readonly tokens: Token[];
    private readonly stack: Frame[] = [];
    private closures: PendingClosure[] = [];
    /** Resource calls still open, outermost first */
    private readonly resources: PendingResource[] = [];
    private readonly queue: SourceUnit[] = [];
    private readonly knownGetters = new Set<string>();
    private halted = false;

    /** Index of each delimiter's partner, or -1 when it has none */
    private readonly partners: Int32Array;

    constructor(private readonly source: string) {
        this.tokens = tokenize(source);
        this.partners = pairDelimiters(this.tokens);
    }

    public *run(): Generator<SourceUnit> {
        let index = 0;
        while (index < this.tokens.length && !this.halted) {
            index = this.step(index);
            if (this.queue.length > 0) {
                yield* this.queue.splice(0);
            }
        }
        this.finish();
        yield* this.queue.splice(0);
    }

    private step(index: number): number {
        const token = this.tokens[index];
        if (token.kind === "close") {
            return this.closeFrame(index);
        }
        const top = this.top();
        if (top?.markup) {
            switch (top.markup.state) {
                case "children":
                    return this.stepChildren(index, top.markup);
                case "tag":
                    return this.stepTag(index, top.markup);
                case "value":
                    return this.stepValue(index, top.markup);
            }
        }
        return this.stepExpression(index);
    }

    // ---------------------------------------------------------------------
    // Markup
    // ---------------------------------------------------------------------

    private stepChildren(index: number, markup: MarkupState): number {
        const token = this.tokens[index];
        if (token.kind === "open") {
            this.pushFrame(index);
            return index + 1;
        }
        if (!isPunct(token, "<")) {
            return index + 1;
        }
        const next = this.tokens[index + 1];
        if (next?.kind === "ident") {
            const name = this.readName(index + 1);
            markup.element = { tag: name.text, start: token.start, attributes: [] };
            markup.state = "tag";
            return name.next;
        }
        if (next && (isPunct(next, "/") || isPunct(next, "!"))) {
            return this.skipPastAngle(index + 2);
        }
        if (next && isPunct(next, ">")) {
            return index + 2;
        }
        return index + 1;
    }

    private stepTag(index: number, markup: MarkupState): number {
        const token = this.tokens[index];
        const next = this.tokens[index + 1];
        if (isPunct(token, ">")) {
            this.finishElement(markup, token.end, false);
            return index + 1;
        }
        if (isPunct(token, "/") && next && isPunct(next, ">")) {
            this.finishElement(markup, next.end, true);
            return index + 2;
        }
        if (token.kind === "open") {
            this.pushFrame(index);
            return index + 1;
        }
        if (token.kind !== "ident") {
            return index + 1;
        }
        const name = this.readName(index);
        const equals = this.tokens[name.next];
        if (equals && isPunct(equals, "=")) {
            const valueToken = this.tokens[name.next + 1];
            markup.attribute = {
                name: name.text,
                start: token.start,
                valueStart: valueToken ? valueToken.start : equals.end,
                valueTokens: 0,
                holder: {
                    position: name.text.startsWith("on:") ? "event" : "attribute",
                    attribute: name.text,
                    reads: []
                }
            };
            markup.state = "value";
            return name.next + 1;
        }
        markup.element?.attributes.push({ name: name.text, value: null, start: token.start });
        return name.next;
    }

    private stepValue(index: number, markup: MarkupState): number {
        const attribute = markup.attribute;
        if (!attribute) {
            markup.state = "tag";
            return index;
        }
        if (attribute.valueTokens > 0 && this.endsAttribute(index)) {
            this.finishAttribute(markup, this.tokens[index - 1].end);
            return index;
        }
        attribute.valueTokens++;
        return this.stepExpression(index);
    }

    private endsAttribute(index: number): boolean {
        const token = this.tokens[index];
        if (isPunct(token, ">")) return true;
        const next = this.tokens[index + 1];
        if (isPunct(token, "/") && next && isPunct(next, ">")) return true;
        if (token.kind !== "ident") return false;
        const previous = this.tokens[index - 1];
        if (previous && (isPunct(previous, ".") || isPunct(previous, "::"))) return false;
        const name = this.readName(index);
        const equals = this.tokens[name.next];
        if (equals !== undefined && isPunct(equals, "=")) return true;
        // A bare name right after a complete operand is a valueless attribute
        return previous !== undefined && endsOperand(previous) && !CONTINUATION_KEYWORDS.has(token.text);
    }

    private finishAttribute(markup: MarkupState, end: number): void {
        const attribute = markup.attribute;
        const element = markup.element;
        markup.attribute = null;
        markup.state = "tag";
        if (!attribute || !element) return;

        // Closures written directly in the value end with it
        this.closeClosures(this.stack.length, end);

        const value = this.source.slice(attribute.valueStart, Math.max(attribute.valueStart, end)).trim();
        element.attributes.push({ name: attribute.name, value, start: attribute.start });
        this.flushHolder(attribute.holder, value);

        const text = this.source.slice(attribute.start, end);
        if (attribute.name.startsWith("on:")) {
            this.queue.push({
                kind: "event-handler",
                start: attribute.start,
                end,
                text,
                element: element.tag,
                event: attribute.name.slice(3),
                handler: value,
                isClosure: readClosureHead(value) !== null
            });
        } else {
            this.queue.push({
                kind: "attribute-binding",
                start: attribute.start,
                end,
                text,
                element: element.tag,
                name: attribute.name,
                value
            });
        }
    }

    private finishElement(markup: MarkupState, end: number, selfClosing: boolean): void {
        const element = markup.element;
        markup.element = null;
        markup.state = "children";
        if (!element) return;
        this.queue.push({
            kind: "markup-element",
            start: element.start,
            end,
            text: this.source.slice(element.start, end),
            tag: element.tag,
            attributes: element.attributes,
            selfClosing
        });
    }

    /** Tag and attribute names: `div`, `on:click`, `aria-label`, `leptos::Foo`. */
    private readName(index: number): { text: string; next: number } {
        let next = index + 1;
        while (next + 1 < this.tokens.length) {
            const separator = this.tokens[next];
            const part = this.tokens[next + 1];
            const joins = isPunct(separator, ":") || isPunct(separator, "-") || isPunct(separator, "::");
            if (!joins || part.kind !== "ident" || separator.start !== this.tokens[next - 1].end) break;
            next += 2;
        }
        return {
            text: this.source.slice(this.tokens[index].start, this.tokens[next - 1].end),
            next
        };
    }

    /** Skips closing tags and comments; never steps over a delimiter. */
    private skipPastAngle(index: number): number {
        let cursor = index;
        while (cursor < this.tokens.length) {
            const token = this.tokens[cursor];
            if (token.kind === "open" || token.kind === "close") return cursor;
            if (token.kind === "punct" && token.text.endsWith(">")) return cursor + 1;
            cursor++;
        }
        return cursor;
    }

    // ---------------------------------------------------------------------
    // Expressions
    // ---------------------------------------------------------------------

    private stepExpression(index: number): number {
        const token = this.tokens[index];
        if (token.kind === "open") {
            this.pushFrame(index);
            return index + 1;
        }
        if (token.kind === "ident") {
            return this.stepIdent(index);
        }
        if (token.kind !== "punct") {
            return index + 1;
        }
        if (token.text === "|" || token.text === "||") {
            const bodyIndex = this.tryOpenClosure(index, false);
            if (bodyIndex !== null) return bodyIndex;
        } else if (token.text === ".") {
            this.recordMethodCall(index);
        } else if (token.text === "," || token.text === ";") {
            this.closeClosures(this.stack.length, this.tokens[index - 1]?.end ?? token.start);
            const top = this.top();
            if (token.text === "," && top?.resource) {
                top.resource.commas.push(token.start);
            }
        }
        return index + 1;
    }

    private stepIdent(index: number): number {
        const token = this.tokens[index];
        const next = this.tokens[index + 1];
        const afterNext = this.tokens[index + 2];

        if (next && isPunct(next, "!") && afterNext?.kind === "open") {
            if (token.text === "view") {
                this.pushFrame(index + 2, { view: true });
            } else {
                this.pushFrame(index + 2, { macro: { name: token.text, start: token.start } });
            }
            return index + 3;
        }

        if (token.text === "move" && next && (isPunct(next, "|") || isPunct(next, "||"))) {
            const bodyIndex = this.tryOpenClosure(index + 1, true);
            if (bodyIndex !== null) return bodyIndex;
        }

        if (token.text === "fn") {
            this.recordFunction(index);
            return index + 1;
        }
        if (token.text === "let") {
            this.recordSignalDeclaration(index);
            return index + 1;
        }

        if (this.isMemberAccess(index)) {
            return index + 1;
        }

        const path = this.readPath(index);
        const open = this.tokens[path.next];
        if (open?.kind !== "open" || open.text !== "(") {
            return index + 1;
        }

        const factory = matchFactory(path.text, RESOURCE_FACTORIES);
        if (factory) {
            this.pushFrame(path.next, { resource: { factory, start: token.start, commas: [], reads: [] } });
            return path.next + 1;
        }

        // `count()` on a getter declared earlier
        const close = this.tokens[index + 2];
        if (path.next === index + 1 && this.knownGetters.has(token.text) && close && isClose(close, ")")) {
            this.recordAccess({ receiver: token.text, root: token.text, method: "call", offset: token.start }, close.end, true, false);
        }
        return index + 1;
    }

    private isMemberAccess(index: number): boolean {
        const previous = this.tokens[index - 1];
        return previous !== undefined && (isPunct(previous, ".") || isPunct(previous, "::"));
    }

    /** `recv.method(` for reactive reads and writes. */
    private recordMethodCall(dotIndex: number): void {
        const method = this.tokens[dotIndex + 1];
        const paren = this.tokens[dotIndex + 2];
        if (method?.kind !== "ident" || paren?.kind !== "open" || paren.text !== "(") return;

        const name = method.text;
        const tracked = TRACKED_READS.has(name);
        const isWrite = WRITES.has(name);
        if (!tracked && !isWrite && !UNTRACKED_READS.has(name)) return;

        const closeParen = this.tokens[dotIndex + 3];
        const zeroArg = closeParen !== undefined && isClose(closeParen, ")");
        if (ZERO_ARG_METHODS.has(name) && !zeroArg) return;

        const receiver = this.readReceiver(dotIndex);
        if (!receiver) return;

        const end = zeroArg ? closeParen.end : method.end;
        this.recordAccess({ ...receiver, method: name }, end, tracked, isWrite);
    }

    private readReceiver(dotIndex: number): Omit<HandleReference, "method"> | null {
        let first = dotIndex - 1;
        const last = this.tokens[first];
        if (!last || (last.kind !== "ident" && last.kind !== "number")) return null;
        while (first - 2 >= 0) {
            const separator = this.tokens[first - 1];
            const segment = this.tokens[first - 2];
            if (!isPunct(separator, ".") || (segment.kind !== "ident" && segment.kind !== "number")) break;
            first -= 2;
        }
        const rootToken = this.tokens[first];
        if (rootToken.kind !== "ident") return null;
        return {
            receiver: this.source.slice(rootToken.start, last.end),
            root: rootToken.text,
            offset: rootToken.start
        };
    }

    private recordAccess(reference: HandleReference, end: number, tracked: boolean, isWrite: boolean): void {
        // Innermost closure first; a parameter with the same name shadows the handle
        for (let i = this.closures.length - 1; i >= 0; i--) {
            const closure = this.closures[i];
            if (closure.params.includes(reference.root)) break;
            closure.handles.push(reference);
        }
        if (isWrite) return;

        const boundByClosure = this.closures.some(closure => closure.params.includes(reference.root));
        if (tracked && !boundByClosure) {
            for (const resource of this.resources) {
                resource.reads.push(reference);
            }
        }

        const holder = this.currentHolder();
        const unit: ReactiveReadUnit = {
            kind: "reactive-read",
            start: reference.offset,
            end,
            text: this.source.slice(reference.offset, end),
            receiver: reference.receiver,
            root: reference.root,
            method: reference.method,
            tracked,
            inView: holder !== null,
            deferred: this.closures.length > 0,
            position: holder?.position ?? "code",
            expression: null,
            attribute: holder?.attribute ?? null
        };
        if (holder) {
            holder.reads.push(unit);
        } else {
            this.queue.push(unit);
        }
    }

    private flushHolder(holder: ExpressionHolder, expression: string): void {
        for (const read of holder.reads) {
            this.queue.push({ ...read, expression });
        }
        holder.reads = [];
    }

    // ---------------------------------------------------------------------
    // Closures
    // ---------------------------------------------------------------------

    private tryOpenClosure(pipeIndex: number, isMove: boolean): number | null {
        const pipe = this.tokens[pipeIndex];
        const before = this.tokens[pipeIndex - 1];
        if (!isMove && before && endsOperand(before)) return null;

        let params: string[] = [];
        let headEnd = pipe.end;
        let bodyIndex = pipeIndex + 1;
        if (pipe.text === "|") {
            const closing = this.findClosingPipe(pipeIndex + 1);
            if (closing === null) return null;
            params = parseClosureParams(this.source.slice(pipe.end, this.tokens[closing].start));
            headEnd = this.tokens[closing].end;
            bodyIndex = closing + 1;
        }

        const holder = this.currentHolder();
        this.closures.push({
            start: isMove ? before.start : pipe.start,
            head: this.source.slice(pipe.start, headEnd),
            isMove,
            params,
            depth: this.stack.length,
            holder,
            nested: holder !== null && this.closures.some(closure => closure.holder === holder),
            position: holder?.position ?? "code",
            handles: []
        });
        return bodyIndex;
    }

    private findClosingPipe(from: number): number | null {
        let depth = 0;
        const limit = Math.min(this.tokens.length, from + MAX_CLOSURE_HEAD_TOKENS);
        for (let i = from; i < limit; i++) {
            const token = this.tokens[i];
            if (token.kind === "open") {
                if (token.text === "{") return null;
                depth++;
            } else if (token.kind === "close") {
                if (depth === 0) return null;
                depth--;
            } else if (depth === 0 && isPunct(token, "|")) {
                return i;
            } else if (depth === 0 && isPunct(token, ";")) {
                return null;
            }
        }
        return null;
    }

    private closeClosures(depth: number, end: number): void {
        const remaining: PendingClosure[] = [];
        for (const closure of this.closures) {
            if (closure.depth < depth) {
                remaining.push(closure);
                continue;
            }
            const unit: ClosureBodyUnit = {
                kind: "closure-body",
                start: closure.start,
                end: Math.max(end, closure.start),
                text: this.source.slice(closure.start, Math.max(end, closure.start)),
                head: closure.head,
                isMove: closure.isMove,
                params: closure.params,
                inView: closure.holder !== null,
                nested: closure.nested,
                position: closure.position,
                handles: closure.handles
            };
            this.queue.push(unit);
        }
        this.closures = remaining;
    }

    // ---------------------------------------------------------------------
    // Declarations
    // ---------------------------------------------------------------------

    private recordFunction(fnIndex: number): void {
        const nameToken = this.tokens[fnIndex + 1];
        if (nameToken?.kind !== "ident") return;

        let openIndex = fnIndex + 2;
        const generic = this.tokens[openIndex];
        if (generic && isPunct(generic, "<")) {
            const afterGenerics = this.skipGenerics(openIndex);
            if (afterGenerics === null) return;
            openIndex = afterGenerics;
        }
        const open = this.tokens[openIndex];
        if (open?.kind !== "open" || open.text !== "(") return;
        const closeIndex = this.findMatching(openIndex);
        if (closeIndex === null) return;

        const fnToken = this.tokens[fnIndex];
        const params = this.source.slice(open.end, this.tokens[closeIndex].start);
        let end = this.tokens[closeIndex].end;
        let returnType = "";
        const arrow = this.tokens[closeIndex + 1];
        if (arrow && isPunct(arrow, "->")) {
            const lastIndex = this.findReturnTypeEnd(closeIndex + 2);
            if (lastIndex >= closeIndex + 2) {
                end = this.tokens[lastIndex].end;
                returnType = normalizeSpace(this.source.slice(this.tokens[closeIndex + 2].start, end));
            }
        }

        const attributes = this.readOuterAttributes(fnIndex);
        const hasComponentAttribute = attributes.some(attr => /^(?:leptos::)?(?:component|island)\b/.test(attr));
        const returnsView = /\bimpl\s+IntoView\b/.test(returnType);
        const isServer = attributes.some(attr => /^(?:leptos::)?server\b/.test(attr));
        const text = this.source.slice(fnToken.start, end);

        if (hasComponentAttribute || returnsView) {
            this.queue.push({
                kind: "component-decl",
                start: fnToken.start,
                end,
                text,
                name: nameToken.text,
                props: parseProps(params),
                attributes,
                hasComponentAttribute,
                returnsView
            });
        }
        if (isServer) {
            this.queue.push({
                kind: "server-function",
                start: fnToken.start,
                end,
                text,
                name: nameToken.text,
                returnType,
                attributes
            });
        }
    }

    /** Index of the last token of a return type, which stops at the body, `where` or `;`. */
    private findReturnTypeEnd(from: number): number {
        let index = from;
        const limit = Math.min(this.tokens.length, from + MAX_LOOKAHEAD_TOKENS);
        while (index < limit) {
            const token = this.tokens[index];
            if (token.kind === "close" || (token.kind === "open" && token.text === "{")) break;
            if (token.kind === "ident" && token.text === "where") break;
            if (isPunct(token, ";")) break;
            if (token.kind === "open") {
                const close = this.findMatching(index);
                if (close === null) break;
                index = close + 1;
                continue;
            }
            index++;
        }
        return index - 1;
    }

    /** `#[...]` attributes written before a `fn`, skipping visibility and qualifiers. */
    private readOuterAttributes(fnIndex: number): string[] {
        const attributes: string[] = [];
        let cursor = fnIndex - 1;
        while (cursor >= 0) {
            const token = this.tokens[cursor];
            if ((token.kind === "ident" && FN_QUALIFIERS.has(token.text)) || token.kind === "string") {
                cursor--;
                continue;
            }
            if (token.kind !== "close") break;
            const open = this.findMatchingBackward(cursor);
            if (open === null) break;
            const marker = this.tokens[open - 1];
            if (token.text === ")" && marker?.kind === "ident" && marker.text === "pub") {
                cursor = open - 1;
                continue;
            }
            if (token.text === "]" && marker && isPunct(marker, "#")) {
                attributes.unshift(normalizeSpace(this.source.slice(this.tokens[open].end, token.start)));
                cursor = open - 2;
                continue;
            }
            break;
        }
        return attributes;
    }

    private recordSignalDeclaration(letIndex: number): void {
        let index = letIndex + 1;
        if (this.tokens[index]?.text === "mut") index++;
        const first = this.tokens[index];
        if (!first) return;

        let bindings: string[];
        let destructured = false;
        if (first.kind === "open" && first.text === "(") {
            const close = this.findMatching(index);
            if (close === null) return;
            bindings = this.tokens
                .slice(index + 1, close)
                .filter(token => token.kind === "ident" && token.text !== "mut" && token.text !== "_")
                .map(token => token.text);
            destructured = true;
            index = close + 1;
        } else if (first.kind === "ident") {
            bindings = [first.text];
            index++;
        } else {
            return;
        }

        const typeMarker = this.tokens[index];
        if (typeMarker && isPunct(typeMarker, ":")) {
            const limit = Math.min(this.tokens.length, index + MAX_LOOKAHEAD_TOKENS);
            while (index < limit) {
                const token = this.tokens[index];
                if (isPunct(token, "=") || isPunct(token, ";") || token.kind === "close") break;
                index = token.kind === "open" ? (this.findMatching(index) ?? this.tokens.length) + 1 : index + 1;
            }
        }
        const equals = this.tokens[index];
        if (!equals || !isPunct(equals, "=")) return;

        const path = this.readPath(index + 1);
        const open = this.tokens[path.next];
        if (open?.kind !== "open" || open.text !== "(") return;
        const factory = matchFactory(path.text, SIGNAL_FACTORIES);
        if (!factory) return;

        const closeIndex = this.findMatching(path.next);
        const close = closeIndex === null ? null : this.tokens[closeIndex];
        const args = close ? this.source.slice(open.end, close.start).trim() : "";

        let getter: string | null = null;
        let setter: string | null = null;
        if (isOneOf(factory, TUPLE_SIGNAL_FACTORIES)) {
            if (destructured) {
                getter = bindings[0] ?? null;
                setter = bindings[1] ?? null;
            }
        } else if (isOneOf(factory, HANDLE_SIGNAL_FACTORIES)) {
            if (!destructured) {
                getter = bindings[0] ?? null;
                setter = getter;
            }
        } else if (!destructured) {
            getter = bindings[0] ?? null;
        }
        if (getter) this.knownGetters.add(getter);

        const start = this.tokens[letIndex].start;
        const end = close ? close.end : open.end;
        this.queue.push({
            kind: "signal-declaration",
            start,
            end,
            text: this.source.slice(start, end),
            factory,
            bindings,
            destructured,
            args,
            getter,
            setter
        });
    }

    private finishResource(resource: PendingResource, open: Token, close: Token): void {
        const starts = [open.end, ...resource.commas.map(comma => comma + 1)];
        const ends = [...resource.commas, close.start];
        const args: ArgumentSpan[] = [];
        starts.forEach((rawStart, idx) => {
            const raw = this.source.slice(rawStart, ends[idx]);
            const text = raw.trim();
            if (text.length === 0) return;
            const start = rawStart + (raw.length - raw.trimStart().length);
            args.push({ start, end: start + text.length, text });
        });

        const fetcher = args[1];
        const fetcherParams = fetcher ? readClosureHead(fetcher.text)?.params ?? [] : [];
        const fetcherReads = fetcher
            ? resource.reads.filter(read =>
                read.offset >= fetcher.start && read.offset < fetcher.end && !fetcherParams.includes(read.root))
            : [];

        this.queue.push({
            kind: "resource-call",
            start: resource.start,
            end: close.end,
            text: this.source.slice(resource.start, close.end),
            factory: resource.factory,
            args,
            fetcherParams,
            fetcherReads
        });
    }

    // ---------------------------------------------------------------------
    // Frames
    // ---------------------------------------------------------------------

    private top(): Frame | undefined {
        return this.stack[this.stack.length - 1];
    }

    /** The view expression the current token belongs to, if any. */
    private currentHolder(): ExpressionHolder | null {
        const top = this.top();
        if (!top) return null;
        if (top.markup) {
            return top.markup.state === "value" && top.markup.attribute ? top.markup.attribute.holder : null;
        }
        return top.holder;
    }

    private pushFrame(index: number, options: FrameOptions = {}): void {
        const open = this.tokens[index];
        const top = this.top();
        let holder: ExpressionHolder | null = null;
        let ownsHolder = false;
        if (!options.view) {
            if (top?.markup && top.markup.state !== "value") {
                holder = {
                    position: top.markup.state === "children" ? "text" : "attribute",
                    attribute: null,
                    reads: []
                };
                ownsHolder = true;
            } else {
                holder = this.currentHolder();
            }
        }
        this.stack.push({
            open,
            markup: options.view ? { state: "children", element: null, attribute: null } : null,
            holder,
            ownsHolder,
            macro: options.macro ?? null,
            resource: options.resource ?? null
        });
        if (options.resource) this.resources.push(options.resource);
    }

    private closeFrame(index: number): number {
        const close = this.tokens[index];
        const top = this.top();
        if (!top || CLOSING[top.open.text] !== close.text) {
            this.halt(close.start);
            return this.tokens.length;
        }

        const end = this.tokens[index - 1].end;
        this.closeClosures(this.stack.length, end);
        if (top.markup) {
            if (top.markup.attribute) this.finishAttribute(top.markup, end);
            if (top.markup.element) this.finishElement(top.markup, end, false);
        }
        if (top.ownsHolder && top.holder) {
            this.flushHolder(top.holder, this.source.slice(top.open.end, close.start).trim());
        }
        if (top.macro) {
            this.queue.push({
                kind: "macro-call",
                start: top.macro.start,
                end: close.end,
                text: this.source.slice(top.macro.start, close.end),
                name: top.macro.name,
                args: this.source.slice(top.open.end, close.start).trim()
            });
        }
        if (top.resource) {
            this.resources.pop();
            this.finishResource(top.resource, top.open, close);
        }
        this.stack.pop();
        return index + 1;
    }

    /** Stops structural inference; the rest of the input is one opaque unit. */
    private halt(start: number): void {
        this.halted = true;
        this.stack.length = 0;
        this.resources.length = 0;
        this.closures = [];
        this.queue.push({
            kind: "opaque",
            start,
            end: this.source.length,
            text: this.source.slice(start)
        });
    }

    private finish(): void {
        if (this.halted) return;
        const outermost = this.stack[0];
        if (outermost) {
            this.halt(outermost.open.start);
            return;
        }
        const last = this.tokens[this.tokens.length - 1];
        if (last) {
            this.closeClosures(0, last.end);
        }
    }

    // ---------------------------------------------------------------------
    // Token lookahead
    // ---------------------------------------------------------------------

    private findMatching(openIndex: number): number | null {
        const close = this.partners[openIndex];
        return this.tokens[openIndex]?.kind === "open" && close >= 0 ? close : null;
    }

    private findMatchingBackward(closeIndex: number): number | null {
        const open = this.partners[closeIndex];
        return this.tokens[closeIndex]?.kind === "close" && open >= 0 ? open : null;
    }

    /** `index` points at `<`; returns the index after the matching `>`. */
    private skipGenerics(index: number): number | null {
        let depth = 0;
        const limit = Math.min(this.tokens.length, index + MAX_LOOKAHEAD_TOKENS);
        for (let i = index; i < limit; i++) {
            const token = this.tokens[i];
            if (isPunct(token, "<")) depth++;
            else if (isPunct(token, ">")) {
                depth--;
                if (depth === 0) return i + 1;
            } else if (isPunct(token, ";") || (token.kind === "open" && token.text === "{")) {
                return null;
            }
        }
        return null;
    }

    /** `a::b::c`, skipping turbofish generics such as `signal::<i32>`. */
    private readPath(index: number): { text: string; next: number } {
        const first = this.tokens[index];
        if (first?.kind !== "ident") return { text: "", next: index };
        const segments = [first.text];
        let next = index + 1;
        while (next < this.tokens.length && isPunct(this.tokens[next], "::")) {
            const after = this.tokens[next + 1];
            if (after && isPunct(after, "<")) {
                const skipped = this.skipGenerics(next + 1);
                if (skipped === null) break;
                next = skipped;
                continue;
            }
            if (after?.kind !== "ident") break;
            segments.push(after.text);
            next += 2;
        }
        return { text: segments.join("::"), next };
    }
}

/**
 * Pairs every delimiter with its partner in one pass. Pairing follows
 * nesting only, so `(]` pairs as well; the scan pass reports the mismatch.
 */
function pairDelimiters(tokens: readonly Token[]): Int32Array {
    const partners = new Int32Array(tokens.length).fill(-1);
    const open: number[] = [];
    tokens.forEach((token, index) => {
        if (token.kind === "open") {
            open.push(index);
        } else if (token.kind === "close") {
            const partner = open.pop();
            if (partner !== undefined) {
                partners[partner] = index;
                partners[index] = partner;
            }
        }
    });
    return partners;
}

function isPunct(token: Token, text: string): boolean {
    return token.kind === "punct" && token.text === text;
}

function isClose(token: Token, text: string): boolean {
    return token.kind === "close" && token.text === text;
}

function endsOperand(token: Token): boolean {
    switch (token.kind) {
        case "number":
        case "string":
        case "char":
        case "close":
            return true;
        case "ident":
            return !EXPRESSION_KEYWORDS.has(token.text);
        case "punct":
            return token.text === "?";
        default:
            return false;
    }
}

function matchFactory(path: string, factories: readonly string[]): string | null {
    for (const factory of factories) {
        if (path === factory || path.endsWith(`::${factory}`)) {
            return factory;
        }
    }
    return null;
}

function isOneOf<T extends string>(value: string, options: readonly T[]): value is T {
    return options.some(option => option === value);
}

function normalizeSpace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

function parseProps(params: string): ComponentProp[] {
    const props: ComponentProp[] = [];
    for (const param of splitTopLevel(params)) {
        let rest = param;
        while (rest.startsWith("#[")) {
            const close = rest.indexOf("]");
            if (close === -1) break;
            rest = rest.slice(close + 1).trim();
        }
        const match = /^(?:mut\s+)?([A-Za-z_]\w*)\s*:\s*([\s\S]+)$/.exec(rest);
        if (!match || match[1] === "self") continue;
        props.push({ name: match[1], type: normalizeSpace(match[2]) });
    }
    return props;
}
