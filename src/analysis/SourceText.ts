import { tokenize } from './Tokenizer.js';

/** `||`, `|ev|`, `move |a, b|`, optionally inside a leading brace. */
const CLOSURE_HEAD = /^\{?\s*(move\s+)?(\|\||\|([^|]*)\|)/;

const PATTERN_KEYWORDS = new Set(["mut", "ref", "_"]);

/**
 * Splits on a separator that is not nested inside brackets, generics or a
 * string literal. `->` and `=>` do not close a generic.
 */
export function splitTopLevel(text: string, separator = ","): string[] {
    const parts: string[] = [];
    let depth = 0;
    let current = "";
    let inString = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            current += ch;
            if (ch === "\\") {
                current += text[i + 1] ?? "";
                i++;
            } else if (ch === '"') {
                inString = false;
            }
            continue;
        }
        if (ch === '"') {
            inString = true;
            current += ch;
            continue;
        }
        if (ch === "(" || ch === "[" || ch === "{" || ch === "<") {
            depth++;
        } else if (ch === ")" || ch === "]" || ch === "}" || (ch === ">" && text[i - 1] !== "-" && text[i - 1] !== "=")) {
            depth = Math.max(0, depth - 1);
        }
        if (ch === separator && depth === 0) {
            parts.push(current);
            current = "";
            continue;
        }
        current += ch;
    }
    parts.push(current);
    return parts.map(part => part.trim()).filter(part => part.length > 0);
}

/** Names bound by a closure parameter list such as `ev`, `(a, b): (i32, i32)`, `&mut x`. */
export function parseClosureParams(paramText: string): string[] {
    const names: string[] = [];
    for (const param of splitTopLevel(paramText)) {
        const pattern = stripTypeAnnotation(param);
        for (const match of pattern.matchAll(/[A-Za-z_]\w*/g)) {
            const name = match[0];
            // Uppercase names are enum or struct paths in patterns
            if (PATTERN_KEYWORDS.has(name) || /^[A-Z]/.test(name)) continue;
            if (!names.includes(name)) names.push(name);
        }
    }
    return names;
}

function stripTypeAnnotation(param: string): string {
    let depth = 0;
    for (let i = 0; i < param.length; i++) {
        const ch = param[i];
        if (ch === "(" || ch === "[") depth++;
        else if (ch === ")" || ch === "]") depth--;
        else if (ch === ":" && depth === 0 && param[i + 1] !== ":" && param[i - 1] !== ":") {
            return param.slice(0, i);
        }
    }
    return param;
}

export interface ClosureHead {
    isMove: boolean;
    /** `||` or `|params|` as written */
    head: string;
    params: string[];
}

export function readClosureHead(text: string): ClosureHead | null {
    const match = CLOSURE_HEAD.exec(text.trim());
    if (!match) return null;
    return {
        isMove: match[1] !== undefined,
        head: match[2],
        params: match[3] === undefined ? [] : parseClosureParams(match[3])
    };
}

export function stripBraces(text: string): string {
    const trimmed = text.trim();
    if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
        return trimmed.slice(1, -1).trim();
    }
    return trimmed;
}

/** A single string, char, number or boolean literal, optionally negated. */
export function isLiteral(text: string): boolean {
    const tokens = tokenize(stripBraces(text));
    const [first, second] = tokens;
    if (tokens.length === 2 && first.kind === "punct" && first.text === "-") {
        return second.kind === "number";
    }
    if (tokens.length !== 1) return false;
    return first.kind === "string" || first.kind === "char" || first.kind === "number"
        || (first.kind === "ident" && (first.text === "true" || first.text === "false"));
}

export function toPascalCase(name: string): string {
    return name
        .split("_")
        .filter(Boolean)
        .map(part => part[0].toUpperCase() + part.slice(1))
        .join("");
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
