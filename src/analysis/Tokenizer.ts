export type TokenKind =
    | "ident"
    | "punct"
    | "string"
    | "char"
    | "number"
    | "lifetime"
    | "open"
    | "close";

export interface Token {
    kind: TokenKind;
    text: string;
    start: number;
    end: number;
}

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);

/** Longest first so `::` wins over `:`. */
const MULTI_CHAR_PUNCT = [
    "::", "->", "=>", "==", "!=", "<=", ">=", "&&", "||", "..",
    "+=", "-=", "*=", "/=", "%=", "^=", "&=", "|="
];

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

/**
 * Lexes Rust source into a flat token list. Comments are dropped; string,
 * raw string, byte string and char literals become single tokens. Never
 * throws: an unterminated literal or comment runs to the end of the input.
 */
export function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    const length = source.length;
    let i = 0;

    const push = (kind: TokenKind, start: number, end: number) => {
        tokens.push({ kind, text: source.slice(start, end), start, end });
    };

    while (i < length) {
        const char = source[i];
        const next = source[i + 1];

        if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
            i++;
            continue;
        }

        if (char === '/' && next === '/') {
            while (i < length && source[i] !== '\n') i++;
            continue;
        }

        if (char === '/' && next === '*') {
            i = skipBlockComment(source, i);
            continue;
        }

        if (char === '"') {
            const end = readQuoted(source, i + 1);
            push("string", i, end);
            i = end;
            continue;
        }

        // r"..", r#".."#, b"..", br#".."#, b'x'
        if (char === 'r' || char === 'b') {
            const literalEnd = readPrefixedLiteral(source, i);
            if (literalEnd !== null) {
                push(source[literalEnd.quoteIndex] === '\'' ? "char" : "string", i, literalEnd.end);
                i = literalEnd.end;
                continue;
            }
        }

        if (char === '\'') {
            const charEnd = readCharLiteral(source, i);
            if (charEnd !== null) {
                push("char", i, charEnd);
                i = charEnd;
                continue;
            }
            // Lifetime or loop label
            let end = i + 1;
            while (end < length && IDENT_PART.test(source[end])) end++;
            push("lifetime", i, end);
            i = end;
            continue;
        }

        if (IDENT_START.test(char)) {
            let end = i + 1;
            while (end < length && IDENT_PART.test(source[end])) end++;
            push("ident", i, end);
            i = end;
            continue;
        }

        if (DIGIT.test(char)) {
            let end = i + 1;
            while (end < length && /[0-9A-Za-z_.]/.test(source[end])) {
                // `0..10` is a range, not a float
                if (source[end] === '.' && source[end + 1] === '.') break;
                // `1.max(2)` is a method call
                if (source[end] === '.' && !DIGIT.test(source[end + 1] ?? '')) break;
                end++;
            }
            push("number", i, end);
            i = end;
            continue;
        }

        if (OPENERS.has(char)) {
            push("open", i, i + 1);
            i++;
            continue;
        }

        if (CLOSERS.has(char)) {
            push("close", i, i + 1);
            i++;
            continue;
        }

        const multi = MULTI_CHAR_PUNCT.find(op => source.startsWith(op, i));
        if (multi) {
            push("punct", i, i + multi.length);
            i += multi.length;
            continue;
        }

        push("punct", i, i + 1);
        i++;
    }

    return tokens;
}

function skipBlockComment(source: string, start: number): number {
    let depth = 0;
    let i = start;
    while (i < source.length) {
        if (source[i] === '/' && source[i + 1] === '*') {
            depth++;
            i += 2;
            continue;
        }
        if (source[i] === '*' && source[i + 1] === '/') {
            depth--;
            i += 2;
            if (depth === 0) return i;
            continue;
        }
        i++;
    }
    return source.length;
}

/** `from` is the index after the opening quote; returns the index after the closing one. */
function readQuoted(source: string, from: number, quote = '"'): number {
    let i = from;
    while (i < source.length) {
        const char = source[i];
        if (char === '\\') {
            i += 2;
            continue;
        }
        if (char === quote) return i + 1;
        i++;
    }
    return source.length;
}

function readPrefixedLiteral(source: string, start: number): { end: number; quoteIndex: number } | null {
    let i = start;
    if (source[i] === 'b') i++;
    const raw = source[i] === 'r';
    if (raw) i++;
    if (i === start) return null;

    // Must not be the tail of a longer identifier such as `bar"`
    if (start > 0 && IDENT_PART.test(source[start - 1])) return null;

    if (raw) {
        let hashes = 0;
        while (source[i] === '#') {
            hashes++;
            i++;
        }
        if (source[i] !== '"') return null;
        const quoteIndex = i;
        const terminator = '"' + '#'.repeat(hashes);
        const close = source.indexOf(terminator, i + 1);
        return { end: close === -1 ? source.length : close + terminator.length, quoteIndex };
    }

    if (source[i] === '"') {
        return { end: readQuoted(source, i + 1), quoteIndex: i };
    }
    if (source[i] === '\'') {
        const end = readCharLiteral(source, i);
        return end === null ? null : { end, quoteIndex: i };
    }
    return null;
}

/** Distinguishes `'a'` / `'\n'` from the lifetime `'a`. */
function readCharLiteral(source: string, start: number): number | null {
    const first = source[start + 1];
    if (first === undefined) return null;
    if (first === '\\') {
        const close = source.indexOf('\'', start + 2);
        if (close === -1 || close - start > 12) return null;
        return close + 1;
    }
    const codePoint = source.codePointAt(start + 1);
    const width = codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
    if (source[start + 1 + width] === '\'') {
        return start + 2 + width;
    }
    return null;
}
