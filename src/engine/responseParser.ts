// src/engine/responseParser.ts

/**
 * Tolerant parser for decision-source replies
 *
 * The reply is free text that should contain, somewhere, an object like
 * {"slots": [1, 3, 5], "reason": "..."}. Nothing about the producer is
 * trusted: quotes may be typographic, keys bare, commas trailing.
 *
 * Returns the raw slot list (entries not yet coerced) or null when no usable
 * structure exists - the caller then takes the validator's fallback path.
 */

const PREFERRED_KEYS = ['slots', 'channels'];

export interface ParsedProposal {
    key: string;
    entries: unknown[];
    normalized: boolean;  // true when the strict parse failed and repair was needed
}

export function parseProposal(text: string): ParsedProposal | null {
    const block = extractBalancedBlock(text);
    if (block === null) {
        return null;
    }

    const strict = tryParseObject(block);
    if (strict) {
        return pickSlotList(strict, false);
    }

    const repaired = tryParseObject(normalizeJson(block));
    if (repaired) {
        return pickSlotList(repaired, true);
    }

    return null;
}

/**
 * First balanced {...} substring, ignoring braces inside quoted strings
 */
export function extractBalancedBlock(text: string): string | null {
    const start = text.indexOf('{');
    if (start === -1) {
        return null;
    }

    let depth = 0;
    let quote: string | null = null;
    for (let i = start; i < text.length; i++) {
        const ch = text[i];

        if (quote) {
            if (ch === '\\') {
                i++;
            } else if (ch === quote) {
                quote = null;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '{') {
            depth++;
        } else if (ch === '}') {
            depth--;
            if (depth === 0) {
                return text.slice(start, i + 1);
            }
        }
    }

    return null;
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[\w-]/;

/**
 * One-shot repair of common non-JSON output
 *
 * Scans the block once so that only structure is rewritten: single-quoted
 * strings become double-quoted, bare keys get quoted, full-width
 * separators, stray semicolons and trailing commas are fixed. Text inside
 * strings is left as written.
 */
export function normalizeJson(block: string): string {
    const text = block.replace(/[“”„‟″＂]/g, '"').replace(/[‘’‚‛′]/g, "'");
    let out = '';
    let quote: string | null = null;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (quote) {
            if (ch === '\\') {
                const next = text[i + 1] ?? '';
                out += next === "'" ? "'" : ch + next;
                i++;
            } else if (ch === quote) {
                out += '"';
                quote = null;
            } else if (ch === '"') {
                out += '\\"';
            } else {
                out += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            out += '"';
        } else if (ch === '，' || ch === ',') {
            if (!/[}\]]/.test(nextSignificant(text, i + 1))) {
                out += ',';
            }
        } else if (ch === '：') {
            out += ':';
        } else if (ch === ';') {
            continue;
        } else if (IDENTIFIER_START.test(ch)) {
            let end = i + 1;
            while (end < text.length && IDENTIFIER_PART.test(text[end])) {
                end++;
            }
            const word = text.slice(i, end);
            const isKey = /[:：]/.test(nextSignificant(text, end));
            out += isKey ? `"${word}"` : word;
            i = end - 1;
        } else {
            out += ch;
        }
    }

    return out;
}

/**
 * First non-whitespace character at or after `from` ('' at end of text)
 */
function nextSignificant(text: string, from: number): string {
    for (let i = from; i < text.length; i++) {
        if (!/\s/.test(text[i])) {
            return text[i];
        }
    }
    return '';
}

function tryParseObject(json: string): Record<string, unknown> | null {
    try {
        const value: unknown = JSON.parse(json);
        return isPlainObject(value) ? value : null;
    } catch {
        return null;
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickSlotList(data: Record<string, unknown>, normalized: boolean): ParsedProposal | null {
    for (const key of PREFERRED_KEYS) {
        const value = data[key];
        if (Array.isArray(value)) {
            return { key, entries: value, normalized };
        }
    }

    for (const [key, value] of Object.entries(data)) {
        if (Array.isArray(value) && value.some(isIntegerLike)) {
            return { key, entries: value, normalized };
        }
    }

    return null;
}

/**
 * Coerce an entry to an integer slot candidate (truncating toward zero)
 * Accepts finite numbers and numeric strings; anything else yields null.
 */
export function coerceSlot(entry: unknown): number | null {
    let value: number;
    if (typeof entry === 'number') {
        value = entry;
    } else if (typeof entry === 'string' && entry.trim() !== '') {
        value = Number(entry.trim());
    } else {
        return null;
    }
    // + 0 folds -0 into 0
    return Number.isFinite(value) ? Math.trunc(value) + 0 : null;
}

function isIntegerLike(entry: unknown): boolean {
    return coerceSlot(entry) !== null;
}
