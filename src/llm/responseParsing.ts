import { isRecord } from '../models/validation';

const tryParseObject = (text: string): Record<string, unknown> | undefined => {
    try {
        const parsed: unknown = JSON.parse(text);
        return isRecord(parsed) ? parsed : undefined;
    } catch {
        return undefined;
    }
};

const JSON_PATTERNS = [
    /```json\s*(\{[\s\S]*?\})\s*```/,
    /```\s*(\{[\s\S]*?\})\s*```/,
    /(\{[\s\S]*\})/
];

/**
 * Extract a JSON object from model output: the whole text, a fenced block,
 * or the outermost braces, in that order.
 */
export const parseJsonObject = (content: string): Record<string, unknown> | undefined => {
    const direct = tryParseObject(content.trim());
    if (direct) {
        return direct;
    }

    for (const pattern of JSON_PATTERNS) {
        const match = pattern.exec(content);
        if (match) {
            const parsed = tryParseObject(match[1]);
            if (parsed) {
                return parsed;
            }
        }
    }

    return undefined;
};

export type BooleanTieBreak = 'prefer-true' | 'last-occurrence';

/**
 * Read a true/false answer. An exact answer wins; otherwise whole-word
 * occurrences decide, either preferring true or taking whichever comes last.
 */
export const parseBooleanAnswer = (content: string, tieBreak: BooleanTieBreak): boolean | undefined => {
    const trimmed = content.trim().replace(/^["'`*]+|["'`*.]+$/g, '').toLowerCase();
    if (trimmed === 'true') {
        return true;
    }
    if (trimmed === 'false') {
        return false;
    }

    const lower = content.toLowerCase();
    const trueMatches = [...lower.matchAll(/\btrue\b/g)];
    const falseMatches = [...lower.matchAll(/\bfalse\b/g)];

    if (trueMatches.length === 0 && falseMatches.length === 0) {
        return undefined;
    }
    if (tieBreak === 'prefer-true') {
        return trueMatches.length > 0;
    }

    const lastTrue = trueMatches.length > 0 ? trueMatches[trueMatches.length - 1].index ?? -1 : -1;
    const lastFalse = falseMatches.length > 0 ? falseMatches[falseMatches.length - 1].index ?? -1 : -1;
    return lastTrue > lastFalse;
};

export const readStringField = (source: Record<string, unknown>, ...keys: string[]): string | undefined => {
    for (const key of keys) {
        const value = source[key];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
    }
    return undefined;
};
