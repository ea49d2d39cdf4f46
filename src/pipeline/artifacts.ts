/**
 * Artifact Parser
 *
 * Pulls a best-effort structured object out of freeform model text.
 * Models wrap JSON in prose and code fences, and often emit a corrected
 * object after a first draft, so the policy is: every `{` is tried as the
 * start of an object, an object that parses swallows the objects nested in
 * it, and the last one found wins. Nothing here throws; a miss returns `{}`
 * and callers fall back to the raw text.
 */

import type { Artifacts, Citation, JsonObject, JsonValue } from './types.js';

/** Fields always coerced to arrays */
export const LIST_FIELDS = ['citations', 'checklist'] as const;

const URL_PATTERN = /https?:\/\/[^\s"'<>)\]]+/;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Index just past the `}` closing the object that opens at `start`,
 * or -1 when the text ends first. Braces inside strings are ignored.
 */
function matchBrace(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
            continue;
        }
        if (ch === '"') inString = true;
        else if (ch === '{') depth++;
        else if (ch === '}') {
            depth--;
            if (depth === 0) return i + 1;
        }
    }
    return -1;
}

function tryParseObject(candidate: string): JsonObject | null {
    try {
        const parsed: unknown = JSON.parse(candidate);
        return isJsonObject(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

export interface ArtifactSpan {
    start: number;
    end: number;
    value: JsonObject;
}

/**
 * Locate the last complete, valid JSON object in `text`
 */
export function locateArtifactSpan(text: string): ArtifactSpan | null {
    let found: ArtifactSpan | null = null;
    let i = text.indexOf('{');

    while (i !== -1) {
        const end = matchBrace(text, i);
        const value = end === -1 ? null : tryParseObject(text.slice(i, end));
        if (value) {
            found = { start: i, end, value };
            i = text.indexOf('{', end);
        } else {
            i = text.indexOf('{', i + 1);
        }
    }
    return found;
}

function trimQuotes(value: string): string {
    let out = value.trim();
    while (out.length >= 2) {
        const first = out[0];
        const last = out[out.length - 1];
        if (first === last && (first === '"' || first === "'" || first === '`')) {
            out = out.slice(1, -1).trim();
        } else {
            break;
        }
    }
    return out;
}

function normalizeValue(value: JsonValue): JsonValue {
    if (typeof value === 'string') return trimQuotes(value);
    if (Array.isArray(value)) return value.map(normalizeValue);
    if (isJsonObject(value)) {
        const out: JsonObject = {};
        for (const [key, inner] of Object.entries(value)) out[key] = normalizeValue(inner);
        return out;
    }
    return value;
}

function toList(value: JsonValue): JsonValue[] {
    if (Array.isArray(value)) return value;
    if (value === null) return [];
    if (typeof value === 'string' && value === '') return [];
    return [value];
}

/**
 * Parse artifacts out of a stage's text. Pure and total.
 */
export function parseArtifacts(text: string): Artifacts {
    if (typeof text !== 'string' || text.length === 0) return {};

    const span = locateArtifactSpan(text);
    if (!span) return {};

    const artifacts: Artifacts = {};
    for (const [key, value] of Object.entries(span.value)) {
        artifacts[key] = normalizeValue(value);
    }
    for (const field of LIST_FIELDS) {
        const value = artifacts[field];
        if (value !== undefined) artifacts[field] = toList(value);
    }
    return artifacts;
}

/**
 * The text with its artifact object (and any code fence left empty) removed
 */
export function stripArtifactBlock(text: string): string {
    const span = locateArtifactSpan(text);
    const without = span ? text.slice(0, span.start) + text.slice(span.end) : text;
    return without
        .replace(/```[a-zA-Z]*\s*```/g, '')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

/**
 * Collapse whitespace, lowercase and cut to `max` characters.
 * Used to compare and quote model text compactly.
 */
export function normalizeShort(text: string, max = 200): string {
    const collapsed = text.replace(/\s+/g, ' ').trim().toLowerCase();
    return collapsed.length <= max ? collapsed : collapsed.slice(0, max);
}

function descriptionOf(entry: JsonValue | undefined): string | undefined {
    if (!isJsonObject(entry)) return undefined;
    const description = entry.description;
    return typeof description === 'string' && description.trim() ? description.trim() : undefined;
}

/**
 * Description of the first planned step in a planner's output
 */
export function firstStepDescription(text: string): string | undefined {
    const artifacts = parseArtifacts(text);
    const steps = artifacts.steps;
    if (Array.isArray(steps)) {
        const found = descriptionOf(steps[0]);
        if (found) return found;
    }
    for (const value of Object.values(artifacts)) {
        if (Array.isArray(value)) {
            const found = descriptionOf(value[0]);
            if (found) return found;
        }
    }

    // Plans emitted as a bare array, or JSON that is slightly broken
    const match = text.match(/"description"\s*:\s*"((?:[^"\\]|\\.)*)"/);
    if (match) {
        try {
            const unescaped: unknown = JSON.parse(`"${match[1]}"`);
            if (typeof unescaped === 'string' && unescaped.trim()) return unescaped.trim();
        } catch {
            return match[1].trim() || undefined;
        }
    }
    return undefined;
}

function citationFrom(value: JsonValue): Citation | null {
    if (typeof value === 'string') {
        const url = value.match(URL_PATTERN)?.[0];
        return url ? { url, title: url } : null;
    }
    if (!isJsonObject(value)) return null;

    const url = [value.url, value.link, value.href, value.source].find(
        (candidate): candidate is string => typeof candidate === 'string' && URL_PATTERN.test(candidate)
    );
    if (!url) return null;
    const title = [value.title, value.name].find(
        (candidate): candidate is string => typeof candidate === 'string' && candidate.trim() !== ''
    );
    return { url, title: title ?? url };
}

/**
 * Citations from an artifacts field, deduplicated by URL in order
 */
export function citationsFrom(value: JsonValue | undefined): Citation[] {
    if (value === undefined) return [];
    const seen = new Set<string>();
    const out: Citation[] = [];
    for (const entry of toList(value)) {
        const citation = citationFrom(entry);
        if (citation && !seen.has(citation.url)) {
            seen.add(citation.url);
            out.push(citation);
        }
    }
    return out;
}

export function checklistFrom(value: JsonValue | undefined): string[] {
    if (value === undefined) return [];
    return toList(value)
        .map((entry) => {
            if (typeof entry === 'string') return entry.trim();
            if (typeof entry === 'number' || typeof entry === 'boolean') return String(entry);
            if (isJsonObject(entry)) {
                const text = [entry.text, entry.item, entry.description, entry.action].find(
                    (candidate): candidate is string => typeof candidate === 'string'
                );
                return text?.trim() ?? '';
            }
            return '';
        })
        .filter((item) => item.length > 0);
}

/**
 * Whether artifacts carry any evidence a research stage could cite
 */
export function hasEvidence(artifacts: Artifacts): boolean {
    return ['citations', 'sources', 'evidence', 'evidence_table'].some((key) => {
        const value = artifacts[key];
        if (value === undefined || value === null) return false;
        if (Array.isArray(value)) return value.length > 0;
        if (typeof value === 'string') return value.trim() !== '';
        if (isJsonObject(value)) return Object.keys(value).length > 0;
        return Boolean(value);
    });
}

/**
 * Tool names a research stage says it used (`method.tools_used`)
 */
export function toolsUsedFrom(artifacts: Artifacts): string[] {
    const method = artifacts.method;
    if (!isJsonObject(method)) return [];
    const used = method.tools_used;
    if (!Array.isArray(used)) return typeof used === 'string' && used ? [used.toLowerCase()] : [];
    return used.filter((t): t is string => typeof t === 'string').map((t) => t.toLowerCase());
}
