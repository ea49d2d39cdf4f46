import { describe, it, expect } from 'vitest';
import {
    checklistFrom,
    citationsFrom,
    firstStepDescription,
    hasEvidence,
    locateArtifactSpan,
    normalizeShort,
    parseArtifacts,
    stripArtifactBlock,
    toolsUsedFrom,
} from './artifacts.js';

describe('parseArtifacts', () => {
    it('should extract the object embedded in prose and coerce a scalar checklist', () => {
        const text = 'Answer is good. {"summary": "X", "citations": ["https://a.com"], "checklist": "done"}';

        expect(parseArtifacts(text)).toEqual({
            summary: 'X',
            citations: ['https://a.com'],
            checklist: ['done'],
        });
    });

    it('should return an empty mapping when nothing parses', () => {
        expect(parseArtifacts('')).toEqual({});
        expect(parseArtifacts('no json here')).toEqual({});
        expect(parseArtifacts('{"summary": "unterminated')).toEqual({});
        expect(parseArtifacts('}}}{{{')).toEqual({});
    });

    it('should ignore top-level arrays and scalars', () => {
        expect(parseArtifacts('[1, 2, 3]')).toEqual({});
        expect(parseArtifacts('"just a string"')).toEqual({});
    });

    it('should prefer the last complete object', () => {
        const text = 'Draft: {"summary": "first"}\nCorrected: {"summary": "second"}';
        expect(parseArtifacts(text)).toEqual({ summary: 'second' });
    });

    it('should not let a malformed fragment before a valid object change the result', () => {
        const valid = '{"summary": "X", "checklist": ["a", "b"]}';
        const fragments = ['{"summary": ', '{bad json}', '{"a": "unclosed string}', '{{{'];

        for (const fragment of fragments) {
            expect(parseArtifacts(`${fragment} text ${valid}`)).toEqual(parseArtifacts(valid));
        }
    });

    it('should take the outer object rather than the last nested one', () => {
        const text = '{"summary": "outer", "meta": {"summary": "inner"}}';
        expect(parseArtifacts(text)).toEqual({ summary: 'outer', meta: { summary: 'inner' } });
    });

    it('should read JSON inside a code fence', () => {
        const text = 'Here you go:\n```json\n{"verdict": "PASS", "fixes": []}\n```';
        expect(parseArtifacts(text)).toEqual({ verdict: 'PASS', fixes: [] });
    });

    it('should handle braces inside string values', () => {
        const text = 'x {"summary": "use {curly} braces", "checklist": []} y';
        expect(parseArtifacts(text)).toEqual({ summary: 'use {curly} braces', checklist: [] });
    });

    it('should trim surrounding whitespace and quotes from strings', () => {
        const text = '{"summary": "  \\"Paris\\"  ", "citations": null}';
        expect(parseArtifacts(text)).toEqual({ summary: 'Paris', citations: [] });
    });

    it('should be deterministic', () => {
        const text = 'a {"x": 1} b {"y": [1, {"z": "q"}]}';
        expect(parseArtifacts(text)).toEqual(parseArtifacts(text));
    });
});

describe('locateArtifactSpan', () => {
    it('should report the span of the winning object', () => {
        const text = 'ab {"k": 1} cd';
        expect(locateArtifactSpan(text)).toEqual({ start: 3, end: 11, value: { k: 1 } });
    });
});

describe('stripArtifactBlock', () => {
    it('should remove the trailing JSON and an emptied code fence', () => {
        const text = 'Paris is the capital of France.\n\n```json\n{"summary": "Paris", "citations": []}\n```';
        expect(stripArtifactBlock(text)).toBe('Paris is the capital of France.');
    });

    it('should leave text without JSON unchanged apart from trimming', () => {
        expect(stripArtifactBlock('  plain answer \n')).toBe('plain answer');
    });
});

describe('normalizeShort', () => {
    it('should collapse whitespace, lowercase and truncate', () => {
        expect(normalizeShort('  Hello\n\n  World  ')).toBe('hello world');
        expect(normalizeShort('ABCDEFG', 3)).toBe('abc');
    });
});

describe('firstStepDescription', () => {
    it('should read the first step from a steps list', () => {
        const text = '{"steps": [{"id": "s1", "description": "Find the capital"}, {"id": "s2", "description": "Other"}]}';
        expect(firstStepDescription(text)).toBe('Find the capital');
    });

    it('should fall back to the first description field in broken JSON', () => {
        const text = '[{"step_id": "1", "description": "Check \\"quoted\\" facts", ';
        expect(firstStepDescription(text)).toBe('Check "quoted" facts');
    });

    it('should return undefined when there is no description', () => {
        expect(firstStepDescription('I will look this up.')).toBeUndefined();
    });
});

describe('citationsFrom', () => {
    it('should accept URLs and objects and dedupe by URL', () => {
        expect(citationsFrom([
            'https://a.com',
            { url: 'https://b.com/page', title: 'B page' },
            { link: 'https://a.com' },
            'see [1] https://c.org/x for details',
            { title: 'no url' },
            42,
        ])).toEqual([
            { url: 'https://a.com', title: 'https://a.com' },
            { url: 'https://b.com/page', title: 'B page' },
            { url: 'https://c.org/x', title: 'https://c.org/x' },
        ]);
    });

    it('should treat a single value as a list', () => {
        expect(citationsFrom('https://a.com')).toEqual([{ url: 'https://a.com', title: 'https://a.com' }]);
        expect(citationsFrom(undefined)).toEqual([]);
    });
});

describe('checklistFrom', () => {
    it('should keep non-empty text items', () => {
        expect(checklistFrom(['one', ' ', { text: 'two' }, 3])).toEqual(['one', 'two', '3']);
        expect(checklistFrom('single')).toEqual(['single']);
    });
});

describe('hasEvidence / toolsUsedFrom', () => {
    it('should detect evidence fields', () => {
        expect(hasEvidence({ citations: [] })).toBe(false);
        expect(hasEvidence({ sources: ['https://a.com'] })).toBe(true);
        expect(hasEvidence({ evidence: [{ claim: 'x' }] })).toBe(true);
        expect(hasEvidence({ answer: 'text' })).toBe(false);
    });

    it('should read method.tools_used in lowercase', () => {
        expect(toolsUsedFrom({ method: { tools_used: ['Firecrawl_Search', 1] } })).toEqual(['firecrawl_search']);
        expect(toolsUsedFrom({ method: 'none' })).toEqual([]);
    });
});
