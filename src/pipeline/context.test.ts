import { describe, it, expect } from 'vitest';
import { fitToBudget, renderStageContext, userTurn } from './context.js';
import type { ConversationTurn, StageResult } from './types.js';

function stageResult(overrides: Partial<StageResult>): StageResult {
    return {
        stageName: 'planner',
        rawText: '',
        artifacts: {},
        toolCallCount: 0,
        toolResults: [],
        truncated: false,
        issues: [],
        durationMs: 0,
        ...overrides,
    };
}

describe('fitToBudget', () => {
    const turns = [userTurn('a'.repeat(40)), userTurn('b'.repeat(40)), userTurn('c'.repeat(40))];

    it('should keep everything that fits', () => {
        const result = fitToBudget(turns, 30);
        expect(result.turns).toHaveLength(3);
        expect(result.truncated).toBe(false);
    });

    it('should drop the oldest turns first', () => {
        const result = fitToBudget(turns, 20);
        expect(result.turns.map((t) => t.content[0])).toEqual(['b', 'c']);
        expect(result.truncated).toBe(true);
    });

    it('should always keep the most recent turn', () => {
        const result = fitToBudget(turns, 1);
        expect(result.turns.map((t) => t.content[0])).toEqual(['c']);
        expect(result.truncated).toBe(true);
    });

    it('should not start the transcript with an orphaned tool turn', () => {
        const withTool: ConversationTurn[] = [
            userTurn('q'.repeat(400)),
            { role: 'assistant', content: '', toolCalls: [{ id: 'c1', toolName: 'search', arguments: {} }] },
            { role: 'tool', content: 'r'.repeat(40), toolCalls: [], toolCallId: 'c1' },
            userTurn('u'.repeat(40)),
        ];
        const result = fitToBudget(withTool, 20);
        expect(result.turns.map((t) => t.role)).toEqual(['user']);
    });

    it('should handle an empty transcript', () => {
        expect(fitToBudget([], 10)).toEqual({ turns: [], truncated: false });
    });
});

describe('renderStageContext', () => {
    it('should render artifacts as JSON', () => {
        const turn = renderStageContext(stageResult({ rawText: 'ignored', artifacts: { steps: [] } }));
        expect(turn.role).toBe('user');
        expect(turn.content).toBe('PLANNER OUTPUT:\n{\n  "steps": []\n}');
    });

    it('should fall back to raw text', () => {
        const turn = renderStageContext(stageResult({ stageName: 'critic', rawText: '  looks fine  ' }));
        expect(turn.content).toBe('CRITIC OUTPUT:\nlooks fine');
    });

    it('should mark a failed stage', () => {
        const turn = renderStageContext(stageResult({
            stageName: 'research',
            error: { kind: 'StageExecutionFailed', message: 'endpoint down', attempts: 3 },
        }));
        expect(turn.content).toBe('RESEARCH OUTPUT:\n(no output: endpoint down)');
    });
});
