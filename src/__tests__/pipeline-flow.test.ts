/**
 * End-to-end runs through the assembled agent with a scripted model and
 * in-process tools
 */

import { describe, it, expect } from 'vitest';
import { createAgent } from '../agent/factory.js';
import { Orchestrator } from '../pipeline/orchestrator.js';
import { StageExecutor } from '../pipeline/stage-executor.js';
import { buildStageConfigs } from '../pipeline/prompts.js';
import { parseArtifacts } from '../pipeline/artifacts.js';
import type { RunEvent, RunState } from '../pipeline/types.js';
import { testConfig } from './helpers/config.js';
import { FakeToolRegistry, StageScriptedModel, never, text, toolCall } from './helpers/fakes.js';

const QUESTION = 'What is the capital of France?';
const PLAN = '{"steps": [{"id": "s1", "description": "Recall the capital of France"}]}';
const CRITIQUE = 'No gaps.\n{"verdict": "PASS", "gaps": []}';

function states(events: RunEvent[]): RunState[] {
    return events.flatMap((event) => (event.type === 'state' ? [event.state] : []));
}

describe('pipeline flow', () => {
    it('should answer without tools when tools are disabled', async () => {
        const model = new StageScriptedModel({
            planner: [[text(PLAN)]],
            research: [[text('No tools here; this is well known.\n{"answer": "Paris", "citations": []}')]],
            critic: [[text(CRITIQUE)]],
            final: [[text('Paris\n\n{"summary": "Paris", "citations": [], "checklist": []}')]],
        });
        const agent = await createAgent(testConfig(), { tools: false, chatModel: model });
        const events: RunEvent[] = [];

        const run = await agent.orchestrator.run(QUESTION, { onEvent: (event) => events.push(event) });

        expect(run.state).toBe('done');
        expect(states(events)).toEqual(['planning', 'researching', 'critiquing', 'synthesizing', 'done']);
        expect(run.stages.map((s) => s.toolCallCount)).toEqual([0, 0, 0, 0]);
        expect(model.requests.every(({ request }) => (request.tools ?? []).length === 0)).toBe(true);
        expect(run.answer.text).toBe('Paris');
        expect(run.answer.citations).toEqual([]);
        expect(run.answer.degraded).toBe(false);
    });

    it('should carry on past a search tool that times out', async () => {
        const tools = new FakeToolRegistry({ web_search: () => never() });
        const model = new StageScriptedModel({
            planner: [[text(PLAN)]],
            research: [
                [toolCall('web_search', { query: 'capital of France' })],
                [text('The search timed out. From general knowledge: Paris.\n{"answer": "Paris", "citations": []}')],
            ],
            critic: [[text(CRITIQUE)]],
            final: [[text('Paris.\n\n{"summary": "Paris", "citations": [], "checklist": ["verify with a source"]}')]],
        });
        const executor = new StageExecutor(model, { toolTimeoutMs: 20, retryDelayMs: 0 });
        const orchestrator = new Orchestrator(executor, buildStageConfigs({ researchTools: true }), tools);
        const events: RunEvent[] = [];

        const run = await orchestrator.run(QUESTION, { onEvent: (event) => events.push(event) });

        const research = run.stages[1];
        expect(research?.issues).toContainEqual({
            kind: 'ToolInvocationError',
            message: 'web_search: Timed out after 20ms',
            toolName: 'web_search',
        });
        expect(research?.rawText).toContain('Paris');
        expect(research?.error).toBeUndefined();

        const followUp = model.requests.filter((r) => r.stage === 'research')[1]?.request;
        expect(followUp?.turns.at(-1)).toEqual({
            role: 'tool',
            content: 'ERROR: Timed out after 20ms',
            toolCalls: [],
            toolCallId: 'call-web_search',
            toolName: 'web_search',
        });

        expect(states(events)).toEqual(['planning', 'researching', 'critiquing', 'synthesizing', 'done']);
        expect(run.warnings).toContain('research: web_search: Timed out after 20ms');
        expect(run.answer.checklist).toEqual(['verify with a source']);
    });

    it('should coerce a scalar checklist in the final text', async () => {
        const finalText = 'Answer is good. {"summary": "X", "citations": ["https://a.com"], "checklist": "done"}';

        expect(parseArtifacts(finalText)).toEqual({
            summary: 'X',
            citations: ['https://a.com'],
            checklist: ['done'],
        });

        const model = new StageScriptedModel({
            planner: [[text(PLAN)]],
            research: [[text('{"answer": "X"}')]],
            critic: [[text(CRITIQUE)]],
            final: [[text(finalText)]],
        });
        const agent = await createAgent(testConfig(), { tools: false, chatModel: model });

        const run = await agent.orchestrator.run(QUESTION);

        expect(run.answer).toEqual({
            text: 'Answer is good.',
            summary: 'X',
            citations: [{ url: 'https://a.com', title: 'https://a.com' }],
            checklist: ['done'],
            degraded: false,
        });
    });
});
