import { describe, it, expect, vi } from 'vitest';
import { createAgent, createChatModel } from './factory.js';
import { DefaultToolRegistry, LocalToolProvider } from '../tools/registry.js';
import type { LocalTool } from '../tools/types.js';
import { testConfig } from '../__tests__/helpers/config.js';
import { StageScriptedModel, text, toolCall } from '../__tests__/helpers/fakes.js';

const lookup: LocalTool = {
    definition: { name: 'lookup', description: 'Look a fact up', inputSchema: {} },
    run: async () => 'Paris is the capital of France.',
};

function scriptedModel(): StageScriptedModel {
    return new StageScriptedModel({
        planner: [[text('{"steps": [{"id": "s1", "description": "Find the capital"}]}')]],
        research: [
            [toolCall('lookup', {})],
            [text('{"answer": "Paris", "citations": [{"url": "https://a.com", "title": "A"}]}')],
        ],
        critic: [[text('{"verdict": "PASS"}')]],
        final: [[text('Paris.\n\n{"summary": "Paris", "citations": [], "checklist": []}')]],
    });
}

describe('createChatModel', () => {
    it('should use the configured model unless overridden', () => {
        expect(createChatModel(testConfig({ defaultModel: 'org/model-a' })).model).toBe('org/model-a');
        expect(createChatModel(testConfig(), 'org/model-b').model).toBe('org/model-b');
    });
});

describe('createAgent', () => {
    it('should attach the registry to research when it has tools', async () => {
        const registry = new DefaultToolRegistry([new LocalToolProvider('local', [lookup])]);
        const close = vi.spyOn(registry, 'close');
        const chatModel = scriptedModel();

        const agent = await createAgent(testConfig(), {
            chatModel,
            createRegistry: async () => registry,
        });
        const run = await agent.orchestrator.run('What is the capital of France?');

        expect(agent.model).toBe('fake-model');
        expect(run.state).toBe('done');
        expect(run.stages[1]?.toolCallCount).toBe(1);
        expect(chatModel.requests.filter((r) => (r.request.tools ?? []).length > 0).map((r) => r.stage)).toEqual(['research', 'research']);

        await agent.close();
        expect(close).toHaveBeenCalledTimes(1);
    });

    it('should skip the registry entirely when tools are turned off', async () => {
        const createRegistry = vi.fn(async () => new DefaultToolRegistry());
        const chatModel = new StageScriptedModel({
            planner: [[text('{"steps": []}')]],
            research: [[text('{"answer": "Paris"}')]],
            critic: [[text('{"verdict": "PASS"}')]],
            final: [[text('Paris.')]],
        });

        const agent = await createAgent(testConfig(), { tools: false, chatModel, createRegistry });
        const run = await agent.orchestrator.run('What is the capital of France?');

        expect(createRegistry).not.toHaveBeenCalled();
        expect(agent.registry).toBeUndefined();
        expect(run.answer.text).toBe('Paris.');
        await expect(agent.close()).resolves.toBeUndefined();
    });

    it('should pass requireTools through to the registry factory', async () => {
        const createRegistry = vi.fn(async () => new DefaultToolRegistry());

        await createAgent(testConfig(), { chatModel: scriptedModel(), requireTools: true, createRegistry });

        expect(createRegistry).toHaveBeenCalledWith(expect.objectContaining({ llmApiKey: 'test-secret' }), { requireTools: true });
    });
});
