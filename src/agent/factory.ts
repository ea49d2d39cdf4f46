/**
 * Agent assembly: one model client, one shared tool registry, one
 * orchestrator, all built from an explicit Config.
 */

import { ChatCompletionsClient, type ChatModel } from '../clients/chat-completions.js';
import { stageConfigsFrom, type Config } from '../config.js';
import { Orchestrator } from '../pipeline/orchestrator.js';
import { StageExecutor } from '../pipeline/stage-executor.js';
import { createToolRegistry, type ToolRegistryFactoryOptions } from '../tools/factory.js';
import type { DefaultToolRegistry } from '../tools/registry.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('agent');

export interface AgentOptions {
    /** Attach tools to the research stage (default true) */
    tools?: boolean;
    /** Fail instead of running tool-less when no tool source connects */
    requireTools?: boolean;
    /** Override the configured model id */
    model?: string;
    /** Swap the model client (tests) */
    chatModel?: ChatModel;
    /** Swap how the registry is built (tests) */
    createRegistry?: (config: Config, options: ToolRegistryFactoryOptions) => Promise<DefaultToolRegistry>;
}

export interface Agent {
    readonly model: string;
    readonly orchestrator: Orchestrator;
    readonly registry?: DefaultToolRegistry;
    close(): Promise<void>;
}

export function createChatModel(config: Config, model?: string): ChatModel {
    return new ChatCompletionsClient({
        apiKey: config.llmApiKey,
        baseUrl: config.llmBaseUrl,
        model: model ?? config.defaultModel,
        topP: config.modelTopP,
        thinking: config.modelThinking,
        timeoutMs: config.modelTimeoutMs,
    });
}

export async function createAgent(config: Config, options: AgentOptions = {}): Promise<Agent> {
    const chatModel = options.chatModel ?? createChatModel(config, options.model);
    const toolsWanted = options.tools !== false;

    const executor = new StageExecutor(chatModel, {
        maxToolRounds: config.maxToolRounds,
        modelRetries: config.modelRetries,
        modelTimeoutMs: config.modelTimeoutMs,
        toolTimeoutMs: config.toolTimeoutMs,
        stageTimeoutMs: config.stageTimeoutMs,
        contextTokenBudget: config.contextTokenBudget,
    });

    let registry: DefaultToolRegistry | undefined;
    if (toolsWanted) {
        const build = options.createRegistry ?? createToolRegistry;
        registry = await build(config, { requireTools: options.requireTools });
    }

    const stages = stageConfigsFrom(config, { tools: toolsWanted && (registry?.list().length ?? 0) > 0 });
    const orchestrator = new Orchestrator(executor, stages, registry, {
        researchPreference: config.researchPreference,
    });

    log.debug(`agent ready: model=${chatModel.model} tools=${registry?.list().length ?? 0}`);

    return {
        model: chatModel.model,
        orchestrator,
        registry,
        close: async () => {
            await registry?.close();
        },
    };
}
