/**
 * Tool registry - merges tools from every provider and dispatches calls
 */

import { ArgumentValidator, describeArgs, type ToolArgs } from './arguments.js';
import type { LocalTool, ToolCallOptions, ToolDefinition, ToolProvider, ToolRegistry } from './types.js';
import type { JsonValue, ToolResult } from '../pipeline/types.js';
import { ToolArgumentsError, describeError } from '../errors.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('tools');

/**
 * Wraps in-process tools so they sit behind the same interface as a server
 */
export class LocalToolProvider implements ToolProvider {
    constructor(
        readonly name: string,
        private readonly localTools: LocalTool[]
    ) {}

    tools(): ToolDefinition[] {
        return this.localTools.map((tool) => ({ ...tool.definition, server: this.name }));
    }

    async call(toolName: string, args: ToolArgs, options: ToolCallOptions): Promise<JsonValue> {
        const tool = this.localTools.find((t) => t.definition.name === toolName);
        if (!tool) throw new Error(`Unknown tool: ${toolName}`);
        return tool.run(args, options);
    }
}

export interface ServerSummary {
    name: string;
    tools: string[];
}

export class DefaultToolRegistry implements ToolRegistry {
    private providers: ToolProvider[] = [];
    private validator = new ArgumentValidator();

    constructor(providers: ToolProvider[] = []) {
        for (const provider of providers) this.add(provider);
    }

    add(provider: ToolProvider): void {
        this.providers.push(provider);
    }

    /**
     * All tools, first provider wins when two advertise the same name
     */
    list(): ToolDefinition[] {
        return [...this.index().values()].map((entry) => entry.definition);
    }

    has(name: string): boolean {
        return this.index().has(name);
    }

    servers(): ServerSummary[] {
        return this.providers.map((provider) => ({
            name: provider.name,
            tools: provider.tools().map((t) => t.name),
        }));
    }

    async invoke(name: string, args: ToolArgs, options: ToolCallOptions = {}): Promise<ToolResult> {
        const entry = this.index().get(name);
        if (!entry) {
            log.warn(`Model asked for unknown tool ${name}`);
            return { toolName: name, output: null, error: `Unknown tool: ${name}` };
        }

        const problems = this.validator.validate(name, entry.definition.inputSchema, args);
        if (problems.length > 0) {
            const error = new ToolArgumentsError(name, problems);
            log.warn(error.message);
            return { toolName: name, output: null, error: error.message };
        }

        log.info(`→ ${name} ${describeArgs(args)}`);
        const startedAt = Date.now();
        try {
            const output = await entry.provider.call(name, args, options);
            log.info(`← ${name} ok in ${Date.now() - startedAt}ms`);
            return { toolName: name, output };
        } catch (error) {
            const message = describeError(error);
            log.warn(`← ${name} failed in ${Date.now() - startedAt}ms: ${message}`);
            return { toolName: name, output: null, error: message };
        }
    }

    async close(): Promise<void> {
        const results = await Promise.allSettled(
            this.providers.map((provider) => provider.close?.() ?? Promise.resolve())
        );
        results.forEach((result, i) => {
            if (result.status === 'rejected') {
                log.warn(`Closing ${this.providers[i]?.name ?? 'provider'} failed: ${describeError(result.reason)}`);
            }
        });
    }

    private index(): Map<string, { definition: ToolDefinition; provider: ToolProvider }> {
        const byName = new Map<string, { definition: ToolDefinition; provider: ToolProvider }>();
        for (const provider of this.providers) {
            for (const definition of provider.tools()) {
                const existing = byName.get(definition.name);
                if (existing) {
                    log.debug(`Tool ${definition.name} from ${provider.name} shadowed by ${existing.provider.name}`);
                    continue;
                }
                byName.set(definition.name, { definition, provider });
            }
        }
        return byName;
    }
}
