import type { JsonValue, ToolResult } from '../pipeline/types.js';
import type { ToolArgs } from './arguments.js';

export interface ToolDefinition {
    name: string;
    description: string;
    /** JSON Schema for the arguments, as advertised by the tool's server */
    inputSchema: Record<string, unknown>;
    /** Name of the server or provider that owns the tool */
    server: string;
}

export interface ToolCallOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

/**
 * One source of tools: a remote MCP server or a set of in-process tools.
 * `call` throws on failure; the registry turns that into a ToolResult.
 */
export interface ToolProvider {
    readonly name: string;
    tools(): ToolDefinition[];
    call(toolName: string, args: ToolArgs, options: ToolCallOptions): Promise<JsonValue>;
    close?(): Promise<void>;
}

/**
 * What the stage executor sees. `invoke` never throws for a tool failure;
 * failures come back in `ToolResult.error`.
 */
export interface ToolRegistry {
    list(): ToolDefinition[];
    invoke(name: string, args: ToolArgs, options?: ToolCallOptions): Promise<ToolResult>;
}

/**
 * A tool implemented in this process
 */
export interface LocalTool {
    definition: Omit<ToolDefinition, 'server'>;
    run(args: ToolArgs, options: ToolCallOptions): Promise<JsonValue>;
}
