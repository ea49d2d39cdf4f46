/**
 * MCP tool server - one long-lived SSE connection to a remote MCP server.
 * Discovers tools on connect and refreshes them when the server says the
 * list changed.
 */

import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { ToolListChangedNotificationSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolArgs } from './arguments.js';
import type { ToolCallOptions, ToolDefinition, ToolProvider } from './types.js';
import type { JsonValue } from '../pipeline/types.js';
import { ToolInvocationError, describeError } from '../errors.js';
import { abortable, createTimeoutSignal } from '../utils/abort.js';
import { createModuleLogger } from '../logger.js';
import { VERSION } from '../version.js';

const log = createModuleLogger('mcp');

export const DEFAULT_CONNECT_TIMEOUT_MS = 25_000;

export interface McpServerConfig {
    name: string;
    url: string;
    headers?: Record<string, string>;
    connectTimeoutMs?: number;
}

export type McpServerState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface McpServerStatus {
    name: string;
    state: McpServerState;
    toolCount: number;
    error?: string;
}

const ContentBlockSchema = z.object({
    type: z.string(),
    text: z.string().optional(),
    mimeType: z.string().optional(),
    resource: z.object({
        uri: z.string(),
        text: z.string().optional(),
    }).passthrough().optional(),
}).passthrough();

const CallResultSchema = z.object({
    content: z.array(ContentBlockSchema).default([]),
    isError: z.boolean().optional(),
}).passthrough();

export function flattenContent(blocks: z.infer<typeof ContentBlockSchema>[]): string {
    return blocks
        .map((block) => {
            if (block.type === 'text') return block.text ?? '';
            if (block.type === 'image') return `[image: ${block.mimeType ?? 'unknown'}]`;
            if (block.type === 'resource' && block.resource) {
                return block.resource.text ?? `[resource: ${block.resource.uri}]`;
            }
            return `[${block.type}]`;
        })
        .join('\n');
}

/**
 * Hides the key embedded in hosted MCP URLs when logging
 */
export function redactUrl(url: string): string {
    return url.replace(/(https?:\/\/[^/]+\/)([^/]{12,})(\/)/, '$1***$3');
}

export class McpToolServer implements ToolProvider {
    readonly name: string;
    private readonly config: McpServerConfig;
    private client: Client | null = null;
    private discovered: ToolDefinition[] = [];
    private _status: McpServerStatus;
    private disposed = false;
    private connecting: Promise<void> | null = null;

    constructor(config: McpServerConfig) {
        this.config = config;
        this.name = config.name;
        this._status = { name: config.name, state: 'disconnected', toolCount: 0 };
    }

    get status(): McpServerStatus {
        return { ...this._status };
    }

    tools(): ToolDefinition[] {
        return [...this.discovered];
    }

    /**
     * Connect and discover tools, giving up after the connect timeout.
     * Concurrent callers share one attempt.
     */
    connect(): Promise<void> {
        if (!this.connecting) {
            this.connecting = this.open().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    private async open(): Promise<void> {
        if (this.client) await this.close();

        this.disposed = false;
        this._status = { ...this._status, state: 'connecting', error: undefined };
        const timeoutMs = this.config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        const timeout = createTimeoutSignal(timeoutMs);

        const client = new Client({ name: 'stageline', version: VERSION }, { capabilities: {} });
        const transport = new SSEClientTransport(new URL(this.config.url), {
            requestInit: { headers: this.config.headers ?? {} },
        });

        try {
            client.onclose = () => {
                if (!this.disposed) {
                    log.warn(`Connection to ${this.name} closed unexpectedly`);
                    this.client = null;
                    this._status = { ...this._status, state: 'disconnected' };
                }
            };

            await abortable(client.connect(transport), timeout.signal);
            if (this.disposed) throw new Error('Closed while connecting');
            this.client = client;

            client.setNotificationHandler(ToolListChangedNotificationSchema, async () => {
                log.info(`Tool list changed for ${this.name}, refreshing`);
                try {
                    await this.refreshTools();
                } catch (error) {
                    log.warn(`Refreshing tools for ${this.name} failed: ${describeError(error)}`);
                }
            });

            await abortable(this.refreshTools(), timeout.signal);
            this._status = { ...this._status, state: 'connected', toolCount: this.discovered.length };
            log.info(`Connected to ${this.name} (${redactUrl(this.config.url)}), ${this.discovered.length} tool(s)`);
        } catch (error) {
            const message = timeout.timedOut()
                ? `Timed out after ${timeoutMs}ms`
                : describeError(error);
            this._status = { ...this._status, state: 'error', error: message, toolCount: 0 };
            this.disposed = true;
            this.client = null;
            await client.close().catch((closeError: unknown) => {
                log.debug(`Closing ${this.name} after failed connect: ${describeError(closeError)}`);
            });
            throw new ToolInvocationError(this.name, `Could not connect to ${this.name}: ${message}`);
        } finally {
            timeout.cleanup();
        }
    }

    async refreshTools(): Promise<ToolDefinition[]> {
        if (!this.client) throw new Error(`Not connected to ${this.name}`);

        const result = await this.client.listTools();
        this.discovered = result.tools.map((tool) => ({
            name: tool.name,
            description: tool.description ?? '',
            inputSchema: { ...tool.inputSchema },
            server: this.name,
        }));
        this._status.toolCount = this.discovered.length;
        return this.discovered;
    }

    async call(toolName: string, args: ToolArgs, options: ToolCallOptions): Promise<JsonValue> {
        if (!this.client && !this.disposed) {
            if (!this.connecting) log.info(`Reconnecting to ${this.name}`);
            await this.connect();
        }
        const client = this.client;
        if (!client) throw new ToolInvocationError(toolName, `Not connected to MCP server ${this.name}`);

        const raw = await client.callTool(
            { name: toolName, arguments: args },
            undefined,
            {
                signal: options.signal,
                ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
            }
        );

        const parsed = CallResultSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ToolInvocationError(toolName, `Unexpected result shape from ${toolName}`);
        }
        const text = flattenContent(parsed.data.content);
        if (parsed.data.isError) {
            throw new ToolInvocationError(toolName, text || `${toolName} reported an error`);
        }
        return text;
    }

    async close(): Promise<void> {
        this.disposed = true;
        const client = this.client;
        this.client = null;
        this.discovered = [];
        this._status = { ...this._status, state: 'disconnected', toolCount: 0 };
        if (client) await client.close();
    }
}
