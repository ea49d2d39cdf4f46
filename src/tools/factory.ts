/**
 * Builds the tool registry from configuration: the Firecrawl MCP server,
 * any extra SSE servers, and the optional Tavily search tool.
 */

import type { Config } from '../config.js';
import { ConfigError, describeError } from '../errors.js';
import { TavilyClient } from '../clients/tavily.js';
import { createModuleLogger } from '../logger.js';
import { createInternetSearchTool } from './internet-search.js';
import { McpToolServer, type McpServerConfig } from './mcp-server.js';
import { DefaultToolRegistry, LocalToolProvider } from './registry.js';
import type { ToolProvider } from './types.js';

const log = createModuleLogger('tool-factory');

export const FIRECRAWL_SERVER = 'firecrawl';
export const LOCAL_PROVIDER = 'local';

export function firecrawlSseUrl(apiKey: string): string {
    return `https://mcp.firecrawl.dev/${encodeURIComponent(apiKey)}/v2/sse`;
}

export function mcpServerConfigs(config: Config): McpServerConfig[] {
    const servers: McpServerConfig[] = [];
    if (config.firecrawlApiKey) {
        servers.push({
            name: FIRECRAWL_SERVER,
            url: firecrawlSseUrl(config.firecrawlApiKey),
            connectTimeoutMs: config.toolConnectTimeoutMs,
        });
    }
    for (const entry of config.mcpSseServers) {
        servers.push({ name: entry.name, url: entry.url, connectTimeoutMs: config.toolConnectTimeoutMs });
    }
    return servers;
}

export interface ToolRegistryFactoryOptions {
    /** Throw when no tool at all could be registered */
    requireTools?: boolean;
    /** Swap the server implementation (tests) */
    createServer?: (server: McpServerConfig) => McpToolServer;
}

/**
 * Connect every configured server in parallel. A server that fails to
 * connect is skipped with a warning.
 */
export async function createToolRegistry(
    config: Config,
    options: ToolRegistryFactoryOptions = {}
): Promise<DefaultToolRegistry> {
    const createServer = options.createServer ?? ((server: McpServerConfig) => new McpToolServer(server));
    const registry = new DefaultToolRegistry();

    const servers = mcpServerConfigs(config).map(createServer);
    const settled = await Promise.allSettled(servers.map(async (server) => {
        await server.connect();
        return server;
    }));

    settled.forEach((result, i) => {
        const name = servers[i]?.name ?? 'server';
        if (result.status === 'fulfilled') {
            registry.add(result.value);
        } else {
            log.warn(`Skipping tool server ${name}: ${describeError(result.reason)}`);
        }
    });

    if (config.enableTavily && config.tavilyApiKey) {
        const local: ToolProvider = new LocalToolProvider(LOCAL_PROVIDER, [
            createInternetSearchTool(new TavilyClient(config.tavilyApiKey)),
        ]);
        registry.add(local);
    }

    const toolCount = registry.list().length;
    if (toolCount === 0 && options.requireTools) {
        await registry.close();
        throw new ConfigError(
            'No tools available. Check FIRECRAWL_API_KEY / MCP_SSE_SERVERS, or enable the Tavily client.',
            'FIRECRAWL_API_KEY'
        );
    }

    log.info(`Tool registry ready: ${toolCount} tool(s) from ${registry.servers().length} source(s)`);
    return registry;
}
