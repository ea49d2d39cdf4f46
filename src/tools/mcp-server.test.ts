import { describe, it, expect, vi, beforeEach } from 'vitest';

const sdk = vi.hoisted(() => ({
    connect: vi.fn(),
    listTools: vi.fn(),
    callTool: vi.fn(),
    close: vi.fn(),
    setNotificationHandler: vi.fn(),
    clients: [] as { onclose?: () => void }[],
    transports: [] as { url: URL; options: unknown }[],
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
    Client: class {
        onclose?: () => void;
        connect = sdk.connect;
        listTools = sdk.listTools;
        callTool = sdk.callTool;
        close = sdk.close;
        setNotificationHandler = sdk.setNotificationHandler;

        constructor() {
            sdk.clients.push(this);
        }
    },
}));

vi.mock('@modelcontextprotocol/sdk/client/sse.js', () => ({
    SSEClientTransport: class {
        constructor(url: URL, options: unknown) {
            sdk.transports.push({ url, options });
        }
    },
}));

import { McpToolServer, flattenContent, redactUrl } from './mcp-server.js';

const URL_WITH_KEY = 'https://mcp.example.test/test-secret-key-123/v2/sse';

describe('McpToolServer', () => {
    beforeEach(() => {
        vi.resetAllMocks();
        sdk.clients.length = 0;
        sdk.transports.length = 0;
        sdk.connect.mockResolvedValue(undefined);
        sdk.close.mockResolvedValue(undefined);
        sdk.listTools.mockResolvedValue({
            tools: [{ name: 'firecrawl_search', description: 'Search the web', inputSchema: { type: 'object', properties: {} } }],
        });
    });

    describe('connect', () => {
        it('should connect over SSE and discover tools', async () => {
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY, headers: { 'X-Test': '1' } });

            await server.connect();

            expect(sdk.transports[0].url.href).toBe(URL_WITH_KEY);
            expect(sdk.transports[0].options).toEqual({ requestInit: { headers: { 'X-Test': '1' } } });
            expect(sdk.setNotificationHandler).toHaveBeenCalledTimes(1);
            expect(server.tools()).toEqual([{
                name: 'firecrawl_search',
                description: 'Search the web',
                inputSchema: { type: 'object', properties: {} },
                server: 'firecrawl',
            }]);
            expect(server.status).toEqual({ name: 'firecrawl', state: 'connected', toolCount: 1, error: undefined });
        });

        it('should give up after the connect timeout', async () => {
            sdk.connect.mockReturnValue(new Promise(() => undefined));
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY, connectTimeoutMs: 10 });

            await expect(server.connect()).rejects.toThrow('Could not connect to firecrawl: Timed out after 10ms');
            expect(server.status.state).toBe('error');
            expect(sdk.close).toHaveBeenCalledTimes(1);
        });

        it('should drop a connection that finishes after close', async () => {
            let finishConnect = () => {};
            sdk.connect.mockReturnValue(new Promise<void>((resolve) => {
                finishConnect = () => resolve();
            }));
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });

            const connecting = server.connect();
            await server.close();
            finishConnect();

            await expect(connecting).rejects.toThrow('Could not connect to firecrawl: Closed while connecting');
            expect(sdk.close).toHaveBeenCalledTimes(1);
            expect(server.tools()).toEqual([]);
        });

        it('should report a refused connection', async () => {
            sdk.connect.mockRejectedValue(new Error('ECONNREFUSED'));
            const server = new McpToolServer({ name: 'extra', url: 'https://tools.test/sse' });

            await expect(server.connect()).rejects.toThrow('Could not connect to extra: ECONNREFUSED');
            expect(server.tools()).toEqual([]);
        });
    });

    describe('call', () => {
        it('should pass arguments, cancellation and timeout to the server and flatten the result', async () => {
            sdk.callTool.mockResolvedValue({
                content: [
                    { type: 'text', text: 'Paris is the capital.' },
                    { type: 'image', mimeType: 'image/png', data: 'AAAA' },
                ],
            });
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });
            await server.connect();
            const controller = new AbortController();

            const output = await server.call('firecrawl_search', { query: 'capital' }, { signal: controller.signal, timeoutMs: 500 });

            expect(sdk.callTool).toHaveBeenCalledWith(
                { name: 'firecrawl_search', arguments: { query: 'capital' } },
                undefined,
                { signal: controller.signal, timeout: 500 }
            );
            expect(output).toBe('Paris is the capital.\n[image: image/png]');
        });

        it('should throw when the server marks the result as an error', async () => {
            sdk.callTool.mockResolvedValue({ content: [{ type: 'text', text: 'rate limited' }], isError: true });
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });
            await server.connect();

            await expect(server.call('firecrawl_search', {}, {})).rejects.toThrow('rate limited');
        });

        it('should reconnect once after the connection dropped', async () => {
            sdk.callTool.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }] });
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });
            await server.connect();

            sdk.clients[0].onclose?.();
            expect(server.status.state).toBe('disconnected');

            expect(await server.call('firecrawl_search', {}, {})).toBe('ok');
            expect(sdk.connect).toHaveBeenCalledTimes(2);
        });

        it('should share one reconnect between concurrent calls', async () => {
            sdk.callTool.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }] });
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });
            await server.connect();

            sdk.clients[0].onclose?.();
            const outputs = await Promise.all([
                server.call('firecrawl_search', {}, {}),
                server.call('firecrawl_search', {}, {}),
            ]);

            expect(outputs).toEqual(['ok', 'ok']);
            expect(sdk.clients).toHaveLength(2);
            expect(sdk.connect).toHaveBeenCalledTimes(2);
            expect(sdk.close).not.toHaveBeenCalled();
            expect(server.status.state).toBe('connected');
        });

        it('should refuse calls after close', async () => {
            const server = new McpToolServer({ name: 'firecrawl', url: URL_WITH_KEY });
            await server.connect();
            await server.close();

            await expect(server.call('firecrawl_search', {}, {})).rejects.toThrow('Not connected to MCP server firecrawl');
            expect(server.tools()).toEqual([]);
            expect(sdk.connect).toHaveBeenCalledTimes(1);
        });
    });
});

describe('flattenContent', () => {
    it('should render resources and unknown blocks', () => {
        expect(flattenContent([
            { type: 'resource', resource: { uri: 'file:///a.txt', text: 'inline text' } },
            { type: 'resource', resource: { uri: 'file:///b.bin' } },
            { type: 'audio' },
        ])).toBe('inline text\n[resource: file:///b.bin]\n[audio]');
    });
});

describe('redactUrl', () => {
    it('should hide a key embedded in the path', () => {
        expect(redactUrl(URL_WITH_KEY)).toBe('https://mcp.example.test/***/v2/sse');
        expect(redactUrl('https://tools.test/sse')).toBe('https://tools.test/sse');
    });
});
