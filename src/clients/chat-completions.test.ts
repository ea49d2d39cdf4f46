/**
 * Unit tests for the Chat Completions streaming client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChatCompletionsClient, toWireMessages, type ChatRequest, type ChatStreamEvent } from './chat-completions.js';
import { ModelEndpointError } from '../errors.js';
import type { ToolDefinition } from '../tools/types.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

function sseResponse(...chunks: object[]): Response {
    const body = chunks.map((chunk) => `data: ${JSON.stringify(chunk)}\n\n`).join('') + 'data: [DONE]\n\n';
    return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

async function collect(source: AsyncIterable<ChatStreamEvent>): Promise<ChatStreamEvent[]> {
    const out: ChatStreamEvent[] = [];
    for await (const event of source) out.push(event);
    return out;
}

const searchTool: ToolDefinition = {
    name: 'search',
    description: 'Search the web',
    inputSchema: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
    server: 'firecrawl',
};

const request: ChatRequest = {
    systemPrompt: 'You are helpful.',
    turns: [{ role: 'user', content: 'Hi', toolCalls: [] }],
    temperature: 0.1,
    maxTokens: 256,
};

describe('ChatCompletionsClient', () => {
    let client: ChatCompletionsClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new ChatCompletionsClient({ apiKey: 'test-secret', baseUrl: 'https://llm.test/v1/', model: 'test-model' });
    });

    describe('constructor', () => {
        it('should throw an error if API key is empty', () => {
            expect(() => new ChatCompletionsClient({ apiKey: '' })).toThrow('LLM_API_KEY is not set or invalid.');
        });

        it('should throw an error if API key is whitespace only', () => {
            expect(() => new ChatCompletionsClient({ apiKey: '   ' })).toThrow('LLM_API_KEY is not set or invalid.');
        });
    });

    describe('buildBody', () => {
        it('should include sampling settings and tools', () => {
            const tuned = new ChatCompletionsClient({ apiKey: 'test-secret', model: 'm', topP: 0.9, thinking: true });
            const body = tuned.buildBody({ ...request, tools: [searchTool] });

            expect(body).toEqual({
                model: 'm',
                messages: [
                    { role: 'system', content: 'You are helpful.' },
                    { role: 'user', content: 'Hi' },
                ],
                temperature: 0.1,
                max_tokens: 256,
                stream: true,
                top_p: 0.9,
                chat_template_kwargs: { thinking: true },
                tools: [{
                    type: 'function',
                    function: { name: 'search', description: 'Search the web', parameters: searchTool.inputSchema },
                }],
                tool_choice: 'auto',
            });
        });

        it('should leave tools out when none are offered', () => {
            const body = client.buildBody({ ...request, tools: [] });
            expect(body.tools).toBeUndefined();
            expect(body.tool_choice).toBeUndefined();
            expect(body.chat_template_kwargs).toBeUndefined();
        });
    });

    describe('streamChat', () => {
        it('should post to the chat completions endpoint and stream content', async () => {
            mockFetch.mockResolvedValueOnce(sseResponse(
                { choices: [{ delta: { reasoning_content: 'Thinking' } }] },
                { choices: [{ delta: { content: 'Hel' } }] },
                { choices: [{ delta: { content: 'lo' }, finish_reason: 'stop' }] }
            ));

            const events = await collect(client.streamChat(request));

            expect(mockFetch).toHaveBeenCalledWith(
                'https://llm.test/v1/chat/completions',
                expect.objectContaining({
                    method: 'POST',
                    headers: expect.objectContaining({
                        Authorization: 'Bearer test-secret',
                        'Content-Type': 'application/json',
                    }),
                })
            );
            expect(events).toEqual([
                { type: 'reasoning', text: 'Thinking' },
                { type: 'content', text: 'Hel' },
                { type: 'content', text: 'lo' },
            ]);
        });

        it('should assemble tool calls from their deltas', async () => {
            mockFetch.mockResolvedValueOnce(sseResponse(
                { choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'search', arguments: '{"que' } }] } }] },
                { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'ry":"paris"}' } }] } }] },
                { choices: [{ delta: {}, finish_reason: 'tool_calls' }] }
            ));

            const events = await collect(client.streamChat({ ...request, tools: [searchTool] }));

            expect(events).toEqual([
                { type: 'tool_call', call: { id: 'call_1', toolName: 'search', arguments: { query: 'paris' } } },
            ]);
        });

        it('should surface malformed arguments on the call', async () => {
            mockFetch.mockResolvedValueOnce(sseResponse(
                { choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'search', arguments: '{"query":' } }] } }] }
            ));

            const events = await collect(client.streamChat(request));

            expect(events).toHaveLength(1);
            const event = events[0];
            if (event.type !== 'tool_call') throw new Error('expected a tool call');
            expect(event.call.arguments).toEqual({});
            expect(event.call.malformedArguments).toMatch(/^Arguments are not valid JSON/);
        });

        it('should drop tool call deltas without a name', async () => {
            mockFetch.mockResolvedValueOnce(sseResponse(
                { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{}' } }] }, finish_reason: 'tool_calls' }] }
            ));

            expect(await collect(client.streamChat(request))).toEqual([]);
        });

        it('should raise a non-retryable error on authentication failure', async () => {
            mockFetch.mockResolvedValueOnce(new Response('Unauthorized', { status: 401 }));

            const error = await collect(client.streamChat(request)).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ModelEndpointError);
            if (!(error instanceof ModelEndpointError)) return;
            expect(error.message).toContain('Model endpoint authentication failed');
            expect(error.status).toBe(401);
            expect(error.retryable).toBe(false);
        });

        it('should raise a retryable error on server failure', async () => {
            mockFetch.mockResolvedValueOnce(new Response('{"error":{"message":"overloaded"}}', { status: 500 }));

            const error = await collect(client.streamChat(request)).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ModelEndpointError);
            if (!(error instanceof ModelEndpointError)) return;
            expect(error.message).toBe('Model endpoint error: 500 - overloaded');
            expect(error.retryable).toBe(true);
        });

        it('should wrap network errors', async () => {
            mockFetch.mockRejectedValueOnce(new Error('ECONNRESET'));

            await expect(collect(client.streamChat(request))).rejects.toThrow('Model endpoint unreachable: ECONNRESET');
        });

        it('should cancel the response body when the caller aborts mid-stream', async () => {
            const cancelled = vi.fn();
            const body = new ReadableStream<Uint8Array>({
                start(controller) {
                    const chunk = { choices: [{ delta: { content: 'Hel' } }] };
                    controller.enqueue(new TextEncoder().encode(`data: ${JSON.stringify(chunk)}\n\n`));
                },
                cancel(reason) {
                    cancelled(reason);
                },
            });
            mockFetch.mockResolvedValueOnce(new Response(body, { status: 200 }));
            const controller = new AbortController();
            const events: ChatStreamEvent[] = [];

            const reading = (async () => {
                for await (const event of client.streamChat(request, controller.signal)) {
                    events.push(event);
                    controller.abort(new Error('cancelled by user'));
                }
            })();

            await expect(reading).rejects.toThrow('cancelled by user');
            expect(events).toEqual([{ type: 'content', text: 'Hel' }]);
            expect(cancelled).toHaveBeenCalledTimes(1);
            expect(mockFetch.mock.calls[0][1].signal.aborted).toBe(true);
        });

        it('should raise errors reported inside the stream', async () => {
            mockFetch.mockResolvedValueOnce(sseResponse(
                { choices: [{ delta: { content: 'partial' } }] },
                { error: { message: 'boom' } }
            ));

            await expect(collect(client.streamChat(request))).rejects.toThrow('Model stream error: boom');
        });
    });
});

describe('toWireMessages', () => {
    it('should carry tool calls and tool results', () => {
        const messages = toWireMessages('sys', [
            { role: 'user', content: 'q', toolCalls: [] },
            { role: 'assistant', content: '', toolCalls: [{ id: 'c1', toolName: 'search', arguments: { query: 'x' } }] },
            { role: 'tool', content: 'result', toolCalls: [], toolCallId: 'c1', toolName: 'search' },
        ]);

        expect(messages).toEqual([
            { role: 'system', content: 'sys' },
            { role: 'user', content: 'q' },
            {
                role: 'assistant',
                content: '',
                tool_calls: [{ id: 'c1', type: 'function', function: { name: 'search', arguments: '{"query":"x"}' } }],
            },
            { role: 'tool', content: 'result', tool_call_id: 'c1', name: 'search' },
        ]);
    });

    it('should send empty arguments for a call whose arguments were malformed', () => {
        const messages = toWireMessages('sys', [{
            role: 'assistant',
            content: '',
            toolCalls: [{ id: 'c1', toolName: 'search', arguments: {}, malformedArguments: 'bad' }],
        }]);

        expect(messages[1]).toEqual({
            role: 'assistant',
            content: '',
            tool_calls: [{ id: 'c1', type: 'function', function: { name: 'search', arguments: '{}' } }],
        });
    });
});
