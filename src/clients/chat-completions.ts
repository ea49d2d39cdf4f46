/**
 * Chat Completions client
 * Streams from any OpenAI-compatible endpoint (NVIDIA by default),
 * including reasoning deltas and incremental tool calls.
 */

import { z } from 'zod';
import { ApiKeyError, ModelEndpointError, isAbortError, toError } from '../errors.js';
import { parseToolArgs } from '../tools/arguments.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ConversationTurn, ToolCallRequest } from '../pipeline/types.js';
import { createModuleLogger } from '../logger.js';
import { fetchWithRetry, parseErrorBody, readSseData } from './http.js';

const log = createModuleLogger('chat-completions');

export const DEFAULT_BASE_URL = 'https://integrate.api.nvidia.com/v1';
export const DEFAULT_MODEL = 'moonshotai/kimi-k2-instruct';
const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export interface ChatRequest {
    systemPrompt: string;
    turns: readonly ConversationTurn[];
    temperature: number;
    maxTokens: number;
    /** Omitted or empty means the model is not offered any tools */
    tools?: readonly ToolDefinition[];
}

export type ChatStreamEvent =
    | { type: 'content'; text: string }
    | { type: 'reasoning'; text: string }
    | { type: 'tool_call'; call: ToolCallRequest };

/**
 * Anything that can stream a chat turn. The stage executor only sees this.
 */
export interface ChatModel {
    readonly model: string;
    streamChat(request: ChatRequest, signal?: AbortSignal): AsyncIterable<ChatStreamEvent>;
}

export interface ChatCompletionsOptions {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    /** Time allowed until response headers arrive */
    timeoutMs?: number;
    topP?: number;
    /** Sends chat_template_kwargs.thinking for models that support it */
    thinking?: boolean;
    /** HTTP-level attempts; the stage executor owns model-level retries */
    retries?: number;
}

type WireToolCall = {
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
};

type WireMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string; tool_calls?: WireToolCall[] }
    | { role: 'tool'; content: string; tool_call_id: string; name?: string };

const ToolCallDeltaSchema = z.object({
    index: z.number().optional(),
    id: z.string().nullish(),
    function: z.object({
        name: z.string().nullish(),
        arguments: z.string().nullish(),
    }).nullish(),
});

const ChunkSchema = z.object({
    choices: z.array(z.object({
        delta: z.object({
            content: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            reasoning: z.string().nullish(),
            tool_calls: z.array(ToolCallDeltaSchema).nullish(),
        }).nullish(),
        finish_reason: z.string().nullish(),
    })).default([]),
    error: z.object({ message: z.string().optional() }).nullish(),
});

interface PendingToolCall {
    id: string;
    name: string;
    args: string;
}

export function toWireMessages(systemPrompt: string, turns: readonly ConversationTurn[]): WireMessage[] {
    const messages: WireMessage[] = [{ role: 'system', content: systemPrompt }];
    for (const turn of turns) {
        if (turn.role === 'tool') {
            messages.push({
                role: 'tool',
                content: turn.content,
                tool_call_id: turn.toolCallId ?? '',
                ...(turn.toolName ? { name: turn.toolName } : {}),
            });
        } else if (turn.role === 'assistant') {
            const toolCalls = turn.toolCalls.map((call): WireToolCall => ({
                id: call.id,
                type: 'function',
                function: {
                    name: call.toolName,
                    arguments: call.malformedArguments === undefined ? JSON.stringify(call.arguments) : '{}',
                },
            }));
            messages.push(toolCalls.length > 0
                ? { role: 'assistant', content: turn.content, tool_calls: toolCalls }
                : { role: 'assistant', content: turn.content });
        } else {
            messages.push({ role: 'user', content: turn.content });
        }
    }
    return messages;
}

export function toWireTools(tools: readonly ToolDefinition[]) {
    return tools.map((tool) => ({
        type: 'function' as const,
        function: {
            name: tool.name,
            description: tool.description,
            parameters: Object.keys(tool.inputSchema).length > 0
                ? tool.inputSchema
                : { type: 'object', properties: {} },
        },
    }));
}

function finishToolCall(pending: PendingToolCall, index: number): ToolCallRequest {
    const { args, error } = parseToolArgs(pending.args);
    const call: ToolCallRequest = {
        id: pending.id || `call_${index}`,
        toolName: pending.name,
        arguments: args,
    };
    if (error) call.malformedArguments = error;
    return call;
}

export class ChatCompletionsClient implements ChatModel {
    readonly model: string;
    private apiKey: string;
    private baseUrl: string;
    private timeoutMs: number;
    private topP?: number;
    private thinking: boolean;
    private retries: number;

    constructor(options: ChatCompletionsOptions) {
        if (!options.apiKey || options.apiKey.trim() === '') {
            throw new ApiKeyError('LLM_API_KEY', undefined, 'https://build.nvidia.com');
        }
        this.apiKey = options.apiKey.trim();
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.model = options.model ?? DEFAULT_MODEL;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.topP = options.topP;
        this.thinking = options.thinking ?? false;
        this.retries = options.retries ?? 1;
    }

    buildBody(request: ChatRequest): Record<string, unknown> {
        const body: Record<string, unknown> = {
            model: this.model,
            messages: toWireMessages(request.systemPrompt, request.turns),
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            stream: true,
        };
        if (typeof this.topP === 'number') body.top_p = this.topP;
        if (this.thinking) body.chat_template_kwargs = { thinking: true };
        if (request.tools && request.tools.length > 0) {
            body.tools = toWireTools(request.tools);
            body.tool_choice = 'auto';
        }
        return body;
    }

    /**
     * Send a streaming chat completion request.
     * Tool calls are assembled from their deltas and yielded once complete.
     */
    async *streamChat(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<ChatStreamEvent, void, unknown> {
        const url = `${this.baseUrl}/chat/completions`;
        let response: Response;
        try {
            response = await fetchWithRetry(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Accept: 'text/event-stream',
                    Authorization: `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify(this.buildBody(request)),
                signal,
            }, { retries: this.retries, timeoutMs: this.timeoutMs });
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) throw error;
            throw new ModelEndpointError(`Model endpoint unreachable: ${toError(error).message}`);
        }

        if (!response.ok) {
            const errorMessage = await parseErrorBody(response);
            if (response.status === 401 || response.status === 403) {
                throw new ModelEndpointError(
                    'Model endpoint authentication failed.\n' +
                    'Please check your LLM_API_KEY is valid.\n' +
                    'Run: stageline init',
                    { status: response.status }
                );
            }
            throw new ModelEndpointError(`Model endpoint error: ${response.status} - ${errorMessage}`, {
                status: response.status,
            });
        }

        if (!response.body) throw new ModelEndpointError('No response body');

        const pending = new Map<number, PendingToolCall>();
        let flushed = 0;
        const flush = function* (): Generator<ChatStreamEvent> {
            const indices = [...pending.keys()].sort((a, b) => a - b);
            for (const index of indices) {
                const call = pending.get(index);
                if (call && call.name) {
                    yield { type: 'tool_call', call: finishToolCall(call, flushed) };
                    flushed++;
                } else if (call) {
                    log.warn(`Dropping tool call delta #${index} without a function name`);
                }
            }
            pending.clear();
        };

        try {
            for await (const data of readSseData(response.body, signal)) {
                let json: unknown;
                try {
                    json = JSON.parse(data);
                } catch {
                    log.debug(`Skipping non-JSON stream line: ${data.slice(0, 80)}`);
                    continue;
                }

                const parsed = ChunkSchema.safeParse(json);
                if (!parsed.success) continue;
                if (parsed.data.error) {
                    throw new ModelEndpointError(`Model stream error: ${parsed.data.error.message ?? 'unknown error'}`);
                }

                const choice = parsed.data.choices[0];
                if (!choice) continue;
                const delta = choice.delta;

                const reasoning = delta?.reasoning_content || delta?.reasoning;
                if (reasoning) yield { type: 'reasoning', text: reasoning };

                if (delta?.content) yield { type: 'content', text: delta.content };

                for (const part of delta?.tool_calls ?? []) {
                    const index = part.index ?? 0;
                    const entry = pending.get(index) ?? { id: '', name: '', args: '' };
                    if (part.id) entry.id = part.id;
                    if (part.function?.name) entry.name += part.function.name;
                    if (part.function?.arguments) entry.args += part.function.arguments;
                    pending.set(index, entry);
                }

                if (choice.finish_reason) yield* flush();
            }
        } catch (error) {
            if (error instanceof ModelEndpointError || isAbortError(error) || signal?.aborted) throw error;
            throw new ModelEndpointError(`Model stream interrupted: ${toError(error).message}`);
        }

        yield* flush();
    }
}
