/**
 * Stage Executor
 *
 * Runs one stage turn against the model: streams deltas to the observer,
 * executes tool calls the model asks for (one at a time), feeds the
 * results back, and re-issues the call until the model answers without
 * tools or the round limit is hit.
 */

import type { ChatModel, ChatRequest } from '../clients/chat-completions.js';
import type { ToolRegistry } from '../tools/types.js';
import type {
    ChunkHandler,
    ConversationTurn,
    StageConfig,
    StageFailure,
    StageIssue,
    StageName,
    StageResult,
    ToolCallRequest,
    ToolResult,
} from './types.js';
import { ModelEndpointError, RunCancelledError, StageExecutionError, describeError } from '../errors.js';
import { abortReason, abortable, createTimeoutSignal, sleep, type TimeoutSignal } from '../utils/abort.js';
import { createModuleLogger } from '../logger.js';
import { parseArtifacts } from './artifacts.js';
import { fitToBudget } from './context.js';

const log = createModuleLogger('stage');

export interface StageExecutorOptions {
    /** Tool rounds per stage before the loop is cut off */
    maxToolRounds?: number;
    /** Extra attempts for a failed model call */
    modelRetries?: number;
    retryDelayMs?: number;
    modelTimeoutMs?: number;
    toolTimeoutMs?: number;
    stageTimeoutMs?: number;
    contextTokenBudget?: number;
    /** Tool output beyond this is cut before it goes back to the model */
    maxToolOutputChars?: number;
}

export const DEFAULT_EXECUTOR_OPTIONS: Required<StageExecutorOptions> = {
    maxToolRounds: 4,
    modelRetries: 2,
    retryDelayMs: 1000,
    modelTimeoutMs: 120_000,
    toolTimeoutMs: 60_000,
    stageTimeoutMs: 600_000,
    contextTokenBudget: 24_000,
    maxToolOutputChars: 16_000,
};

export interface StageRunHooks {
    signal?: AbortSignal;
    onReasoning?: (text: string) => void;
    onToolCall?: (call: ToolCallRequest) => void;
    onToolResult?: (result: ToolResult) => void;
}

/**
 * Deltas carrying the model's raw tool-call markup (`<|tool_call_begin|>` and friends)
 */
export function isToolCallMarkup(text: string): boolean {
    return text.includes('<|tool_call');
}

export function toolTurnContent(result: ToolResult, maxChars: number): string {
    if (result.error) return `ERROR: ${result.error}`;
    const text = typeof result.output === 'string' ? result.output : JSON.stringify(result.output);
    return text.length <= maxChars ? text : `${text.slice(0, maxChars)}\n…[truncated ${text.length - maxChars} chars]`;
}

interface ModelReply {
    content: string;
    toolCalls: ToolCallRequest[];
}

/** Mutable state for one stage run */
interface StageProgress {
    rawText: string;
    transcript: ConversationTurn[];
    issues: StageIssue[];
    toolResults: ToolResult[];
    toolCallCount: number;
    truncated: boolean;
    attempts: number;
}

function closeQuietly(iterator: AsyncIterator<unknown>): void {
    const closing = iterator.return?.();
    if (closing) {
        closing.then(undefined, (error: unknown) => {
            log.debug(`Closing model stream failed: ${describeError(error)}`);
        });
    }
}

export class StageExecutor {
    private readonly limits: Required<StageExecutorOptions>;

    constructor(
        private readonly model: ChatModel,
        options: StageExecutorOptions = {}
    ) {
        const d = DEFAULT_EXECUTOR_OPTIONS;
        this.limits = {
            maxToolRounds: options.maxToolRounds ?? d.maxToolRounds,
            modelRetries: options.modelRetries ?? d.modelRetries,
            retryDelayMs: options.retryDelayMs ?? d.retryDelayMs,
            modelTimeoutMs: options.modelTimeoutMs ?? d.modelTimeoutMs,
            toolTimeoutMs: options.toolTimeoutMs ?? d.toolTimeoutMs,
            stageTimeoutMs: options.stageTimeoutMs ?? d.stageTimeoutMs,
            contextTokenBudget: options.contextTokenBudget ?? d.contextTokenBudget,
            maxToolOutputChars: options.maxToolOutputChars ?? d.maxToolOutputChars,
        };
    }

    /**
     * Run one stage. Never throws for model, tool or parse failures; those
     * land on the result. Throws RunCancelledError when `hooks.signal` aborts.
     */
    async run(
        config: StageConfig,
        context: readonly ConversationTurn[],
        tools: ToolRegistry | undefined,
        onChunk: ChunkHandler,
        hooks: StageRunHooks = {}
    ): Promise<StageResult> {
        if (hooks.signal?.aborted) throw new RunCancelledError();

        const startedAt = Date.now();
        const progress: StageProgress = {
            rawText: '',
            transcript: [...context],
            issues: [],
            toolResults: [],
            toolCallCount: 0,
            truncated: false,
            attempts: 0,
        };
        const stage = createTimeoutSignal(this.limits.stageTimeoutMs, hooks.signal);
        let failure: StageFailure | undefined;

        try {
            await this.runRounds(config, tools, onChunk, hooks, stage, progress);
        } catch (error) {
            if (hooks.signal?.aborted || error instanceof RunCancelledError) {
                log.info(`[${config.name}] cancelled`);
                throw error instanceof RunCancelledError ? error : new RunCancelledError();
            }
            if (stage.timedOut()) {
                const message = `Stage ${config.name} timed out after ${this.limits.stageTimeoutMs}ms`;
                progress.issues.push({ kind: 'StageTimeout', message });
                if (!progress.rawText) {
                    failure = { kind: 'StageExecutionFailed', message, attempts: progress.attempts };
                }
            } else {
                failure = {
                    kind: 'StageExecutionFailed',
                    message: describeError(error),
                    attempts: error instanceof StageExecutionError ? error.attempts : progress.attempts,
                };
            }
        } finally {
            stage.cleanup();
        }

        const artifacts = parseArtifacts(progress.rawText);
        if (progress.rawText.trim() && Object.keys(artifacts).length === 0) {
            progress.issues.push({ kind: 'ArtifactParseFailure', message: `No JSON object found in ${config.name} output` });
        }

        const durationMs = Date.now() - startedAt;
        if (failure) {
            log.warn(`[${config.name}] failed after ${failure.attempts} attempt(s): ${failure.message}`);
        } else {
            log.info(`[${config.name}] done in ${durationMs}ms, ${progress.toolCallCount} tool call(s)`);
        }

        const result: StageResult = {
            stageName: config.name,
            rawText: progress.rawText,
            artifacts,
            toolCallCount: progress.toolCallCount,
            toolResults: progress.toolResults,
            truncated: progress.truncated,
            issues: progress.issues,
            durationMs,
        };
        if (failure) result.error = failure;
        return result;
    }

    private async runRounds(
        config: StageConfig,
        tools: ToolRegistry | undefined,
        onChunk: ChunkHandler,
        hooks: StageRunHooks,
        stage: TimeoutSignal,
        progress: StageProgress
    ): Promise<void> {
        const registry = config.toolsEnabled ? tools : undefined;
        const offered = registry ? registry.list() : [];
        let rounds = 0;

        for (;;) {
            const fitted = fitToBudget(progress.transcript, this.limits.contextTokenBudget);
            if (fitted.truncated && !progress.truncated) {
                progress.truncated = true;
                progress.issues.push({
                    kind: 'ContextTruncated',
                    message: `Dropped ${progress.transcript.length - fitted.turns.length} oldest turn(s) to fit the context budget`,
                });
            }

            const request: ChatRequest = {
                systemPrompt: config.systemPrompt,
                turns: fitted.turns,
                temperature: config.temperature,
                maxTokens: config.maxTokens,
                tools: offered,
            };
            const reply = await this.callModel(config.name, request, stage, hooks, onChunk, progress);
            if (reply.toolCalls.length === 0) return;

            progress.transcript.push({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });

            if (!registry) {
                for (const call of reply.toolCalls) {
                    progress.issues.push({
                        kind: 'ToolProtocolViolation',
                        message: `Stage ${config.name} may not call tools; ${call.toolName} was not executed`,
                        toolName: call.toolName,
                    });
                }
            }

            if (rounds >= this.limits.maxToolRounds) {
                progress.issues.push({
                    kind: 'ToolLoopExceeded',
                    message: `Stopped after ${rounds} tool round(s); ${reply.toolCalls.length} further call(s) not executed`,
                });
                log.warn(`[${config.name}] tool loop limit (${this.limits.maxToolRounds}) reached`);
                return;
            }
            rounds++;

            for (const call of reply.toolCalls) {
                if (registry) {
                    await this.executeTool(call, registry, stage, hooks, progress);
                } else {
                    this.appendToolTurn(call, {
                        toolName: call.toolName,
                        output: null,
                        error: 'Tool calls are not available in this stage. Answer without tools.',
                    }, progress);
                }
            }
        }
    }

    /**
     * One model call with retries. A call that already streamed text to the
     * observer is not retried, so no delta is ever delivered twice.
     */
    private async callModel(
        stageName: StageName,
        request: ChatRequest,
        stage: TimeoutSignal,
        hooks: StageRunHooks,
        onChunk: ChunkHandler,
        progress: StageProgress
    ): Promise<ModelReply> {
        const maxAttempts = this.limits.modelRetries + 1;

        for (let attempt = 1; ; attempt++) {
            progress.attempts++;
            const call = createTimeoutSignal(this.limits.modelTimeoutMs, stage.signal);
            const state = { emitted: false };
            let failure: unknown;

            try {
                return await this.streamOnce(request, call.signal, hooks, onChunk, progress, state);
            } catch (error) {
                // Cancellation and the stage deadline are handled by run()
                if (stage.signal.aborted) throw error;
                failure = call.timedOut()
                    ? new ModelEndpointError(`Model call timed out after ${this.limits.modelTimeoutMs}ms`)
                    : error;
            } finally {
                call.cleanup();
            }

            const retryable = !state.emitted && !(failure instanceof ModelEndpointError && !failure.retryable);
            if (!retryable || attempt >= maxAttempts) {
                throw new StageExecutionError(stageName, describeError(failure), attempt);
            }

            const delay = this.limits.retryDelayMs * Math.pow(2, attempt - 1);
            log.warn(`Model call failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms: ${describeError(failure)}`);
            await sleep(delay, stage.signal);
        }
    }

    private async streamOnce(
        request: ChatRequest,
        signal: AbortSignal,
        hooks: StageRunHooks,
        onChunk: ChunkHandler,
        progress: StageProgress,
        state: { emitted: boolean }
    ): Promise<ModelReply> {
        const iterator = this.model.streamChat(request, signal)[Symbol.asyncIterator]();
        const reply: ModelReply = { content: '', toolCalls: [] };
        let finished = false;

        try {
            for (;;) {
                const next = await abortable(iterator.next(), signal);
                if (next.done) {
                    finished = true;
                    break;
                }

                const event = next.value;
                if (event.type === 'tool_call') {
                    reply.toolCalls.push(event.call);
                    continue;
                }
                if (event.type === 'reasoning') {
                    this.notify('onReasoning', () => hooks.onReasoning?.(event.text));
                    continue;
                }
                if (isToolCallMarkup(event.text)) continue;

                reply.content += event.text;
                // Once a tool call shows up, text stays in the transcript only
                if (reply.toolCalls.length === 0) {
                    state.emitted = true;
                    progress.rawText += event.text;
                    this.notify('onChunk', () => onChunk(event.text));
                }
            }
        } finally {
            if (!finished) closeQuietly(iterator);
        }
        return reply;
    }

    private async executeTool(
        call: ToolCallRequest,
        tools: ToolRegistry,
        stage: TimeoutSignal,
        hooks: StageRunHooks,
        progress: StageProgress
    ): Promise<void> {
        this.notify('onToolCall', () => hooks.onToolCall?.(call));

        let result: ToolResult;
        if (call.malformedArguments) {
            result = { toolName: call.toolName, output: null, error: call.malformedArguments };
        } else {
            const timeout = createTimeoutSignal(this.limits.toolTimeoutMs, stage.signal);
            try {
                result = await abortable(
                    tools.invoke(call.toolName, call.arguments, {
                        signal: timeout.signal,
                        timeoutMs: this.limits.toolTimeoutMs,
                    }),
                    timeout.signal
                );
                if (timeout.timedOut() && result.error) {
                    result = { ...result, error: `Timed out after ${this.limits.toolTimeoutMs}ms` };
                }
            } catch (error) {
                if (stage.signal.aborted) throw error;
                result = {
                    toolName: call.toolName,
                    output: null,
                    error: timeout.timedOut()
                        ? `Timed out after ${this.limits.toolTimeoutMs}ms`
                        : describeError(error),
                };
            } finally {
                timeout.cleanup();
            }
        }

        // A result that lands after cancellation or the stage deadline is discarded
        if (stage.signal.aborted) throw abortReason(stage.signal);

        progress.toolCallCount++;
        progress.toolResults.push(result);
        if (result.error) {
            progress.issues.push({
                kind: 'ToolInvocationError',
                message: `${call.toolName}: ${result.error}`,
                toolName: call.toolName,
            });
        }
        this.notify('onToolResult', () => hooks.onToolResult?.(result));
        this.appendToolTurn(call, result, progress);
    }

    private appendToolTurn(call: ToolCallRequest, result: ToolResult, progress: StageProgress): void {
        progress.transcript.push({
            role: 'tool',
            content: toolTurnContent(result, this.limits.maxToolOutputChars),
            toolCalls: [],
            toolCallId: call.id,
            toolName: call.toolName,
        });
    }

    private notify(name: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            log.warn(`${name} handler threw: ${describeError(error)}`);
        }
    }
}
