/**
 * Pipeline data model
 *
 * Shapes shared by the stage executor, the orchestrator and the tool
 * registry. Everything here is plain data; behaviour lives in the modules
 * that produce it.
 */

import type { ToolArgs } from '../tools/arguments.js';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const STAGE_ORDER = ['planner', 'research', 'critic', 'final'] as const;

export type StageName = typeof STAGE_ORDER[number];

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
    /** Call id assigned by the model, echoed back on the tool turn */
    id: string;
    toolName: string;
    arguments: ToolArgs;
    /** Set when the model's argument text was not valid JSON */
    malformedArguments?: string;
}

export interface ToolResult {
    toolName: string;
    output: JsonValue;
    error?: string;
}

export interface ConversationTurn {
    readonly role: TurnRole;
    readonly content: string;
    readonly toolCalls: readonly ToolCallRequest[];
    /** Only on tool turns */
    readonly toolCallId?: string;
    readonly toolName?: string;
}

export interface StageConfig {
    name: StageName;
    systemPrompt: string;
    temperature: number;
    maxTokens: number;
    toolsEnabled: boolean;
}

export type StageConfigs = Readonly<Record<StageName, StageConfig>>;

export interface Citation {
    url: string;
    title: string;
}

/**
 * Best-effort structured fields pulled from a stage's text. Known list
 * fields (citations, checklist) are always arrays when present.
 */
export type Artifacts = JsonObject;

export type StageIssueKind =
    | 'ContextTruncated'
    | 'ToolInvocationError'
    | 'ToolLoopExceeded'
    | 'ToolProtocolViolation'
    | 'ArtifactParseFailure'
    | 'StageTimeout';

export interface StageIssue {
    kind: StageIssueKind;
    message: string;
    toolName?: string;
}

export interface StageFailure {
    kind: 'StageExecutionFailed';
    message: string;
    attempts: number;
}

export interface StageResult {
    stageName: StageName;
    rawText: string;
    artifacts: Artifacts;
    toolCallCount: number;
    toolResults: ToolResult[];
    truncated: boolean;
    issues: StageIssue[];
    error?: StageFailure;
    durationMs: number;
}

export type RunState =
    | 'planning'
    | 'researching'
    | 'critiquing'
    | 'synthesizing'
    | 'done'
    | 'failed'
    | 'cancelled';

export interface FinalAnswer {
    text: string;
    summary: string;
    citations: Citation[];
    checklist: string[];
    /** True when any part of the answer was built from fallback material */
    degraded: boolean;
}

export interface ConversationRun {
    id: string;
    question: string;
    state: RunState;
    stages: StageResult[];
    answer: FinalAnswer;
    warnings: string[];
    startedAt: string;
    finishedAt?: string;
}

export type ChunkHandler = (text: string) => void;

export type RunEvent =
    | { type: 'state'; state: RunState }
    | { type: 'chunk'; stage: StageName; text: string }
    | { type: 'reasoning'; stage: StageName; text: string }
    | { type: 'tool_call'; stage: StageName; call: ToolCallRequest }
    | { type: 'tool_result'; stage: StageName; result: ToolResult }
    | { type: 'stage_complete'; result: StageResult }
    | { type: 'done'; run: ConversationRun };
