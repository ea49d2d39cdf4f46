/**
 * Orchestrator - Drives planner → research → critic → final
 *
 * Stages run strictly in order. Each stage sees the question plus the
 * rendered output of the stages it depends on. Only a planner that fails
 * with nothing to show ends the run early; every later failure degrades
 * the answer instead.
 */

import { randomUUID } from 'crypto';
import type { ToolRegistry } from '../tools/types.js';
import type { ResearchPreference } from '../config.js';
import { INTERNET_SEARCH_TOOL } from '../tools/internet-search.js';
import { RunCancelledError, describeError } from '../errors.js';
import { createModuleLogger } from '../logger.js';
import { EventQueue } from '../utils/event-queue.js';
import type { StageExecutor } from './stage-executor.js';
import {
    checklistFrom,
    citationsFrom,
    firstStepDescription,
    hasEvidence,
    normalizeShort,
    stripArtifactBlock,
    toolsUsedFrom,
} from './artifacts.js';
import { renderStageContext, userTurn } from './context.js';
import {
    STAGE_ORDER,
    type Citation,
    type ConversationRun,
    type ConversationTurn,
    type FinalAnswer,
    type RunEvent,
    type RunState,
    type StageConfigs,
    type StageName,
    type StageResult,
} from './types.js';

const log = createModuleLogger('orchestrator');

/** Which earlier stages each stage sees, besides the question */
export const STAGE_CONTEXT: Readonly<Record<StageName, readonly StageName[]>> = {
    planner: [],
    research: ['planner'],
    critic: ['research'],
    final: ['planner', 'research', 'critic'],
};

const STAGE_STATE: Readonly<Record<StageName, RunState>> = {
    planner: 'planning',
    research: 'researching',
    critic: 'critiquing',
    final: 'synthesizing',
};

export const DEGRADED_MARKER = '> **Partial answer.** Part of the pipeline failed; this was built from the output that was available.';
export const CANCELLED_MARKER = '> **Cancelled.** The run was stopped before the answer was complete.';
export const FAILED_MARKER = '> **No answer.** The planning stage failed, so nothing could be researched.';

export interface OrchestratorOptions {
    researchPreference?: ResearchPreference;
}

export interface RunOptions {
    onChunk?: (stage: StageName, text: string) => void;
    onEvent?: (event: RunEvent) => void;
    signal?: AbortSignal;
}

type StageResults = Partial<Record<StageName, StageResult>>;

function stringField(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * True when a tool name belongs to the preferred research family
 */
export function matchesPreference(toolName: string, preference: ResearchPreference): boolean {
    const name = toolName.toLowerCase();
    return preference === 'tavily' ? name === INTERNET_SEARCH_TOOL : name.includes('firecrawl');
}

/**
 * What research should start from: the first planned step, else a short
 * form of the planner's text, else the question.
 */
export function researchFocus(question: string, planner: StageResult | undefined): string {
    if (planner) {
        const step = firstStepDescription(planner.rawText);
        if (step) return step;
        const text = stripArtifactBlock(planner.rawText);
        if (text) return normalizeShort(text, 200);
    }
    return question;
}

/**
 * Warnings about the research stage's use of evidence and tools
 */
export function researchWarnings(
    research: StageResult,
    offeredTools: readonly string[],
    preference: ResearchPreference
): string[] {
    const warnings: string[] = [];

    if (!hasEvidence(research.artifacts)) {
        warnings.push('Research returned no citations or evidence; the answer may be unsupported.');
    }
    if (offeredTools.length === 0) return warnings;

    if (research.toolCallCount === 0) {
        warnings.push('Research had tools available but made no tool calls.');
        return warnings;
    }

    const preferredOffered = offeredTools.some((name) => matchesPreference(name, preference));
    const used = [
        ...research.toolResults.map((r) => r.toolName),
        ...toolsUsedFrom(research.artifacts),
    ];
    if (preferredOffered && !used.some((name) => matchesPreference(name, preference))) {
        const family = preference === 'tavily' ? INTERNET_SEARCH_TOOL : 'firecrawl';
        warnings.push(`Preferred research tool (${family}) was not used.`);
    }
    return warnings;
}

/**
 * Prose of the best stage output left, in the order a reader would want it
 */
function fallbackBody(results: StageResults): string | undefined {
    const research = results.research;
    const fromResearch = research ? stringField(research.artifacts.answer) : undefined;
    if (fromResearch) return fromResearch;

    for (const name of ['final', 'research', 'critic'] as const) {
        const result = results[name];
        if (!result) continue;
        const text = stripArtifactBlock(result.rawText);
        if (text) return text;
    }
    return undefined;
}

/**
 * Assemble the user-facing answer from whatever stages produced output
 */
export function buildFinalAnswer(results: StageResults, state: RunState): FinalAnswer {
    const final = results.final;
    const research = results.research;

    let citations: Citation[] = final ? citationsFrom(final.artifacts.citations) : [];
    if (citations.length === 0 && research) {
        citations = citationsFrom(research.artifacts.citations);
        if (citations.length === 0) citations = citationsFrom(research.artifacts.sources);
    }

    const checklist = final ? checklistFrom(final.artifacts.checklist) : [];
    const summary = (final ? stringField(final.artifacts.summary) : undefined)
        ?? (research ? stringField(research.artifacts.answer) : undefined)
        ?? '';

    if (state === 'failed') {
        const reason = results.planner?.error?.message;
        return {
            text: reason ? `${FAILED_MARKER}\n\n${reason}` : FAILED_MARKER,
            summary: '',
            citations: [],
            checklist: [],
            degraded: true,
        };
    }

    const finalText = final ? stripArtifactBlock(final.rawText) : '';
    const anyStageFailed = STAGE_ORDER.some((name) => results[name]?.error !== undefined);
    const finalIncomplete = !final
        || !finalText
        || final.issues.some((issue) => issue.kind === 'StageTimeout');

    if (state === 'cancelled') {
        const body = finalText || fallbackBody(results);
        return {
            text: body ? `${CANCELLED_MARKER}\n\n${body}` : CANCELLED_MARKER,
            summary,
            citations,
            checklist,
            degraded: true,
        };
    }

    if (!anyStageFailed && !finalIncomplete) {
        return { text: finalText, summary, citations, checklist, degraded: false };
    }

    const body = finalText || fallbackBody(results) || 'No stage produced usable output.';
    return {
        text: `${DEGRADED_MARKER}\n\n${body}`,
        summary,
        citations,
        checklist,
        degraded: true,
    };
}

export class Orchestrator {
    private readonly preference: ResearchPreference;

    constructor(
        private readonly executor: StageExecutor,
        private readonly stages: StageConfigs,
        private readonly tools?: ToolRegistry,
        options: OrchestratorOptions = {}
    ) {
        this.preference = options.researchPreference ?? 'firecrawl';
    }

    /**
     * Context for a stage: the question, the outputs it depends on, and for
     * research a pointer to where to start.
     */
    buildContext(stage: StageName, question: string, results: StageResults): ConversationTurn[] {
        const turns: ConversationTurn[] = [userTurn(`QUESTION:\n${question}`)];
        for (const dependency of STAGE_CONTEXT[stage]) {
            const result = results[dependency];
            if (result) turns.push(renderStageContext(result));
        }

        if (stage === 'research') {
            const lines = [`RESEARCH FOCUS: ${researchFocus(question, results.planner)}`];
            if (this.toolsFor('research')) {
                const tool = this.preference === 'tavily' ? INTERNET_SEARCH_TOOL : 'the firecrawl tools';
                lines.push(`Prefer ${tool} when it fits the task.`);
            }
            turns.push(userTurn(lines.join('\n')));
        }
        return turns;
    }

    private toolsFor(stage: StageName): ToolRegistry | undefined {
        if (!this.stages[stage].toolsEnabled || !this.tools) return undefined;
        return this.tools.list().length > 0 ? this.tools : undefined;
    }

    /**
     * Run the pipeline for one question. Resolves with the finished run in
     * every case, including failure and cancellation.
     */
    async run(question: string, options: RunOptions = {}): Promise<ConversationRun> {
        const { signal } = options;
        const results: StageResults = {};
        const run: ConversationRun = {
            id: randomUUID(),
            question,
            state: 'planning',
            stages: [],
            answer: { text: '', summary: '', citations: [], checklist: [], degraded: false },
            warnings: [],
            startedAt: new Date().toISOString(),
        };

        const emit = (event: RunEvent) => {
            if (!options.onEvent) return;
            try {
                options.onEvent(event);
            } catch (error) {
                log.warn(`onEvent handler threw: ${describeError(error)}`);
            }
        };
        const setState = (state: RunState) => {
            run.state = state;
            log.debug(`run ${run.id}: ${state}`);
            emit({ type: 'state', state });
        };

        log.info(`run ${run.id}: "${normalizeShort(question, 80)}"`);

        try {
            for (const name of STAGE_ORDER) {
                setState(STAGE_STATE[name]);
                const result = await this.runStage(name, question, results, options, emit);
                results[name] = result;
                run.stages.push(result);
                emit({ type: 'stage_complete', result });

                run.warnings.push(...this.stageWarnings(result));

                if (name === 'planner' && result.error && !result.rawText.trim()) {
                    setState('failed');
                    break;
                }
                if (name === 'research') {
                    const offered = this.toolsFor('research')?.list().map((t) => t.name) ?? [];
                    run.warnings.push(...researchWarnings(result, offered, this.preference));
                }
            }
            if (run.state !== 'failed') setState('done');
        } catch (error) {
            if (!(error instanceof RunCancelledError) && !signal?.aborted) throw error;
            setState('cancelled');
        }

        run.answer = buildFinalAnswer(results, run.state);
        run.finishedAt = new Date().toISOString();
        for (const warning of run.warnings) log.warn(warning);
        log.info(`run ${run.id}: ${run.state}${run.answer.degraded ? ' (degraded)' : ''}`);
        emit({ type: 'done', run });
        return run;
    }

    /**
     * The run as an async sequence of events. Events are queued, so a slow
     * reader never holds up the model stream. Leaving the loop early cancels
     * the run.
     */
    async *stream(question: string, options: { signal?: AbortSignal } = {}): AsyncGenerator<RunEvent, void, undefined> {
        const queue = new EventQueue<RunEvent>();
        const controller = new AbortController();
        const onAbort = () => controller.abort(options.signal?.reason);
        if (options.signal?.aborted) controller.abort(options.signal.reason);
        else options.signal?.addEventListener('abort', onAbort, { once: true });

        let settled = false;
        const finished = this.run(question, { signal: controller.signal, onEvent: (event) => queue.push(event) })
            .then(
                () => queue.close(),
                (error: unknown) => queue.fail(error)
            )
            .finally(() => {
                settled = true;
            });

        try {
            yield* queue;
        } finally {
            if (!settled) controller.abort();
            options.signal?.removeEventListener('abort', onAbort);
            await finished;
        }
    }

    private async runStage(
        name: StageName,
        question: string,
        results: StageResults,
        options: RunOptions,
        emit: (event: RunEvent) => void
    ): Promise<StageResult> {
        const { signal } = options;
        const context = this.buildContext(name, question, results);

        return this.executor.run(
            this.stages[name],
            context,
            this.toolsFor(name),
            (text) => {
                if (signal?.aborted) return;
                options.onChunk?.(name, text);
                emit({ type: 'chunk', stage: name, text });
            },
            {
                signal,
                onReasoning: (text) => emit({ type: 'reasoning', stage: name, text }),
                onToolCall: (call) => emit({ type: 'tool_call', stage: name, call }),
                onToolResult: (result) => emit({ type: 'tool_result', stage: name, result }),
            }
        );
    }

    private stageWarnings(result: StageResult): string[] {
        const warnings = result.issues
            .filter((issue) => issue.kind !== 'ArtifactParseFailure')
            .map((issue) => `${result.stageName}: ${issue.message}`);
        if (result.error) {
            warnings.push(`${result.stageName} stage failed: ${result.error.message}`);
        }
        return warnings;
    }
}
