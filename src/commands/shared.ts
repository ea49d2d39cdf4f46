import { ensureConfig, loadConfig, validateConfig, type Config } from '../config.js';
import type { Agent } from '../agent/factory.js';
import type { ConversationRun } from '../pipeline/types.js';
import { PipelineFailedError, RunCancelledError } from '../errors.js';
import { RunView } from '../ui/run-view.js';
import { showAnswer } from '../ui/components.js';
import { colors } from '../ui/theme.js';

export interface UiFlags {
    ui?: string;
    render?: string;
    reasoning?: string;
}

function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Paste your API key (it will be saved to .env).'));
    console.log(colors.muted(`Missing: ${errors.map(e => e.replace(' is not set', '')).join(', ')}`));
    console.log(colors.muted('Tip: run `stageline init` anytime to change defaults.'));
    console.log();
}

/**
 * Load config, prompt for a missing key on a TTY, and apply the UI flags.
 * UI helpers read UI_MODE from the environment, so it is set here.
 */
export async function prepareConfig(flags: UiFlags, required: { llm?: boolean; tools?: boolean } = { llm: true }): Promise<Config> {
    const preflight = loadConfig();
    process.env.UI_MODE = flags.ui || preflight.uiMode;

    const validation = validateConfig(preflight, required);
    if (!validation.valid) maybeShowSetupIntro(validation.errors);
    const config = await ensureConfig(required);

    process.env.UI_MODE = flags.ui || config.uiMode;

    const render = flags.render?.trim().toLowerCase();
    const reasoning = flags.reasoning?.trim().toLowerCase();
    return {
        ...config,
        renderMarkdown: render ? render === 'terminal' : config.renderMarkdown,
        showReasoning: reasoning === 'on' ? true : reasoning === 'off' ? false : config.showReasoning,
    };
}

/**
 * Run one question with live output. The final stage is streamed raw
 * unless the answer gets rendered as markdown afterwards.
 */
export async function runWithView(
    agent: Agent,
    config: Config,
    question: string,
    signal?: AbortSignal
): Promise<ConversationRun> {
    const streamFinal = !config.renderMarkdown;
    const view = new RunView({
        showReasoning: config.showReasoning,
        showToolCalls: config.showToolCalls,
        streamFinal,
    });

    const run = await agent.orchestrator.run(question, {
        signal,
        onEvent: (event) => view.handle(event),
    });

    showAnswer(run, { render: config.renderMarkdown, streamed: streamFinal && run.state === 'done' && !run.answer.degraded });
    return run;
}

/**
 * Turn a run that did not finish into the error the CLI exits with
 */
export function assertFinished(run: ConversationRun): void {
    if (run.state === 'failed') {
        const planner = run.stages.find((s) => s.stageName === 'planner');
        throw new PipelineFailedError(`Planning failed: ${planner?.error?.message ?? 'no output'}`);
    }
    if (run.state === 'cancelled') throw new RunCancelledError();
}
