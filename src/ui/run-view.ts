/**
 * Live run display - prints stage output, tool activity and stage
 * results as the orchestrator reports them
 */

import { describeArgs } from '../tools/arguments.js';
import { STAGE_ORDER, type RunEvent, type StageName, type StageResult, type ToolResult } from '../pipeline/types.js';
import { STAGE_LABELS, colors, icons, stageLine } from './theme.js';

export interface RunViewOptions {
    showReasoning: boolean;
    showToolCalls: boolean;
    /** Stream the final stage's text too; otherwise the caller prints the answer */
    streamFinal: boolean;
    write?: (text: string) => void;
}

export function toolResultLine(result: ToolResult): string {
    if (result.error) return `  ${colors.error(icons.error)} ${result.toolName}: ${colors.muted(result.error)}`;
    const output = typeof result.output === 'string' ? result.output : JSON.stringify(result.output);
    return `  ${colors.success(icons.complete)} ${result.toolName} ${colors.muted(`(${output.length} chars)`)}`;
}

export function stageSummaryLine(result: StageResult): string {
    const index = STAGE_ORDER.indexOf(result.stageName);
    const notable = result.issues.filter((issue) => issue.kind !== 'ArtifactParseFailure');
    const status = result.error ? 'error' : notable.length > 0 ? 'warning' : 'complete';

    const details = [`${(result.durationMs / 1000).toFixed(1)}s`];
    if (result.toolCallCount > 0) {
        details.unshift(`${result.toolCallCount} tool call${result.toolCallCount === 1 ? '' : 's'}`);
    }
    if (result.error) details.push(result.error.message);

    return stageLine(index, STAGE_ORDER.length, STAGE_LABELS[result.stageName], status, `(${details.join(', ')})`);
}

export class RunView {
    private readonly write: (text: string) => void;
    private stage?: StageName;
    private atLineStart = true;
    private inReasoning = false;

    constructor(private readonly options: RunViewOptions) {
        this.write = options.write ?? ((text) => process.stdout.write(text));
    }

    handle(event: RunEvent): void {
        switch (event.type) {
            case 'chunk':
                if (event.stage === 'final' && !this.options.streamFinal) return;
                this.enterStage(event.stage);
                this.endReasoning();
                this.print(event.text);
                return;
            case 'reasoning':
                if (!this.options.showReasoning) return;
                this.enterStage(event.stage);
                this.inReasoning = true;
                this.print(event.text, colors.dim);
                return;
            case 'tool_call':
                if (!this.options.showToolCalls) return;
                this.enterStage(event.stage);
                this.line(colors.muted(`  ${icons.tool} ${event.call.toolName} ${describeArgs(event.call.arguments)}`.trimEnd()));
                return;
            case 'tool_result':
                if (!this.options.showToolCalls) return;
                this.line(toolResultLine(event.result));
                return;
            case 'stage_complete':
                this.endReasoning();
                this.line(stageSummaryLine(event.result));
                this.stage = undefined;
                return;
            case 'state':
            case 'done':
                return;
        }
    }

    private enterStage(stage: StageName): void {
        if (this.stage === stage) return;
        this.stage = stage;
        this.newline();
        this.write(`\n${colors.primary(STAGE_LABELS[stage])}\n`);
        this.atLineStart = true;
    }

    private endReasoning(): void {
        if (!this.inReasoning) return;
        this.inReasoning = false;
        this.newline();
    }

    private print(text: string, style: (text: string) => string = (t) => t): void {
        if (!text) return;
        this.write(style(text));
        this.atLineStart = text.endsWith('\n');
    }

    private line(text: string): void {
        this.newline();
        this.write(`${text}\n`);
        this.atLineStart = true;
    }

    private newline(): void {
        if (this.atLineStart) return;
        this.write('\n');
        this.atLineStart = true;
    }
}
