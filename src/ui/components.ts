/**
 * UI Components - terminal output around a run
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import type { ConversationRun } from '../pipeline/types.js';
import type { ToolDefinition } from '../tools/types.js';
import { colors, icons, createHeader, divider, getBoxOuterWidth, getUiMode } from './theme.js';
import { formatAnswerMarkdown, renderMarkdown } from './format.js';

/**
 * Display the app header
 */
export function showHeader(options: { title?: string; model?: string; tools?: number; showDivider?: boolean } = {}): void {
    const { title = 'stageline', model, tools } = options;
    const showDivider = options.showDivider !== false;
    const mode = getUiMode();
    const details: string[] = [];
    if (model) details.push(`Model: ${model}`);
    if (tools !== undefined) details.push(`Tools: ${tools}`);

    console.log();

    if (mode === 'fancy') {
        const heading = gradient(['#6D28D9', '#7C3AED', '#4F46E5', '#06B6D4'])(title);
        const lines = [heading, ...details.map((d) => colors.muted(d))];

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#7C3AED',
                width: getBoxOuterWidth(),
            })
        );
        if (showDivider) console.log(colors.muted(divider()));
        return;
    }

    console.log(createHeader(title, details.join(' | ') || undefined));
    if (showDivider) console.log(colors.muted(divider()));
}

export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

/**
 * Print the final answer of a run. When the final stage was already
 * streamed only the sources, checklist and warnings are added.
 */
export function showAnswer(run: ConversationRun, options: { render: boolean; streamed: boolean }): void {
    const markdown = formatAnswerMarkdown(run.answer, [], { includeBody: !options.streamed });
    const mode = getUiMode();

    console.log();
    if (!options.streamed) {
        if (mode === 'fancy') {
            console.log(
                boxen(colors.primary('Answer'), {
                    padding: { top: 0, bottom: 0, left: 1, right: 1 },
                    borderStyle: 'round',
                    borderColor: '#7C3AED',
                    width: getBoxOuterWidth(),
                })
            );
        } else {
            console.log(colors.primary('Answer'));
            console.log(colors.muted(divider()));
        }
    }

    if (markdown) console.log(options.render ? renderMarkdown(markdown) : markdown);
    showWarnings(run.warnings);
}

export function showWarnings(warnings: readonly string[]): void {
    if (warnings.length === 0) return;
    console.log(colors.warning(`${icons.warning} Warnings`));
    warnings.forEach((w) => console.log(colors.muted(`  ${icons.bullet} ${w}`)));
}

/**
 * List tools grouped by the server that provides them
 */
export function showToolList(tools: readonly ToolDefinition[]): void {
    if (tools.length === 0) {
        console.log(colors.muted('No tools available. Set FIRECRAWL_API_KEY, MCP_SSE_SERVERS or enable the Tavily client.'));
        return;
    }

    const byServer = new Map<string, ToolDefinition[]>();
    for (const tool of tools) {
        const list = byServer.get(tool.server) ?? [];
        list.push(tool);
        byServer.set(tool.server, list);
    }

    for (const [server, list] of byServer) {
        console.log();
        console.log(`${colors.primary(server)} ${colors.muted(`(${list.length})`)}`);
        for (const tool of list) {
            const description = tool.description.split('\n')[0]?.trim() ?? '';
            console.log(`  ${colors.secondary(tool.name)}${description ? colors.muted(`  ${description}`) : ''}`);
        }
    }
    console.log();
}

export function showComplete(run: ConversationRun, outputPath?: string): void {
    const mode = getUiMode();
    const seconds = run.finishedAt
        ? ((Date.parse(run.finishedAt) - Date.parse(run.startedAt)) / 1000).toFixed(1)
        : undefined;
    const label = run.state === 'done' ? (run.answer.degraded ? 'Done (partial)' : 'Done') : run.state === 'cancelled' ? 'Cancelled' : 'Failed';
    const timing = seconds ? colors.muted(` in ${seconds}s`) : '';

    console.log();
    if (run.state !== 'done') {
        console.log(`${colors.warning(icons.warning)} ${colors.warning(label)}${timing}`);
    } else if (mode === 'fancy') {
        console.log(`${colors.success(icons.complete)} ${gradient(['#10B981', '#06B6D4'])(label)}${timing}`);
    } else {
        console.log(`${colors.success(icons.complete)} ${colors.success(label)}${timing}`);
    }
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}
