/**
 * Answer formatting - turns a FinalAnswer into markdown for the terminal
 * or a file
 */

import { marked } from 'marked';
import TerminalRenderer from 'marked-terminal';
import type { FinalAnswer } from '../pipeline/types.js';

export interface AnswerFormatOptions {
    /** Leave out the prose when it was already streamed */
    includeBody?: boolean;
    includeWarnings?: boolean;
}

export function formatAnswerMarkdown(
    answer: FinalAnswer,
    warnings: readonly string[],
    options: AnswerFormatOptions = {}
): string {
    const sections: string[] = [];

    if (options.includeBody !== false && answer.text.trim()) {
        sections.push(answer.text.trim());
    }

    if (answer.citations.length > 0) {
        const lines = answer.citations.map((c, i) => `${i + 1}. [${c.title || c.url}](${c.url})`);
        sections.push(['## Sources', '', ...lines].join('\n'));
    }

    if (answer.checklist.length > 0) {
        sections.push(['## Checklist', '', ...answer.checklist.map((item) => `- ${item}`)].join('\n'));
    }

    if (options.includeWarnings !== false && warnings.length > 0) {
        sections.push(['## Warnings', '', ...warnings.map((w) => `- ${w}`)].join('\n'));
    }

    return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
}

export function renderMarkdown(markdown: string): string {
    const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
        ? Math.min(process.stdout.columns, 100)
        : 80;

    marked.setOptions({
        renderer: new TerminalRenderer({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }),
    });

    const rendered = marked.parse(markdown);
    return typeof rendered === 'string' ? rendered : markdown;
}
