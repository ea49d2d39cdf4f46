/**
 * UI Theme - palette and glyphs for the CLI
 */

import chalk from 'chalk';
import figures from 'figures';
import type { StageName } from '../pipeline/types.js';
import type { UiMode } from '../config.js';

/**
 * `NO_COLOR` always wins. `fancy` falls back to `minimal` off a TTY.
 */
export function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

function isPlainMode(): boolean {
    return getUiMode() === 'plain';
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 112): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

export const colors = {
    primary: maybeColor(chalk.hex('#7C3AED')),
    secondary: maybeColor(chalk.hex('#06B6D4')),
    success: maybeColor(chalk.hex('#10B981')),
    warning: maybeColor(chalk.hex('#F59E0B')),
    error: maybeColor(chalk.hex('#EF4444')),
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
};

// `figures` gives OS-safe fallbacks
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    bullet: figures.bullet,
    tool: figures.pointerSmall,
};

export const STAGE_LABELS: Readonly<Record<StageName, string>> = {
    planner: 'Plan',
    research: 'Research',
    critic: 'Critique',
    final: 'Answer',
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

export function createHeader(title: string, subtitle?: string): string {
    const parts = [isPlainMode() ? title : chalk.bold(colors.primary(title))];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

/**
 * One line for a finished stage
 */
export function stageLine(
    index: number,
    total: number,
    label: string,
    status: 'complete' | 'error' | 'warning',
    detail?: string
): string {
    const statusIcon = {
        complete: colors.success(icons.complete),
        error: colors.error(icons.error),
        warning: colors.warning(icons.warning),
    }[status];

    const indexLabel = colors.dim(`${index + 1}/${total}`);
    const suffix = detail ? ` ${colors.muted(detail)}` : '';
    return `${statusIcon} ${indexLabel} ${label}${suffix}`;
}
