/**
 * Context assembly for stage transcripts
 */

import type { ConversationTurn, StageResult } from './types.js';

/** Rough characters-per-token ratio used for budgeting */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(turn: ConversationTurn): number {
    let chars = turn.content.length;
    for (const call of turn.toolCalls) {
        chars += call.toolName.length + JSON.stringify(call.arguments).length;
    }
    return Math.ceil(chars / CHARS_PER_TOKEN);
}

/**
 * Drop the oldest turns until the rest fit the budget. The most recent
 * turn is always kept, even when it alone is over budget.
 */
export function fitToBudget(
    turns: readonly ConversationTurn[],
    tokenBudget: number
): { turns: ConversationTurn[]; truncated: boolean } {
    let total = 0;
    let firstKept = turns.length;

    for (let i = turns.length - 1; i >= 0; i--) {
        const cost = estimateTokens(turns[i]);
        if (firstKept < turns.length && total + cost > tokenBudget) break;
        total += cost;
        firstKept = i;
    }

    // A tool turn cannot lead the transcript without the assistant turn that asked for it
    while (firstKept < turns.length - 1 && turns[firstKept].role === 'tool') firstKept++;

    return { turns: turns.slice(firstKept), truncated: firstKept > 0 };
}

export function userTurn(content: string): ConversationTurn {
    return { role: 'user', content, toolCalls: [] };
}

/**
 * Render a finished stage as a user turn for a later stage: its artifacts
 * when any were parsed, else its raw text, else a failure marker.
 */
export function renderStageContext(result: StageResult): ConversationTurn {
    const label = `${result.stageName.toUpperCase()} OUTPUT`;
    let body: string;

    if (Object.keys(result.artifacts).length > 0) {
        body = JSON.stringify(result.artifacts, null, 2);
    } else if (result.rawText.trim()) {
        body = result.rawText.trim();
    } else {
        body = `(no output${result.error ? `: ${result.error.message}` : ''})`;
    }

    return userTurn(`${label}:\n${body}`);
}
