/**
 * Interactive session - asks for a question, runs it, repeats.
 * Ctrl-C during a run cancels that run; at the prompt it quits.
 */

import inquirer from 'inquirer';
import type { Config } from '../config.js';
import type { ConversationRun } from '../pipeline/types.js';
import { describeError } from '../errors.js';
import { createModuleLogger } from '../logger.js';
import { showComplete, showError, showHeader, showToolList } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import type { Agent } from './factory.js';

const log = createModuleLogger('chat');

export type ChatAction = 'exit' | 'continue' | 'ask';

export type RunQuestion = (agent: Agent, config: Config, question: string, signal: AbortSignal) => Promise<ConversationRun>;

/**
 * Classify one line of input. Bare `quit`/`exit` leave too.
 */
export function parseChatInput(line: string): { action: ChatAction; command?: string } {
    const trimmed = line.trim();
    if (!trimmed) return { action: 'continue' };

    const lower = trimmed.toLowerCase();
    if (lower === 'quit' || lower === 'exit') return { action: 'exit' };
    if (!trimmed.startsWith('/')) return { action: 'ask' };

    const command = lower.slice(1).split(/\s+/)[0] ?? '';
    if (command === 'exit' || command === 'quit' || command === 'q') return { action: 'exit' };
    return { action: 'continue', command };
}

export class ChatSession {
    private current?: AbortController;
    private readonly history: ConversationRun[] = [];

    constructor(
        private readonly agent: Agent,
        private readonly config: Config,
        private readonly runQuestion: RunQuestion
    ) {}

    async start(): Promise<void> {
        this.showWelcome();

        const onSigint = () => {
            if (this.current) {
                console.error(colors.muted('\nCancelling...'));
                this.current.abort();
                return;
            }
            console.log('\n' + colors.muted('Goodbye!'));
            process.exit(0);
        };
        process.on('SIGINT', onSigint);

        try {
            for (;;) {
                const { input } = await inquirer.prompt<{ input: string }>([
                    {
                        type: 'input',
                        name: 'input',
                        message: colors.primary('>'),
                    },
                ]);

                const { action, command } = parseChatInput(input);
                if (action === 'exit') return;
                if (action === 'continue') {
                    if (command !== undefined) this.handleCommand(command);
                    continue;
                }

                await this.ask(input.trim());
            }
        } finally {
            process.off('SIGINT', onSigint);
        }
    }

    private async ask(question: string): Promise<void> {
        const controller = new AbortController();
        this.current = controller;
        try {
            const run = await this.runQuestion(this.agent, this.config, question, controller.signal);
            this.history.push(run);
            showComplete(run);
        } catch (error) {
            log.debug(`run threw: ${describeError(error)}`);
            showError(describeError(error));
        } finally {
            this.current = undefined;
        }
        console.log();
    }

    private handleCommand(command: string): void {
        if (command === 'help' || command === '?') {
            this.showHelp();
            return;
        }
        if (command === 'tools') {
            showToolList(this.agent.registry?.list() ?? []);
            return;
        }
        if (command === 'clear' || command === 'cls') {
            this.showWelcome();
            return;
        }
        if (command === 'history') {
            this.showHistory();
            return;
        }
        console.log(colors.warning(`Unknown command: /${command}`) + colors.muted('  (try /help)'));
    }

    private showWelcome(): void {
        console.clear();
        showHeader({ model: this.agent.model, tools: this.agent.registry?.list().length ?? 0, showDivider: false });
        console.log();
        console.log(colors.muted('Ask any question to start.'));
        console.log(colors.muted('Type /help for commands, or exit to quit. Ctrl-C stops a running answer.'));
        console.log();
    }

    private showHelp(): void {
        console.log();
        console.log(colors.primary('Commands'));
        console.log('  ' + colors.secondary('/tools') + '             List available tools');
        console.log('  ' + colors.secondary('/history') + '           Questions asked in this session');
        console.log('  ' + colors.secondary('/clear') + '             Clear the screen');
        console.log('  ' + colors.secondary('/exit') + '              Quit');
        console.log();
    }

    private showHistory(): void {
        if (this.history.length === 0) {
            console.log(colors.muted('No questions yet.'));
            return;
        }
        this.history.forEach((run, i) => {
            const state = run.answer.degraded && run.state === 'done' ? 'partial' : run.state;
            console.log(`${colors.dim(`${i + 1}.`)} ${run.question} ${colors.muted(`(${state})`)}`);
        });
    }
}
