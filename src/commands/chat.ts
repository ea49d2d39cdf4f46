import { Command } from 'commander';
import { createAgent } from '../agent/factory.js';
import { ChatSession } from '../agent/chat-session.js';
import { createSpinner } from '../ui/components.js';
import { prepareConfig, runWithView } from './shared.js';

interface ChatOptions {
    model?: string;
    tools: boolean;
    ui?: string;
    render?: string;
    reasoning?: string;
}

export const chatCommand = new Command('chat')
    .description('Start an interactive session (default)')
    .option('-m, --model <model>', 'Model id to use')
    .option('--no-tools', 'Run research without tools')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('--render <mode>', 'Answer rendering: terminal | raw')
    .option('--reasoning <mode>', 'Reasoning output: auto | on | off')
    .action(async (options: ChatOptions) => {
        const config = await prepareConfig(options);

        const spinner = createSpinner('Connecting to tool servers...');
        spinner.start();
        const agent = await createAgent(config, { model: options.model, tools: options.tools })
            .finally(() => spinner.stop());

        try {
            await new ChatSession(agent, config, runWithView).start();
        } finally {
            await agent.close();
        }
    });
