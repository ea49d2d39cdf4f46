import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { createAgent } from '../agent/factory.js';
import { formatAnswerMarkdown } from '../ui/format.js';
import { createSpinner, showComplete, showHeader } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { assertFinished, prepareConfig, runWithView } from './shared.js';

interface AskOptions {
    model?: string;
    output?: string;
    json?: boolean;
    tools: boolean;
    ui?: string;
    render?: string;
    reasoning?: string;
}

export const askCommand = new Command('ask')
    .description('Answer one question through the planner, research, critic and final stages')
    .argument('<question>', 'Question to answer')
    .option('-m, --model <model>', 'Model id to use')
    .option('-o, --output <file>', 'Save the answer as markdown')
    .option('--json', 'Print the whole run as JSON instead of streaming')
    .option('--no-tools', 'Run research without tools')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('--render <mode>', 'Answer rendering: terminal | raw')
    .option('--reasoning <mode>', 'Reasoning output: auto | on | off')
    .action(async (question: string, options: AskOptions) => {
        const config = await prepareConfig(options);

        const spinner = options.json ? undefined : createSpinner('Connecting to tool servers...');
        spinner?.start();
        const agent = await createAgent(config, { model: options.model, tools: options.tools })
            .finally(() => spinner?.stop());

        const controller = new AbortController();
        const onSigint = () => {
            console.error(colors.muted('\nCancelling...'));
            controller.abort();
        };
        process.once('SIGINT', onSigint);

        try {
            if (options.json) {
                const run = await agent.orchestrator.run(question, { signal: controller.signal });
                console.log(JSON.stringify(run, null, 2));
                assertFinished(run);
                return;
            }

            showHeader({ model: agent.model, tools: agent.registry?.list().length ?? 0 });
            const run = await runWithView(agent, config, question, controller.signal);

            if (options.output) {
                await writeFile(options.output, formatAnswerMarkdown(run.answer, run.warnings), 'utf-8');
            }
            showComplete(run, options.output);
            assertFinished(run);
        } finally {
            process.off('SIGINT', onSigint);
            await agent.close();
        }
    });
