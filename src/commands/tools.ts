import { Command } from 'commander';
import { createToolRegistry } from '../tools/factory.js';
import { createSpinner, showToolList } from '../ui/components.js';
import { prepareConfig } from './shared.js';

export const toolsCommand = new Command('tools')
    .description('Connect to the configured tool servers and list their tools')
    .option('--json', 'Output JSON')
    .action(async (options: { json?: boolean }) => {
        const config = await prepareConfig({}, { llm: false });

        const spinner = options.json ? undefined : createSpinner('Connecting to tool servers...');
        spinner?.start();
        const registry = await createToolRegistry(config).finally(() => spinner?.stop());

        try {
            if (options.json) {
                console.log(JSON.stringify(registry.list(), null, 2));
                return;
            }
            showToolList(registry.list());
        } finally {
            await registry.close();
        }
    });
