#!/usr/bin/env node
/**
 * stageline - Main Entry Point
 * Answers questions through a planner → research → critic → final pipeline
 */

import 'dotenv/config';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { toolsCommand } from './commands/tools.js';
import { initCommand } from './commands/init.js';
import { PipelineFailedError, RunCancelledError, describeError } from './errors.js';
import { showError } from './ui/components.js';
import { colors } from './ui/theme.js';
import { VERSION } from './version.js';

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(143);
});

function exitCodeFor(error: unknown): number {
    if (error instanceof RunCancelledError) return 130;
    if (error instanceof PipelineFailedError) return 2;
    return 1;
}

const program = new Command();

program
    .name('stageline')
    .description('Staged question answering with research tools')
    .version(VERSION);

program.addCommand(chatCommand, { isDefault: true });
program.addCommand(askCommand);
program.addCommand(toolsCommand);
program.addCommand(initCommand);

program.parseAsync().catch((error: unknown) => {
    if (!(error instanceof RunCancelledError)) showError(describeError(error));
    process.exit(exitCodeFor(error));
});
