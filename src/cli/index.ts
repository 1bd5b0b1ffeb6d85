import { Command } from 'commander';
import { createResolveCommand } from './commands/resolve.js';
import { createPlanCommand } from './commands/plan.js';
import { createCheckCommand } from './commands/check.js';

export const VERSION = '0.1.0';

export function createCLI(): Command {
    const program = new Command('compose')
        .description('Resolve static plugin precedence and composition plans')
        .version(VERSION)
        .option('-C, --cwd <dir>', 'Project root (default: current directory)')
        .option('-c, --config <file>', 'Configuration file (default: composer.yaml)')
        .option('-v, --verbose', 'Log every resolution stage');

    program.addCommand(createResolveCommand());
    program.addCommand(createPlanCommand());
    program.addCommand(createCheckCommand());

    return program;
}
