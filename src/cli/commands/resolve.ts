import { Command } from 'commander';
import chalk from 'chalk';
import { loadWorkspace, runAction } from '../workspace.js';
import type { GlobalOptions } from '../workspace.js';
import { renderChain, renderExcludedEdges, renderIssues, renderSummary } from '../ui/render.js';

export function createResolveCommand(): Command {
    return new Command('resolve')
        .description('Resolve the application into a precedence chain')
        .option('-d, --derive', 'Derive the order instead of checking the application\'s order')
        .option('--json', 'Print the report as JSON')
        .action(async (_options: GlobalOptions, command: Command) => {
            const opts = command.optsWithGlobals<GlobalOptions>();
            await runAction(opts, async () => {
                const started = Date.now();
                const { application, resolver, resolveOptions } = await loadWorkspace(opts);
                const report = resolver.resolve(application, resolveOptions);

                if (opts.json) {
                    console.log(JSON.stringify(report, null, 2));
                    return report.success;
                }

                renderExcludedEdges(report.excludedEdges);
                if (!report.chain) {
                    renderIssues(report.issues);
                    return false;
                }

                renderChain(report.application, report.chain);
                console.log(chalk.dim(`  Order: ${resolveOptions.order ?? 'authored'}`));
                renderSummary('Resolved', Date.now() - started);
                return true;
            });
        });
}
