import { Command } from 'commander';
import chalk from 'chalk';
import { loadWorkspace, runAction } from '../workspace.js';
import type { GlobalOptions } from '../workspace.js';
import { renderExcludedEdges, renderIssues, renderSummary } from '../ui/render.js';

export function createCheckCommand(): Command {
    return new Command('check')
        .description('Validate plugin and application manifests')
        .option('-d, --derive', 'Derive the order instead of checking the application\'s order')
        .action(async (_options: GlobalOptions, command: Command) => {
            const opts = command.optsWithGlobals<GlobalOptions>();
            await runAction(opts, async () => {
                const started = Date.now();
                const { application, registry, resolver, resolveOptions } = await loadWorkspace(opts);
                const report = resolver.resolve(application, resolveOptions);

                renderExcludedEdges(report.excludedEdges);
                if (!report.success) {
                    renderIssues(report.issues);
                    return false;
                }

                const unused = registry.list().filter(p => !application.plugins.includes(p.name));
                if (unused.length > 0) {
                    console.log(chalk.dim(`  Not in application: ${unused.map(p => p.name).join(', ')}`));
                }
                renderSummary(`${application.name}: ${application.plugins.length} plugins, no issues`, Date.now() - started);
                return true;
            });
        });
}
