import { Command } from 'commander';
import chalk from 'chalk';
import { loadWorkspace, runAction } from '../workspace.js';
import type { GlobalOptions } from '../workspace.js';
import { renderIssues, renderPlan } from '../ui/render.js';

export function createPlanCommand(): Command {
    return new Command('plan')
        .description('Show the contributors of composed classes, highest precedence first')
        .argument('[classes...]', 'Class names (default: every class the plugins touch)')
        .option('-d, --derive', 'Derive the order instead of checking the application\'s order')
        .option('--json', 'Print the plans as JSON')
        .action(async (classes: string[], _options: GlobalOptions, command: Command) => {
            const opts = command.optsWithGlobals<GlobalOptions>();
            await runAction(opts, async () => {
                const { application, resolver, resolveOptions } = await loadWorkspace(opts);
                const report = resolver.resolve(application, resolveOptions);

                if (!report.chain) {
                    if (opts.json) {
                        console.log(JSON.stringify({ success: false, issues: report.issues }, null, 2));
                    } else {
                        renderIssues(report.issues);
                    }
                    return false;
                }

                const chain = report.chain;
                const plans = classes.length > 0
                    ? classes.map(className => resolver.plan(chain, className))
                    : resolver.plan(chain);

                if (opts.json) {
                    console.log(JSON.stringify(plans, null, 2));
                    return true;
                }

                console.log(chalk.bold(`\n🧩 Composition plans for ${chalk.cyan(application.name)} (${plans.length})\n`));
                for (const plan of plans) {
                    renderPlan(plan);
                }
                console.log();
                return true;
            });
        });
}
