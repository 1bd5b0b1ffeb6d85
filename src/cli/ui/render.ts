import chalk from 'chalk';
import type { PrecedenceChain } from '../../resolution/chain.js';
import type { CompositionPlan } from '../../resolution/composition.js';
import type { ExcludedEdge } from '../../resolution/graph.js';
import { describeIssue } from '../../resolution/issues.js';
import type { ResolutionIssue } from '../../resolution/issues.js';

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

/**
 * Render a success line
 */
export function renderSummary(title: string, durationMs: number): void {
    renderSeparator();
    const secs = (durationMs / 1000).toFixed(1);
    console.log(chalk.green.bold(`  ✓ ${title}`) + chalk.dim(` (${secs}s)`));
    console.log();
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    renderSeparator();
    console.log(chalk.red.bold(`  ✗ ${message}`));
    console.log();
}

/**
 * Render the precedence chain, lowest precedence first
 */
export function renderChain(application: string, chain: PrecedenceChain): void {
    console.log(chalk.bold(`\n🔗 Precedence chain for ${chalk.cyan(application)} (${chain.size})\n`));
    chain.plugins.forEach((plugin, index) => {
        const deps = plugin.dependencies.length > 0
            ? chalk.dim(` ← ${plugin.dependencies.join(', ')}`)
            : '';
        console.log(`  ${chalk.dim(String(index + 1).padStart(3))}  ${chalk.white(plugin.name)}${deps}`);
    });
    console.log();
}

/**
 * Render a composition plan as the contributor list of the composed class
 */
export function renderPlan(plan: CompositionPlan): void {
    if (plan.contributors.length === 0) {
        console.log(`  ${chalk.cyan.bold(plan.className)} ${chalk.dim('(no contributors)')}`);
        return;
    }

    console.log(`  ${chalk.cyan.bold(plan.className)}`);
    for (const mixin of plan.mixins) {
        console.log(`    → ${chalk.white(mixin)} ${chalk.dim('mixin')}`);
    }
    if (plan.base) {
        console.log(`    → ${chalk.white(plan.base)} ${chalk.dim('base')}`);
    } else {
        console.log(chalk.yellow('    ⚠ no base provider'));
    }
}

export function renderIssues(issues: ResolutionIssue[]): void {
    console.log(chalk.bold(`\n  ${issues.length} issue(s) found\n`));
    for (const issue of issues) {
        console.log(`  ${chalk.red('✗')} ${chalk.dim(issue.kind.padEnd(28))} ${describeIssue(issue)}`);
    }
    console.log();
}

export function renderExcludedEdges(edges: ExcludedEdge[]): void {
    for (const edge of edges) {
        console.log(chalk.yellow(`  ⚠ ${edge.plugin} → ${edge.dependency} ignored (not in application)`));
    }
}
