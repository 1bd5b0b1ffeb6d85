import type { PluginDescriptor } from '../descriptors/types.js';
import type { DependencyGraph } from './graph.js';
import { transitiveDependencies } from './graph.js';
import type { ResolutionIssue } from './issues.js';

/**
 * Validate class ownership across an ordered plugin set.
 *
 * - Each class name has at most one base provider.
 * - A plugin may only extend a class whose base provider it depends on,
 *   directly or transitively.
 *
 * Every conflict is reported, in plugin order.
 */
export function validateConflicts(
    plugins: readonly PluginDescriptor[],
    graph: DependencyGraph
): ResolutionIssue[] {
    const issues: ResolutionIssue[] = [];
    const providers = new Map<string, string[]>();

    for (const plugin of plugins) {
        for (const className of plugin.provides) {
            const existing = providers.get(className);
            if (existing) {
                issues.push({
                    kind: 'DuplicateBaseProvider',
                    className,
                    first: existing[0],
                    second: plugin.name,
                });
                existing.push(plugin.name);
            } else {
                providers.set(className, [plugin.name]);
            }
        }
    }

    for (const plugin of plugins) {
        if (plugin.extends.length === 0) continue;

        const reachable = transitiveDependencies(graph, plugin.name);
        for (const className of plugin.extends) {
            const candidates = providers.get(className) ?? [];
            if (!candidates.some(provider => reachable.has(provider))) {
                issues.push({ kind: 'UnresolvedBaseReference', plugin: plugin.name, className });
            }
        }
    }

    return issues;
}
