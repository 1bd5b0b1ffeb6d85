import type { PluginRegistry } from '../descriptors/registry.js';
import type { DependencyGraph } from './graph.js';
import { dependenciesOf } from './graph.js';
import type { ResolutionIssue } from './issues.js';

/**
 * `authored` keeps the application's own order and checks it;
 * `derived` computes a topological order.
 */
export type OrderMode = 'authored' | 'derived';

/**
 * Check a hand-authored order: every direct dependency of a plugin must
 * be listed before it.
 *
 * All violations are returned, scanning left to right and then in
 * dependency declaration order, so the first entry is the first
 * offending pair.
 */
export function checkOrder(graph: DependencyGraph, order: readonly string[]): ResolutionIssue[] {
    const position = new Map(order.map((name, index): [string, number] => [name, index]));
    const issues: ResolutionIssue[] = [];

    order.forEach((plugin, index) => {
        for (const dependency of dependenciesOf(graph, plugin)) {
            const at = position.get(dependency);
            if (at === undefined || at >= index) {
                issues.push({ kind: 'OrderViolation', plugin, dependency });
            }
        }
    });

    return issues;
}

/**
 * Derive a topological order over an acyclic graph.
 *
 * Whenever several plugins have all their dependencies placed, the one
 * registered first wins.
 */
export function deriveOrder(graph: DependencyGraph, registry: PluginRegistry): string[] {
    const pending = [...graph.nodes].sort(
        (a, b) => registry.declarationIndex(a) - registry.declarationIndex(b)
    );
    const placed = new Set<string>();
    const order: string[] = [];

    while (pending.length > 0) {
        const next = pending.findIndex(name =>
            dependenciesOf(graph, name).every(dependency => placed.has(dependency))
        );
        if (next === -1) {
            throw new Error(`Cannot derive an order: unresolved dependencies among ${pending.join(', ')}`);
        }

        const [name] = pending.splice(next, 1);
        placed.add(name);
        order.push(name);
    }

    return order;
}
