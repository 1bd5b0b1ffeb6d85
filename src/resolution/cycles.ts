import type { DependencyGraph } from './graph.js';
import { dependenciesOf } from './graph.js';
import type { StageResult } from './issues.js';

/**
 * Depth-first search for a dependency cycle.
 *
 * Roots are visited in the graph's node order and edges in declaration
 * order, so the first cycle found is the same on every run. The reported
 * path is closed: its first and last entries are the same plugin.
 */
export function detectCycle(graph: DependencyGraph): StageResult<DependencyGraph> {
    const done = new Set<string>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const visit = (name: string): string[] | null => {
        stack.push(name);
        onStack.add(name);

        for (const dependency of dependenciesOf(graph, name)) {
            if (onStack.has(dependency)) {
                return [...stack.slice(stack.indexOf(dependency)), dependency];
            }
            if (done.has(dependency)) continue;

            const cycle = visit(dependency);
            if (cycle) return cycle;
        }

        stack.pop();
        onStack.delete(name);
        done.add(name);
        return null;
    };

    for (const root of graph.nodes) {
        if (done.has(root)) continue;
        const cycle = visit(root);
        if (cycle) {
            return { success: false, issues: [{ kind: 'CyclicDependency', cycle }] };
        }
    }

    return { success: true, value: graph };
}
