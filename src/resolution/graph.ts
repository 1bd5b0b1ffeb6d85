import type { ApplicationDescriptor } from '../descriptors/types.js';
import type { PluginRegistry } from '../descriptors/registry.js';
import type { ResolutionIssue, StageResult } from './issues.js';

/**
 * What to do when a plugin depends on a loaded plugin that the
 * application leaves out.
 */
export type PartialActivationPolicy = 'error' | 'exclude';

/**
 * Plugin name → direct dependency names, in declaration order.
 * `nodes` keeps the application's order for stable traversal.
 */
export interface DependencyGraph {
    readonly nodes: readonly string[];
    readonly edges: ReadonlyMap<string, readonly string[]>;
}

export interface ExcludedEdge {
    plugin: string;
    dependency: string;
}

export interface GraphBuild {
    graph: DependencyGraph;
    /** Edges dropped under the `exclude` partial activation policy */
    excludedEdges: ExcludedEdge[];
}

export interface GraphBuildOptions {
    partialActivation?: PartialActivationPolicy;
}

/**
 * Build the dependency graph for an application's plugin set.
 *
 * Stops at the first structural problem: an unknown or repeated plugin in
 * the application, or a dependency that cannot be satisfied.
 */
export function buildDependencyGraph(
    registry: PluginRegistry,
    application: ApplicationDescriptor,
    options: GraphBuildOptions = {}
): StageResult<GraphBuild> {
    const policy = options.partialActivation ?? 'error';
    const active = new Set<string>();

    for (const name of application.plugins) {
        if (!registry.has(name)) {
            return fail({ kind: 'UnknownPluginInApplication', application: application.name, plugin: name });
        }
        if (active.has(name)) {
            return fail({ kind: 'DuplicatePluginInApplication', application: application.name, plugin: name });
        }
        active.add(name);
    }

    const edges = new Map<string, readonly string[]>();
    const excludedEdges: ExcludedEdge[] = [];

    for (const name of application.plugins) {
        const plugin = registry.get(name);
        if (!plugin) continue;

        const kept: string[] = [];
        for (const dependency of plugin.dependencies) {
            if (!registry.has(dependency)) {
                return fail({ kind: 'UnknownDependency', plugin: name, dependency });
            }
            if (!active.has(dependency)) {
                if (policy === 'error') {
                    return fail({ kind: 'InactiveDependency', plugin: name, dependency });
                }
                excludedEdges.push({ plugin: name, dependency });
                continue;
            }
            kept.push(dependency);
        }
        edges.set(name, Object.freeze(kept));
    }

    return {
        success: true,
        value: {
            graph: { nodes: Object.freeze([...application.plugins]), edges },
            excludedEdges,
        },
    };
}

export function dependenciesOf(graph: DependencyGraph, name: string): readonly string[] {
    return graph.edges.get(name) ?? [];
}

/**
 * Every plugin reachable from `name` through dependency edges (excluding
 * `name` itself). Assumes an acyclic graph.
 */
export function transitiveDependencies(graph: DependencyGraph, name: string): Set<string> {
    const reached = new Set<string>();
    const pending = [...dependenciesOf(graph, name)];

    while (pending.length > 0) {
        const next = pending.pop();
        if (next === undefined || reached.has(next)) continue;
        reached.add(next);
        pending.push(...dependenciesOf(graph, next));
    }

    return reached;
}

function fail(issue: ResolutionIssue): StageResult<never> {
    return { success: false, issues: [issue] };
}
