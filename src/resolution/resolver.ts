import type { ApplicationDescriptor, PluginDescriptor } from '../descriptors/types.js';
import type { PluginRegistry } from '../descriptors/registry.js';
import { Logger } from '../logging/logger.js';
import { PrecedenceChain } from './chain.js';
import { composeAll, planComposition } from './composition.js';
import type { CompositionPlan } from './composition.js';
import { validateConflicts } from './conflicts.js';
import { detectCycle } from './cycles.js';
import { buildDependencyGraph } from './graph.js';
import type { ExcludedEdge, PartialActivationPolicy } from './graph.js';
import { ResolutionError } from './issues.js';
import type { ResolutionIssue } from './issues.js';
import { checkOrder, deriveOrder } from './order.js';
import type { OrderMode } from './order.js';

export interface ResolveOptions {
    /** Check the application's order, or derive one (default: authored) */
    order?: OrderMode;
    /** Handling of dependencies the application leaves out (default: error) */
    partialActivation?: PartialActivationPolicy;
}

export interface ResolutionReport {
    application: string;
    success: boolean;
    /** Set only when no issue was found */
    chain: PrecedenceChain | null;
    issues: ResolutionIssue[];
    excludedEdges: ExcludedEdge[];
}

/**
 * Resolver — runs the resolution pipeline for an application
 *
 * graph → cycles → order → conflicts. Graph and cycle problems stop the
 * run at the first issue; order and conflict problems are gathered into
 * one report.
 */
export class Resolver {
    private logger: Logger;

    constructor(
        private registry: PluginRegistry,
        logger: Logger = Logger.silent()
    ) {
        this.logger = logger.child('resolver');
    }

    resolve(application: ApplicationDescriptor, options: ResolveOptions = {}): ResolutionReport {
        const mode = options.order ?? 'authored';
        this.logger.debug(`Resolving "${application.name}" (${application.plugins.length} plugins, ${mode} order)`);

        const built = buildDependencyGraph(this.registry, application, {
            partialActivation: options.partialActivation,
        });
        if (!built.success) {
            return this.report(application, null, built.issues, []);
        }

        const { graph, excludedEdges } = built.value;
        for (const edge of excludedEdges) {
            this.logger.warn(`Ignoring dependency "${edge.plugin}" → "${edge.dependency}" (not in application)`);
        }

        const acyclic = detectCycle(graph);
        if (!acyclic.success) {
            return this.report(application, null, acyclic.issues, excludedEdges);
        }

        const order = mode === 'derived' ? deriveOrder(graph, this.registry) : [...application.plugins];
        const orderIssues = mode === 'authored' ? checkOrder(graph, order) : [];
        this.logger.debug(`Order check: ${orderIssues.length} violation(s)`);

        const plugins = order.map(name => this.lookup(name));
        const conflictIssues = validateConflicts(plugins, graph);
        this.logger.debug(`Conflict check: ${conflictIssues.length} conflict(s)`);

        const issues = [...orderIssues, ...conflictIssues];
        const chain = issues.length === 0 ? new PrecedenceChain(plugins) : null;
        return this.report(application, chain, issues, excludedEdges);
    }

    /**
     * Resolve, throwing a ResolutionError when any issue is found
     */
    resolveOrThrow(application: ApplicationDescriptor, options: ResolveOptions = {}): PrecedenceChain {
        const report = this.resolve(application, options);
        if (!report.chain) {
            throw new ResolutionError(application.name, report.issues);
        }
        return report.chain;
    }

    /**
     * Composition plan for one class, or for every class the chain touches
     */
    plan(chain: PrecedenceChain, className: string): CompositionPlan;
    plan(chain: PrecedenceChain): CompositionPlan[];
    plan(chain: PrecedenceChain, className?: string): CompositionPlan | CompositionPlan[] {
        return className === undefined ? composeAll(chain) : planComposition(chain, className);
    }

    private lookup(name: string): PluginDescriptor {
        const plugin = this.registry.get(name);
        if (!plugin) {
            throw new Error(`Plugin "${name}" disappeared from the registry during resolution`);
        }
        return plugin;
    }

    private report(
        application: ApplicationDescriptor,
        chain: PrecedenceChain | null,
        issues: ResolutionIssue[],
        excludedEdges: ExcludedEdge[]
    ): ResolutionReport {
        if (issues.length > 0) {
            this.logger.debug(`"${application.name}" failed with ${issues.length} issue(s)`);
        }
        return {
            application: application.name,
            success: issues.length === 0,
            chain,
            issues,
            excludedEdges,
        };
    }
}
