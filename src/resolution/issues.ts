/**
 * Resolution issues — typed values describing why a plugin set cannot be
 * composed. Graph and cycle issues are fatal; order and conflict issues are
 * collected together.
 */

export type ResolutionIssue =
    | { kind: 'UnknownPluginInApplication'; application: string; plugin: string }
    | { kind: 'DuplicatePluginInApplication'; application: string; plugin: string }
    | { kind: 'UnknownDependency'; plugin: string; dependency: string }
    | { kind: 'InactiveDependency'; plugin: string; dependency: string }
    | { kind: 'CyclicDependency'; cycle: string[] }
    | { kind: 'OrderViolation'; plugin: string; dependency: string }
    | { kind: 'DuplicateBaseProvider'; className: string; first: string; second: string }
    | { kind: 'UnresolvedBaseReference'; plugin: string; className: string };

export type ResolutionIssueKind = ResolutionIssue['kind'];

export const FATAL_ISSUE_KINDS: readonly ResolutionIssueKind[] = [
    'UnknownPluginInApplication',
    'DuplicatePluginInApplication',
    'UnknownDependency',
    'InactiveDependency',
    'CyclicDependency',
];

export function isFatal(issue: ResolutionIssue): boolean {
    return FATAL_ISSUE_KINDS.includes(issue.kind);
}

/**
 * Render an issue as a single human-readable line
 */
export function describeIssue(issue: ResolutionIssue): string {
    switch (issue.kind) {
        case 'UnknownPluginInApplication':
            return `Application "${issue.application}" references unknown plugin "${issue.plugin}"`;
        case 'DuplicatePluginInApplication':
            return `Application "${issue.application}" lists plugin "${issue.plugin}" more than once`;
        case 'UnknownDependency':
            return `Plugin "${issue.plugin}" depends on unknown plugin "${issue.dependency}"`;
        case 'InactiveDependency':
            return `Plugin "${issue.plugin}" depends on "${issue.dependency}", which the application does not include`;
        case 'CyclicDependency':
            return `Cyclic dependency: ${issue.cycle.join(' → ')}`;
        case 'OrderViolation':
            return `Plugin "${issue.plugin}" is listed before its dependency "${issue.dependency}"`;
        case 'DuplicateBaseProvider':
            return `Class "${issue.className}" is provided by both "${issue.first}" and "${issue.second}"`;
        case 'UnresolvedBaseReference':
            return `Plugin "${issue.plugin}" extends "${issue.className}" without depending on its base provider`;
    }
}

/**
 * Thrown by Resolver.resolveOrThrow when a run reports issues
 */
export class ResolutionError extends Error {
    constructor(
        readonly application: string,
        readonly issues: ResolutionIssue[]
    ) {
        super(`Failed to resolve application "${application}":\n${issues.map(i => `  - ${describeIssue(i)}`).join('\n')}`);
        this.name = 'ResolutionError';
    }
}

/**
 * Outcome of a single pipeline stage
 */
export type StageResult<T> =
    | { success: true; value: T }
    | { success: false; issues: ResolutionIssue[] };
