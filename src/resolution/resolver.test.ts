import { describe, it, expect } from 'vitest';
import { createApplication, createPlugin } from '../descriptors/factory.js';
import { PluginRegistry } from '../descriptors/registry.js';
import type { PluginInit } from '../descriptors/types.js';
import { Logger } from '../logging/logger.js';
import { transitiveDependencies } from './graph.js';
import { ResolutionError } from './issues.js';
import { Resolver } from './resolver.js';

function resolverOf(...plugins: PluginInit[]): Resolver {
    return new Resolver(new PluginRegistry(plugins.map(createPlugin)));
}

const users: PluginInit = { name: 'with_users', provides: ['User'] };
const dob: PluginInit = { name: 'with_dob', dependencies: ['with_users'], extends: ['User'] };
const age: PluginInit = { name: 'with_age', dependencies: ['with_users', 'with_dob'], extends: ['User'] };

describe('Resolver', () => {
    it('resolves a legal order and plans the composed class', () => {
        const resolver = resolverOf(users, dob, age);
        const app = createApplication({ name: 'shop', plugins: ['with_users', 'with_dob', 'with_age'] });

        const report = resolver.resolve(app);
        expect(report.success).toBe(true);
        expect(report.issues).toEqual([]);
        expect(report.chain?.names).toEqual(['with_users', 'with_dob', 'with_age']);

        const chain = resolver.resolveOrThrow(app);
        expect(resolver.plan(chain, 'User').contributors).toEqual(['with_age', 'with_dob', 'with_users']);
    });

    it('reports a plugin listed before its dependency', () => {
        const resolver = resolverOf(users, dob, age);
        const app = createApplication({ name: 'shop', plugins: ['with_dob', 'with_users', 'with_age'] });

        const report = resolver.resolve(app);
        expect(report.success).toBe(false);
        expect(report.chain).toBeNull();
        expect(report.issues).toEqual([
            { kind: 'OrderViolation', plugin: 'with_dob', dependency: 'with_users' },
        ]);
    });

    it('reports a dependency cycle', () => {
        const resolver = resolverOf(
            { name: 'A', dependencies: ['B'] },
            { name: 'B', dependencies: ['A'] },
        );
        const report = resolver.resolve(createApplication({ name: 'loop', plugins: ['A', 'B'] }));
        expect(report.issues).toEqual([{ kind: 'CyclicDependency', cycle: ['A', 'B', 'A'] }]);
    });

    it('reports two base providers of one class', () => {
        const resolver = resolverOf(users, { name: 'with_accounts', provides: ['User'] });
        const report = resolver.resolve(createApplication({ name: 'shop', plugins: ['with_users', 'with_accounts'] }));
        expect(report.issues).toEqual([
            { kind: 'DuplicateBaseProvider', className: 'User', first: 'with_users', second: 'with_accounts' },
        ]);
    });

    it('reports a mixin that does not depend on its base provider', () => {
        const resolver = resolverOf(users, { name: 'with_age', extends: ['User'] });
        const report = resolver.resolve(createApplication({ name: 'shop', plugins: ['with_users', 'with_age'] }));
        expect(report.issues).toEqual([
            { kind: 'UnresolvedBaseReference', plugin: 'with_age', className: 'User' },
        ]);
    });

    it('reports order and conflict issues together', () => {
        const resolver = resolverOf(
            users,
            dob,
            { name: 'with_accounts', provides: ['User'] },
        );
        const app = createApplication({ name: 'shop', plugins: ['with_dob', 'with_users', 'with_accounts'] });
        expect(resolver.resolve(app).issues).toEqual([
            { kind: 'OrderViolation', plugin: 'with_dob', dependency: 'with_users' },
            { kind: 'DuplicateBaseProvider', className: 'User', first: 'with_users', second: 'with_accounts' },
        ]);
    });

    it('stops at the first structural issue', () => {
        const resolver = resolverOf(users, { name: 'with_tags', dependencies: ['with_posts'], extends: ['Post'] });
        const report = resolver.resolve(createApplication({ name: 'blog', plugins: ['with_users', 'with_tags'] }));
        expect(report.issues).toEqual([
            { kind: 'UnknownDependency', plugin: 'with_tags', dependency: 'with_posts' },
        ]);
    });

    it('derives an order when asked', () => {
        const resolver = resolverOf(users, dob, age);
        const app = createApplication({ name: 'shop', plugins: ['with_age', 'with_dob', 'with_users'] });

        const report = resolver.resolve(app, { order: 'derived' });
        expect(report.chain?.names).toEqual(['with_users', 'with_dob', 'with_age']);
    });

    it('ignores inactive dependencies under the exclude policy', () => {
        const resolver = resolverOf(users, dob, { name: 'with_age', dependencies: ['with_users', 'with_dob'] });
        const app = createApplication({ name: 'shop', plugins: ['with_users', 'with_age'] });

        expect(resolver.resolve(app).issues).toEqual([
            { kind: 'InactiveDependency', plugin: 'with_age', dependency: 'with_dob' },
        ]);

        const report = resolver.resolve(app, { partialActivation: 'exclude' });
        expect(report.success).toBe(true);
        expect(report.chain?.names).toEqual(['with_users', 'with_age']);
        expect(report.excludedEdges).toEqual([{ plugin: 'with_age', dependency: 'with_dob' }]);
    });

    it('throws a ResolutionError listing the issues', () => {
        const resolver = resolverOf(users, dob);
        const app = createApplication({ name: 'shop', plugins: ['with_dob', 'with_users'] });

        expect(() => resolver.resolveOrThrow(app)).toThrow(ResolutionError);
        expect(() => resolver.resolveOrThrow(app)).toThrow(
            'Failed to resolve application "shop":\n  - Plugin "with_dob" is listed before its dependency "with_users"'
        );
    });

    it('plans every touched class when no class is named', () => {
        const resolver = resolverOf(users, dob, { name: 'with_roles', dependencies: ['with_users'], provides: ['Role'] });
        const chain = resolver.resolveOrThrow(createApplication({
            name: 'shop',
            plugins: ['with_users', 'with_dob', 'with_roles'],
        }));
        expect(resolver.plan(chain).map(plan => [plan.className, plan.contributors])).toEqual([
            ['User', ['with_dob', 'with_users']],
            ['Role', ['with_roles']],
        ]);
    });

    it('logs stage progress at debug level', () => {
        const lines: string[] = [];
        const registry = new PluginRegistry([createPlugin(users)]);
        const resolver = new Resolver(registry, new Logger('debug', line => lines.push(line)));

        resolver.resolve(createApplication({ name: 'shop', plugins: ['with_users'] }));
        expect(lines).toHaveLength(3);
        expect(lines[0]).toContain('[resolver]');
        expect(lines[0]).toContain('Resolving "shop" (1 plugins, authored order)');
    });
});

describe('Resolver properties', () => {
    // Small deterministic generator so failures reproduce.
    function lcg(seed: number): () => number {
        let state = seed;
        return () => {
            state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
            return state / 4294967296;
        };
    }

    function randomDag(seed: number, size: number): PluginInit[] {
        const next = lcg(seed);
        const plugins: PluginInit[] = [];
        for (let i = 0; i < size; i++) {
            const dependencies: string[] = [];
            for (let j = 0; j < i; j++) {
                if (next() < 0.3) dependencies.push(`p${j}`);
            }
            plugins.push({ name: `p${i}`, dependencies });
        }
        // Declare in a shuffled order so derivation cannot lean on it.
        return plugins
            .map(plugin => ({ plugin, key: next() }))
            .sort((a, b) => a.key - b.key)
            .map(entry => entry.plugin);
    }

    it('places every transitive dependency before its dependent', () => {
        for (let seed = 1; seed <= 20; seed++) {
            const inits = randomDag(seed, 12);
            const registry = new PluginRegistry(inits.map(createPlugin));
            const resolver = new Resolver(registry);
            const app = createApplication({ name: `dag-${seed}`, plugins: inits.map(p => p.name) });

            const chain = resolver.resolveOrThrow(app, { order: 'derived' });
            const built = registry.list();
            expect(chain.size).toBe(built.length);

            const graph = {
                nodes: chain.names,
                edges: new Map(built.map((p): [string, readonly string[]] => [p.name, p.dependencies])),
            };
            for (const name of chain.names) {
                for (const dependency of transitiveDependencies(graph, name)) {
                    expect(chain.indexOf(dependency)).toBeLessThan(chain.indexOf(name));
                }
            }
        }
    });

    it('produces identical reports for identical input', () => {
        const inits = randomDag(7, 10);
        const app = createApplication({ name: 'again', plugins: inits.map(p => p.name) });
        const first = new Resolver(new PluginRegistry(inits.map(createPlugin))).resolve(app);
        const second = new Resolver(new PluginRegistry(inits.map(createPlugin))).resolve(app);
        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });
});
