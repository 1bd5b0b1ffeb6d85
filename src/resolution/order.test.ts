import { describe, it, expect } from 'vitest';
import { createPlugin } from '../descriptors/factory.js';
import { PluginRegistry } from '../descriptors/registry.js';
import type { DependencyGraph } from './graph.js';
import { checkOrder, deriveOrder } from './order.js';

const graph: DependencyGraph = {
    nodes: ['with_users', 'with_dob', 'with_age'],
    edges: new Map([
        ['with_users', []],
        ['with_dob', ['with_users']],
        ['with_age', ['with_users', 'with_dob']],
    ]),
};

describe('checkOrder', () => {
    it('accepts an order where dependencies come first', () => {
        expect(checkOrder(graph, ['with_users', 'with_dob', 'with_age'])).toEqual([]);
    });

    it('cites the exact offending pair', () => {
        expect(checkOrder(graph, ['with_dob', 'with_users', 'with_age'])).toEqual([
            { kind: 'OrderViolation', plugin: 'with_dob', dependency: 'with_users' },
        ]);
    });

    it('collects every violation, left to right', () => {
        expect(checkOrder(graph, ['with_age', 'with_dob', 'with_users'])).toEqual([
            { kind: 'OrderViolation', plugin: 'with_age', dependency: 'with_users' },
            { kind: 'OrderViolation', plugin: 'with_age', dependency: 'with_dob' },
            { kind: 'OrderViolation', plugin: 'with_dob', dependency: 'with_users' },
        ]);
    });
});

describe('deriveOrder', () => {
    it('places dependencies before dependents', () => {
        const registry = new PluginRegistry([
            createPlugin({ name: 'with_age', dependencies: ['with_users', 'with_dob'] }),
            createPlugin({ name: 'with_dob', dependencies: ['with_users'] }),
            createPlugin({ name: 'with_users' }),
        ]);
        expect(deriveOrder(graph, registry)).toEqual(['with_users', 'with_dob', 'with_age']);
    });

    it('breaks ties by declaration order', () => {
        const registry = new PluginRegistry([
            createPlugin({ name: 'c' }),
            createPlugin({ name: 'a' }),
            createPlugin({ name: 'b', dependencies: ['c'] }),
        ]);
        const flat: DependencyGraph = {
            nodes: ['a', 'b', 'c'],
            edges: new Map([['a', []], ['b', ['c']], ['c', []]]),
        };
        expect(deriveOrder(flat, registry)).toEqual(['c', 'a', 'b']);
    });

    it('produces an order that passes its own check', () => {
        const registry = new PluginRegistry([
            createPlugin({ name: 'with_users' }),
            createPlugin({ name: 'with_dob', dependencies: ['with_users'] }),
            createPlugin({ name: 'with_age', dependencies: ['with_users', 'with_dob'] }),
        ]);
        expect(checkOrder(graph, deriveOrder(graph, registry))).toEqual([]);
    });

    it('throws on a cyclic graph', () => {
        const registry = new PluginRegistry([
            createPlugin({ name: 'A', dependencies: ['B'] }),
            createPlugin({ name: 'B', dependencies: ['A'] }),
        ]);
        const cyclic: DependencyGraph = {
            nodes: ['A', 'B'],
            edges: new Map([['A', ['B']], ['B', ['A']]]),
        };
        expect(() => deriveOrder(cyclic, registry)).toThrow('Cannot derive an order');
    });
});
