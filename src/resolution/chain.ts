import type { PluginDescriptor } from '../descriptors/types.js';

/**
 * Precedence Chain — plugins ordered lowest to highest precedence
 *
 * Every dependency of a plugin sits at a lower index than the plugin
 * itself. Instances are immutable once built.
 */
export class PrecedenceChain {
    private readonly entries: readonly PluginDescriptor[];
    private readonly positions: ReadonlyMap<string, number>;

    constructor(plugins: readonly PluginDescriptor[]) {
        this.entries = Object.freeze([...plugins]);
        this.positions = new Map(plugins.map((plugin, index): [string, number] => [plugin.name, index]));
    }

    /**
     * Plugin names, lowest precedence first
     */
    get names(): string[] {
        return this.entries.map(plugin => plugin.name);
    }

    get plugins(): readonly PluginDescriptor[] {
        return this.entries;
    }

    get size(): number {
        return this.entries.length;
    }

    has(name: string): boolean {
        return this.positions.has(name);
    }

    get(name: string): PluginDescriptor | undefined {
        const index = this.positions.get(name);
        return index === undefined ? undefined : this.entries[index];
    }

    /**
     * Index of a plugin in the chain, or -1
     */
    indexOf(name: string): number {
        return this.positions.get(name) ?? -1;
    }

    /**
     * True when `lower` is overridden by `higher`
     */
    precedes(lower: string, higher: string): boolean {
        const a = this.indexOf(lower);
        const b = this.indexOf(higher);
        return a !== -1 && b !== -1 && a < b;
    }

    toJSON(): string[] {
        return this.names;
    }
}
