import { assertExclusive } from './factory.js';
import type { PluginDescriptor } from './types.js';
import { DescriptorError } from './types.js';

/**
 * Plugin Registry — the closed set of loaded plugin descriptors
 *
 * Remembers the order plugins were registered in; that declaration order
 * breaks ties whenever the resolver derives an order on its own.
 */
export class PluginRegistry {
    private plugins: Map<string, PluginDescriptor> = new Map();

    constructor(plugins: Iterable<PluginDescriptor> = []) {
        for (const plugin of plugins) {
            this.register(plugin);
        }
    }

    /**
     * Register a plugin; names must be unique and no class may be both
     * provided and extended by it
     */
    register(plugin: PluginDescriptor): void {
        assertExclusive(plugin);
        if (this.plugins.has(plugin.name)) {
            throw new DescriptorError(
                'DuplicatePlugin',
                plugin.name,
                `Plugin "${plugin.name}" is already registered`
            );
        }
        this.plugins.set(plugin.name, plugin);
    }

    get(name: string): PluginDescriptor | undefined {
        return this.plugins.get(name);
    }

    has(name: string): boolean {
        return this.plugins.has(name);
    }

    /**
     * Position of a plugin in declaration order (-1 when unknown)
     */
    declarationIndex(name: string): number {
        let index = 0;
        for (const key of this.plugins.keys()) {
            if (key === name) return index;
            index++;
        }
        return -1;
    }

    /**
     * List all plugins in declaration order
     */
    list(): PluginDescriptor[] {
        return Array.from(this.plugins.values());
    }

    get size(): number {
        return this.plugins.size;
    }
}
