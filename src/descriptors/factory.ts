import type { ApplicationDescriptor, ApplicationInit, PluginDescriptor, PluginInit } from './types.js';
import { DescriptorError } from './types.js';

/**
 * Build an immutable plugin descriptor.
 *
 * Throws a DescriptorError when the plugin both provides and extends the
 * same class, lists a name twice, or depends on itself.
 */
export function createPlugin(init: PluginInit): PluginDescriptor {
    const name = requireName(init.name, 'Plugin');
    const dependencies = uniqueList(name, 'dependencies', init.dependencies ?? []);
    const provides = uniqueList(name, 'provides', init.provides ?? []);
    const extendsList = uniqueList(name, 'extends', init.extends ?? []);

    if (dependencies.includes(name)) {
        throw new DescriptorError('SelfDependency', name, `Plugin "${name}" cannot depend on itself`);
    }

    assertExclusive({ name, provides, extends: extendsList });

    const descriptor: PluginDescriptor = {
        name,
        dependencies: Object.freeze(dependencies),
        provides: Object.freeze(provides),
        extends: Object.freeze(extendsList),
        ...(init.description !== undefined ? { description: init.description } : {}),
        ...(init.path !== undefined ? { path: init.path } : {}),
    };
    return Object.freeze(descriptor);
}

/**
 * Throws when a plugin both provides and extends the same class
 */
export function assertExclusive(plugin: Pick<PluginDescriptor, 'name' | 'provides' | 'extends'>): void {
    const provided = new Set(plugin.provides);
    const overlap = plugin.extends.find(className => provided.has(className));
    if (overlap !== undefined) {
        throw new DescriptorError(
            'MutualExclusivityViolation',
            plugin.name,
            `Plugin "${plugin.name}" cannot both provide and extend class "${overlap}"`
        );
    }
}

/**
 * Build an immutable application descriptor.
 *
 * Membership of the plugin list is checked by the graph builder, which
 * reports unknown or repeated names as resolution issues.
 */
export function createApplication(init: ApplicationInit): ApplicationDescriptor {
    const name = requireName(init.name, 'Application');
    return Object.freeze({
        name,
        plugins: Object.freeze([...init.plugins]),
    });
}

function requireName(value: string, label: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        throw new DescriptorError('InvalidName', value, `${label} name must not be empty`);
    }
    return trimmed;
}

function uniqueList(plugin: string, field: string, values: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const value of values) {
        if (seen.has(value)) {
            throw new DescriptorError(
                'DuplicateEntry',
                plugin,
                `Plugin "${plugin}" lists "${value}" more than once in ${field}`
            );
        }
        seen.add(value);
    }
    return [...values];
}
