import type { PrecedenceChain } from './chain.js';

/**
 * Contributors to one composed class.
 *
 * `contributors` runs from the most specific override to the base, the
 * order a generated `extends` clause lists them in.
 */
export interface CompositionPlan {
    className: string;
    /** Plugin providing the base class, if any */
    base: string | null;
    /** Plugins extending the class, highest precedence first */
    mixins: string[];
    /** Mixins followed by the base provider */
    contributors: string[];
}

/**
 * Build the composition plan for a class name.
 *
 * A class no plugin touches yields a plan with no contributors.
 */
export function planComposition(chain: PrecedenceChain, className: string): CompositionPlan {
    let base: string | null = null;
    const mixins: string[] = [];

    for (const plugin of chain.plugins) {
        if (plugin.provides.includes(className)) {
            base ??= plugin.name;
        } else if (plugin.extends.includes(className)) {
            mixins.push(plugin.name);
        }
    }

    mixins.reverse();
    return {
        className,
        base,
        mixins,
        contributors: base === null ? [...mixins] : [...mixins, base],
    };
}

/**
 * Plans for every class the chain touches: provided classes in provider
 * order first, then classes that are only extended.
 */
export function composeAll(chain: PrecedenceChain): CompositionPlan[] {
    const provided: string[] = [];
    const extended: string[] = [];

    for (const plugin of chain.plugins) {
        for (const className of plugin.provides) {
            if (!provided.includes(className)) provided.push(className);
        }
    }
    for (const plugin of chain.plugins) {
        for (const className of plugin.extends) {
            if (!provided.includes(className) && !extended.includes(className)) extended.push(className);
        }
    }

    return [...provided, ...extended].map(className => planComposition(chain, className));
}
