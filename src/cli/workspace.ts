import path from 'node:path';
import { ConfigLoader } from '../config/loader.js';
import type { ComposerConfig } from '../config/schema.js';
import type { PluginRegistry } from '../descriptors/registry.js';
import type { ApplicationDescriptor } from '../descriptors/types.js';
import { Logger } from '../logging/logger.js';
import { ManifestLoader } from '../manifests/loader.js';
import { Resolver } from '../resolution/resolver.js';
import type { ResolveOptions } from '../resolution/resolver.js';
import { renderError } from './ui/render.js';
import { Spinner } from './ui/spinner.js';

/**
 * Options shared by every command
 */
export type GlobalOptions = {
    cwd?: string;
    config?: string;
    verbose?: boolean;
    derive?: boolean;
    json?: boolean;
};

export interface Workspace {
    config: ComposerConfig;
    registry: PluginRegistry;
    application: ApplicationDescriptor;
    resolver: Resolver;
    resolveOptions: ResolveOptions;
    logger: Logger;
}

/**
 * Load config, plugins and the application manifest for a CLI run
 */
export async function loadWorkspace(options: GlobalOptions): Promise<Workspace> {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    const configLoader = new ConfigLoader(projectRoot);
    const config = await configLoader.load(options.config);

    const logger = new Logger(options.verbose ? 'debug' : config.logLevel);
    const spinner = new Spinner(!options.json && logger.isEnabled('info'));
    const loader = new ManifestLoader(logger);

    spinner.start('Loading plugin manifests...');
    try {
        const registry = await loader.loadPlugins(configLoader.pluginRoots(config));
        const application = await loader.loadApplication(configLoader.applicationPath(config));
        spinner.success(`Loaded ${registry.size} plugins for "${application.name}"`);

        return {
            config,
            registry,
            application,
            resolver: new Resolver(registry, logger),
            resolveOptions: {
                order: options.derive ? 'derived' : config.order,
                partialActivation: config.partialActivation,
            },
            logger,
        };
    } catch (err) {
        spinner.fail('Failed to load manifests');
        throw err;
    }
}

/**
 * Run a command body; a failed check or a thrown error sets exit code 1.
 * Under --json a thrown error is printed as a JSON object so stdout stays
 * machine-readable.
 */
export async function runAction(options: GlobalOptions, body: () => Promise<boolean>): Promise<void> {
    try {
        const ok = await body();
        if (!ok) process.exitCode = 1;
    } catch (err) {
        const message = (err as Error).message;
        if (options.json) {
            console.log(JSON.stringify({ success: false, error: message }, null, 2));
        } else {
            renderError(message);
        }
        process.exitCode = 1;
    }
}
