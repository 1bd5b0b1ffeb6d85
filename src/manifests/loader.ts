import { readFile, readdir, access } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { formatZodError } from '../config/loader.js';
import { createApplication, createPlugin } from '../descriptors/factory.js';
import { PluginRegistry } from '../descriptors/registry.js';
import type { ApplicationDescriptor, PluginDescriptor } from '../descriptors/types.js';
import { DescriptorError } from '../descriptors/types.js';
import { Logger } from '../logging/logger.js';
import {
    ApplicationManifestSchema,
    BASE_FOLDER,
    INTERFACE_SUFFIX,
    MIXINS_FOLDER,
    MIXIN_SUFFIX,
    PLUGIN_MANIFEST_FILE,
    PluginManifestSchema,
} from './schema.js';

export class ManifestError extends Error {
    constructor(readonly file: string, message: string) {
        super(`${file}: ${message}`);
        this.name = 'ManifestError';
    }
}

const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.mjs'];

/**
 * Manifest Loader — discovers plugin folders and reads manifests
 *
 * Each plugin is a directory holding a `plugin.yaml`:
 *
 * ```yaml
 * name: with_dob
 * dependencies: [with_users]
 * extends: [User]
 * ```
 *
 * Plugin folders are visited in name order, so numeric prefixes
 * (`010-users`, `020-dob`) fix the declaration order.
 */
export class ManifestLoader {
    private logger: Logger;

    constructor(logger: Logger = Logger.silent()) {
        this.logger = logger.child('manifests');
    }

    /**
     * Load every plugin below the given roots into a registry
     */
    async loadPlugins(roots: string[]): Promise<PluginRegistry> {
        const registry = new PluginRegistry();

        for (const root of roots) {
            try {
                await access(root);
            } catch {
                this.logger.warn(`Plugin path ${root} does not exist`);
                continue;
            }

            const entries = await readdir(root, { withFileTypes: true });
            const folders = entries
                .filter(entry => entry.isDirectory())
                .map(entry => entry.name)
                .sort(compareNames);

            for (const folder of folders) {
                const plugin = await this.loadPlugin(path.join(root, folder));
                if (!plugin) continue;
                registry.register(plugin);
                this.logger.debug(`Loaded plugin "${plugin.name}" from ${folder}`);
            }
        }

        return registry;
    }

    /**
     * Load a single plugin folder; null when it has no manifest
     */
    async loadPlugin(pluginDir: string): Promise<PluginDescriptor | null> {
        const manifestPath = path.join(pluginDir, PLUGIN_MANIFEST_FILE);
        try {
            await access(manifestPath);
        } catch {
            this.logger.debug(`Skipping ${pluginDir}: no ${PLUGIN_MANIFEST_FILE}`);
            return null;
        }

        const manifest = await readManifest(manifestPath, PluginManifestSchema);
        const provides = manifest.provides ?? await inferClassNames(path.join(pluginDir, BASE_FOLDER), '');
        const extendsList = manifest.extends ?? await inferClassNames(path.join(pluginDir, MIXINS_FOLDER), MIXIN_SUFFIX);

        try {
            return createPlugin({
                name: manifest.name,
                dependencies: manifest.dependencies,
                provides,
                extends: extendsList,
                description: manifest.description,
                path: pluginDir,
            });
        } catch (err) {
            if (err instanceof DescriptorError) {
                throw new ManifestError(manifestPath, err.message);
            }
            throw err;
        }
    }

    async loadApplication(file: string): Promise<ApplicationDescriptor> {
        const manifest = await readManifest(file, ApplicationManifestSchema);
        return createApplication(manifest);
    }
}

async function readManifest<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let content: string;
    try {
        content = await readFile(file, 'utf-8');
    } catch (err) {
        throw new ManifestError(file, (err as Error).message);
    }

    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (err) {
        throw new ManifestError(file, `invalid YAML: ${(err as Error).message}`);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ManifestError(file, formatZodError(parsed.error));
    }
    return parsed.data;
}

/**
 * Class names from the source files of a folder, with `suffix` stripped.
 * Interface files are not classes and are skipped.
 */
async function inferClassNames(dir: string, suffix: string): Promise<string[]> {
    let files: string[];
    try {
        files = await readdir(dir);
    } catch {
        return [];
    }

    const names: string[] = [];
    for (const file of files.sort(compareNames)) {
        const ext = path.extname(file);
        if (!SOURCE_EXTENSIONS.includes(ext) || file.endsWith(`.d${ext}`)) continue;

        let stem = path.basename(file, ext);
        if (stem.endsWith(INTERFACE_SUFFIX)) continue;
        if (suffix && stem.endsWith(suffix) && stem.length > suffix.length) {
            stem = stem.slice(0, -suffix.length);
        }
        if (!names.includes(stem)) names.push(stem);
    }
    return names;
}

function compareNames(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
