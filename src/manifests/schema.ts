import { z } from 'zod';

const identifier = z.string().trim().min(1);

/**
 * plugin.yaml
 *
 * `provides` and `extends` may be left out, in which case the loader
 * infers them from the plugin's base/ and mixins/ folders.
 */
export const PluginManifestSchema = z.object({
    name: identifier,
    description: z.string().optional(),
    dependencies: z.array(identifier).default([]),
    provides: z.array(identifier).optional(),
    extends: z.array(identifier).optional(),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

/**
 * application.yaml
 */
export const ApplicationManifestSchema = z.object({
    name: identifier,
    plugins: z.array(identifier),
});

export type ApplicationManifest = z.infer<typeof ApplicationManifestSchema>;

export const PLUGIN_MANIFEST_FILE = 'plugin.yaml';
export const BASE_FOLDER = 'base';
export const MIXINS_FOLDER = 'mixins';
export const MIXIN_SUFFIX = 'Mixin';
export const INTERFACE_SUFFIX = 'Interface';
