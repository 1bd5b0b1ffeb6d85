import { z } from 'zod';

/**
 * Composer configuration (composer.yaml)
 */
export const ComposerConfigSchema = z.object({
    /** Directories holding plugin folders, relative to the project root */
    pluginPaths: z.array(z.string().min(1)).min(1).default(['plugins']),
    /** Application manifest, relative to the project root */
    application: z.string().min(1).default('application.yaml'),
    /** Check the application's order, or derive one */
    order: z.enum(['authored', 'derived']).default('authored'),
    /** What to do with dependencies the application leaves out */
    partialActivation: z.enum(['error', 'exclude']).default('error'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
}).strict();

export type ComposerConfig = z.infer<typeof ComposerConfigSchema>;

export const CONFIG_FILE_NAME = 'composer.yaml';
