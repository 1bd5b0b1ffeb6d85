import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ComposerConfigSchema, CONFIG_FILE_NAME } from './schema.js';
import type { ComposerConfig } from './schema.js';

export class ConfigError extends Error {
    constructor(readonly file: string, message: string) {
        super(`Invalid configuration in ${file}: ${message}`);
        this.name = 'ConfigError';
    }
}

/**
 * Config Loader — reads composer.yaml and applies environment overrides
 *
 * A missing file is not an error; every field has a default.
 * Environment: COMPOSER_ORDER, COMPOSER_LOG_LEVEL.
 */
export class ConfigLoader {
    constructor(
        private projectRoot: string = process.cwd(),
        private env: NodeJS.ProcessEnv = process.env
    ) {}

    async load(configPath?: string): Promise<ComposerConfig> {
        const file = path.resolve(this.projectRoot, configPath ?? CONFIG_FILE_NAME);
        const raw = await this.readRaw(file, configPath !== undefined);

        const overrides: Record<string, unknown> = {};
        const order = readEnv(this.env, 'COMPOSER_ORDER');
        if (order) overrides.order = order;
        const logLevel = readEnv(this.env, 'COMPOSER_LOG_LEVEL');
        if (logLevel) overrides.logLevel = logLevel;

        const parsed = ComposerConfigSchema.safeParse({ ...raw, ...overrides });
        if (!parsed.success) {
            throw new ConfigError(file, formatZodError(parsed.error));
        }
        return parsed.data;
    }

    /**
     * Absolute paths of the configured plugin roots
     */
    pluginRoots(config: ComposerConfig): string[] {
        return config.pluginPaths.map(p => path.resolve(this.projectRoot, p));
    }

    applicationPath(config: ComposerConfig): string {
        return path.resolve(this.projectRoot, config.application);
    }

    private async readRaw(file: string, required: boolean): Promise<Record<string, unknown>> {
        let content: string;
        try {
            content = await readFile(file, 'utf-8');
        } catch (err) {
            if (!required && isNotFound(err)) return {};
            throw new ConfigError(file, (err as Error).message);
        }

        let parsed: unknown;
        try {
            parsed = parseYaml(content);
        } catch (err) {
            throw new ConfigError(file, (err as Error).message);
        }

        if (parsed === null || parsed === undefined) return {};
        if (typeof parsed !== 'object' || Array.isArray(parsed)) {
            throw new ConfigError(file, 'expected a mapping at the top level');
        }
        return Object.fromEntries(Object.entries(parsed));
    }
}

export function formatZodError(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | null {
    const val = env[key];
    return val && val.trim() ? val.trim() : null;
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
