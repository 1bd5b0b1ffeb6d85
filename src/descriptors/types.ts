/**
 * Descriptor Model — Types
 *
 * A static plugin contributes base classes and mixins to an application
 * at source level. Descriptors are the already-parsed form of plugin and
 * application manifests; they carry no behaviour.
 */

/**
 * Plugin descriptor (plugin.yaml)
 */
export interface PluginDescriptor {
    /** Unique plugin name */
    readonly name: string;
    /** Dependency names, lowest to highest precedence as declared */
    readonly dependencies: readonly string[];
    /** Class names this plugin provides as a base */
    readonly provides: readonly string[];
    /** Class names this plugin extends as a mixin */
    readonly extends: readonly string[];
    /** Human-readable description */
    readonly description?: string;
    /** Absolute path to the plugin directory, when loaded from disk */
    readonly path?: string;
}

/**
 * Application descriptor (application.yaml)
 */
export interface ApplicationDescriptor {
    /** Unique application name */
    readonly name: string;
    /** Plugin names, lowest to highest intended precedence */
    readonly plugins: readonly string[];
}

/**
 * Raw fields accepted when constructing a plugin descriptor
 */
export interface PluginInit {
    name: string;
    dependencies?: readonly string[];
    provides?: readonly string[];
    extends?: readonly string[];
    description?: string;
    path?: string;
}

export interface ApplicationInit {
    name: string;
    plugins: readonly string[];
}

// ─── Descriptor Errors ───

export type DescriptorErrorKind =
    | 'MutualExclusivityViolation'
    | 'DuplicateEntry'
    | 'SelfDependency'
    | 'DuplicatePlugin'
    | 'InvalidName';

export class DescriptorError extends Error {
    constructor(
        readonly kind: DescriptorErrorKind,
        readonly subject: string,
        message: string
    ) {
        super(message);
        this.name = 'DescriptorError';
    }
}
