// Static Plugin Composer — Public API Surface
export { createCLI } from './cli/index.js';
export { createPlugin, createApplication } from './descriptors/factory.js';
export { PluginRegistry } from './descriptors/registry.js';
export { DescriptorError } from './descriptors/types.js';
export { buildDependencyGraph, dependenciesOf, transitiveDependencies } from './resolution/graph.js';
export { detectCycle } from './resolution/cycles.js';
export { checkOrder, deriveOrder } from './resolution/order.js';
export { validateConflicts } from './resolution/conflicts.js';
export { planComposition, composeAll } from './resolution/composition.js';
export { PrecedenceChain } from './resolution/chain.js';
export { Resolver } from './resolution/resolver.js';
export { ResolutionError, describeIssue, isFatal } from './resolution/issues.js';
export { ManifestLoader, ManifestError } from './manifests/loader.js';
export { ConfigLoader, ConfigError } from './config/loader.js';
export { Logger } from './logging/logger.js';

// Types
export type { PluginDescriptor, ApplicationDescriptor, PluginInit, ApplicationInit, DescriptorErrorKind } from './descriptors/types.js';
export type { DependencyGraph, ExcludedEdge, PartialActivationPolicy } from './resolution/graph.js';
export type { OrderMode } from './resolution/order.js';
export type { CompositionPlan } from './resolution/composition.js';
export type { ResolveOptions, ResolutionReport } from './resolution/resolver.js';
export type { ResolutionIssue, ResolutionIssueKind, StageResult } from './resolution/issues.js';
export type { ComposerConfig } from './config/schema.js';
export type { LogLevel } from './logging/logger.js';
