/**
 * Main entry point - exports all public APIs
 */

export { runBuild, BUDGET_EXCEEDED_MESSAGE } from './build_scheduler';
export type { BuildOptions, BuildReport } from './build_scheduler';
export { buildProject, prepareProject, projectStatus } from './project';
export type { BuildProjectOptions, PreparedProject, ProjectStatus } from './project';
export {
    TOOL_NAME,
    TOOL_VERSION,
    loadProjectConfig,
    findProjectRoot,
    defaultProjectConfig,
    estimateModelCost,
} from './config';
export type { ProjectConfig } from './config';
export { CostTracker } from './cost_tracker';
export type { TokenUsage, CostSummary } from './cost_tracker';
export {
    ForgeError,
    ConfigError,
    DiscoveryError,
    DependencyCycleError,
    GenerationError,
    BudgetExceededError,
    BuildLockedError,
    toStructuredError,
} from './errors';
export {
    topologicalOrder,
    findCycles,
    findFirstCycle,
    induceSubgraph,
    invertGraph,
    expandStaleModules,
    criticalPathLengths,
    dependencyClosure,
} from './graph';
export type { Graph } from './graph';
export { detectStale, detectStaleModules } from './staleness';
export { discoverSpecs } from './spec_registry';
export type { SpecEntry } from './spec_registry';
export { normalizeSpecRef, parseSpecRef } from './spec_ref';
export type { SpecRef } from './spec_ref';
export { buildSpecGraph, collapseToModuleDag } from './deps';
export { localDigest, graphDigest, moduleDigest } from './digest';
export { GeneratorBackend } from './generate/backend';
export type { GenerationResult, GeneratedModule, GenerateOptions } from './generate/backend';
export { createModuleContext } from './generate/context';
export type { ModuleSpecContext } from './generate/context';
export { OpenRouterBackend } from './generate/openrouter_backend';
export { ModelRouter } from './model_router';
export type { ModelRouterConfig, ModelRequest, ModelResponse, ModelRouterError } from './model_router';
export { ResponseCache, FileCacheStore, SqliteCacheStore, cacheKeyFromContext } from './response_cache';
export type { CacheEntry, CacheInfo } from './response_cache';
export { TypeCheckValidator } from './type_check';
export { validateGeneratedSource } from './validation';
export { ProgressBar } from './progress';
export type { ProgressReporter } from './progress';
export { SchemaValidator } from './schema_validator';
export type { JsonSchema, ValidationResult } from './schema_validator';
