/**
 * Project pipeline: discovery -> graphs -> staleness -> scheduled build.
 *
 * Generated modules live under `<root>/<generatedDir>/`, one file per spec
 * module, whichever source root the module came from.
 */

import { randomUUID } from 'crypto';
import * as path from 'path';

import { BuildReport, runBuild } from './build_scheduler';
import { ProjectConfig, TIMEOUTS } from './config';
import { CostTracker } from './cost_tracker';
import { buildSpecGraph, collapseToModuleDag, ModuleDag, SpecGraph } from './deps';
import { DiscoveryError } from './errors';
import { GeneratorBackend } from './generate/backend';
import { OpenRouterBackend } from './generate/openrouter_backend';
import { dependencyClosure, expandStaleModules, topologicalOrder } from './graph';
import { createLogger } from './logger';
import { ModelRouter } from './model_router';
import { acquireBuildLock, releaseBuildLock } from './output_writer';
import { ProgressBar, ProgressReporter } from './progress';
import { loadPromptOverride } from './prompts';
import { openCacheStore, ResponseCache } from './response_cache';
import { normalizeModuleName, normalizeSpecRef, parseSpecRef, SpecRef } from './spec_ref';
import { discoverSpecs, groupByModule, indexSpecs, SpecEntry } from './spec_registry';
import { detectStaleModules } from './staleness';
import { resolveTypeCheckCommand, TypeCheckValidator } from './type_check';

const log = createLogger('project');

export const STATE_DIR = '.specforge';
export const LOCK_FILE = 'build.lock';

export interface PreparedProject {
    specs: Map<SpecRef, SpecEntry>;
    /** Restricted to the requested targets and their dependencies. */
    moduleSpecs: Map<string, SpecEntry[]>;
    specGraph: SpecGraph;
    moduleDag: ModuleDag;
}

export interface PrepareOptions {
    root: string;
    config: ProjectConfig;
    /** `module` or `module:Name`; empty means everything. */
    targets?: readonly string[];
    /** Overrides `build.inferDeps`. */
    inferDeps?: boolean;
}

function targetModules(targets: readonly string[], moduleSpecs: ReadonlyMap<string, unknown>, specs: ReadonlyMap<SpecRef, unknown>): Set<string> {
    const out = new Set<string>();
    for (const t of targets) {
        if (t.includes(':')) {
            const ref = normalizeSpecRef(t);
            if (!specs.has(ref)) throw new DiscoveryError(`Unknown target ${t}: no such spec.`);
            out.add(parseSpecRef(ref).module);
        } else {
            const m = normalizeModuleName(t);
            if (!moduleSpecs.has(m)) throw new DiscoveryError(`Unknown target ${t}: no specs in that module.`);
            out.add(m);
        }
    }
    return out;
}

export function prepareProject(opts: PrepareOptions): PreparedProject {
    const { root, config } = opts;
    const entries = discoverSpecs({ root, sourceRoots: config.paths.sourceRoots, generatedDir: config.paths.generatedDir });
    const specs = indexSpecs(entries);
    const specGraph = buildSpecGraph(specs, { inferDefault: opts.inferDeps ?? config.build.inferDeps });
    const moduleDag = collapseToModuleDag(specGraph, specs);
    let moduleSpecs = groupByModule(entries);

    // fail on cycles before anything is written
    topologicalOrder(moduleDag);

    const targets = opts.targets ?? [];
    if (targets.length > 0) {
        const keep = dependencyClosure(targetModules(targets, moduleSpecs, specs), moduleDag);
        moduleSpecs = new Map([...moduleSpecs].filter(([m]) => keep.has(m)));
    }

    log.debug('Project prepared', { specs: specs.size, modules: moduleSpecs.size });
    return { specs, moduleSpecs, specGraph, moduleDag };
}

/* -------------------------------------------------------------------------- */
/* Status                                                                     */
/* -------------------------------------------------------------------------- */

export interface ProjectStatus {
    stale: string[];
    fresh: string[];
}

export function projectStatus(opts: PrepareOptions & { force?: boolean }): ProjectStatus {
    const p = prepareProject(opts);
    const direct = detectStaleModules({
        packageDir: opts.root,
        generatedDir: opts.config.paths.generatedDir,
        moduleSpecs: p.moduleSpecs,
        specs: p.specs,
        specGraph: p.specGraph,
        force: opts.force ?? false,
    });
    const stale = expandStaleModules(p.moduleDag, direct);
    const modules = [...p.moduleSpecs.keys()].sort();
    return { stale: modules.filter((m) => stale.has(m)), fresh: modules.filter((m) => !stale.has(m)) };
}

/* -------------------------------------------------------------------------- */
/* Build                                                                      */
/* -------------------------------------------------------------------------- */

export interface BuildProjectOptions extends PrepareOptions {
    force?: boolean;
    /** Overrides `build.jobs`. */
    jobs?: number;
    /** Overrides `build.maxCostUsd`. */
    maxCostUsd?: number;
    noCache?: boolean;
    /** false disables progress; a reporter replaces the default bar. */
    progress?: boolean | ProgressReporter;
    /** Replaces the configured OpenRouter backend. */
    backend?: GeneratorBackend;
    env?: NodeJS.ProcessEnv;
}

export interface BuildProjectResult {
    report: BuildReport;
    cost: CostTracker;
    buildId: string;
}

function createBackend(root: string, config: ProjectConfig, env: NodeJS.ProcessEnv): GeneratorBackend {
    const apiKey = env[config.llm.apiKeyEnv] ?? '';
    if (!apiKey) log.warn('API key variable is not set', { variable: config.llm.apiKeyEnv });
    const router = new ModelRouter({ apiKey, baseUrl: config.llm.baseUrl, maxConcurrent: config.build.jobs });
    return new OpenRouterBackend({
        router,
        model: config.llm.model,
        maxOutputTokens: config.llm.maxOutputTokens,
        temperature: config.llm.temperature,
        systemInstruction: loadPromptOverride(root, config.prompts.buildSystem) ?? undefined,
        moduleTemplate: loadPromptOverride(root, config.prompts.buildModule) ?? undefined,
    });
}

export async function buildProject(opts: BuildProjectOptions): Promise<BuildProjectResult> {
    const { root, config } = opts;
    const env = opts.env ?? process.env;
    const buildId = randomUUID();

    const warnings: string[] = [];
    const lock = await acquireBuildLock({
        lockPath: path.join(root, STATE_DIR, LOCK_FILE),
        timeoutMs: TIMEOUTS.BUILD_LOCK_MS,
        warnings,
        identity: { build_id: buildId },
    });
    for (const w of warnings) log.debug('Build lock', { detail: w });

    let cache: ResponseCache | undefined;
    try {
        const p = prepareProject(opts);
        const generatedDir = config.paths.generatedDir;
        const stale = detectStaleModules({
            packageDir: root,
            generatedDir,
            moduleSpecs: p.moduleSpecs,
            specs: p.specs,
            specGraph: p.specGraph,
            force: opts.force ?? false,
        });

        const cost = new CostTracker(opts.maxCostUsd ?? config.build.maxCostUsd);
        const cacheOn = config.cache.enabled && !opts.noCache;
        if (cacheOn) {
            cache = new ResponseCache(openCacheStore(config.cache.backend, path.resolve(root, config.cache.dir)));
        }

        let typeCheckValidator: TypeCheckValidator | undefined;
        if (config.build.typeCheck) {
            const command = resolveTypeCheckCommand(root);
            if (command) {
                typeCheckValidator = new TypeCheckValidator({ command, generatedDir });
            } else {
                log.warn('Type checking requested but no TypeScript compiler was found; skipping');
            }
        }

        const total = [...expandStaleModules(p.moduleDag, stale)].filter((m) => p.moduleSpecs.has(m)).length;
        let progress: ProgressReporter | undefined;
        if (typeof opts.progress === 'object') progress = opts.progress;
        else if (opts.progress !== false && total > 0) progress = new ProgressBar(total);

        const report = await runBuild({
            packageDir: root,
            generatedDir,
            moduleSpecs: p.moduleSpecs,
            specs: p.specs,
            specGraph: p.specGraph,
            moduleDag: p.moduleDag,
            staleModules: stale,
            backend: opts.backend ?? createBackend(root, config, env),
            jobs: opts.jobs ?? config.build.jobs,
            progress,
            responseCache: cache,
            costTracker: cost,
            typeCheckValidator,
            typeCheckRetryAttempts: config.build.typeCheckRetryAttempts,
            buildId,
        });
        return { report, cost, buildId };
    } finally {
        cache?.close();
        releaseBuildLock(lock);
    }
}
