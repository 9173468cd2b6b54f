/**
 * Build Scheduler — incremental, dependency-ordered, bounded-parallel generation.
 *
 * One control loop owns all scheduling state (ready heap, completed set,
 * failed map, in-run source memo). Generation tasks run concurrently but
 * only report back through the loop's serial completion step.
 *
 * Per module: pending -> ready -> running -> succeeded | failed, or
 * pending -> failed when a dependency fails.
 */

import { randomUUID } from 'crypto';

import { TOOL_VERSION } from './config';
import type { CostTracker } from './cost_tracker';
import { moduleDigest } from './digest';
import { BudgetExceededError, DependencyCycleError, errorMessage } from './errors';
import type { GeneratorBackend } from './generate/backend';
import { createModuleContext } from './generate/context';
import {
    criticalPathLengths,
    expandStaleModules,
    findFirstCycle,
    Graph,
    induceSubgraph,
    invertGraph,
    topologicalOrder,
} from './graph';
import { clearCorrelation, createLogger, Logger, setCorrelation } from './logger';
import { readGeneratedModule, stripHeader, writeGeneratedModule } from './output_writer';
import type { ProgressReporter } from './progress';
import { cacheKeyFromContext, ResponseCache } from './response_cache';
import type { SpecRef } from './spec_ref';
import type { SpecEntry } from './spec_registry';
import type { TypeCheckValidator } from './type_check';
import { validateGeneratedSource } from './validation';

const log = createLogger('scheduler');

export const BUDGET_EXCEEDED_MESSAGE = 'Budget limit exceeded.';

export interface BuildReport {
    readonly generated: ReadonlySet<string>;
    readonly skipped: ReadonlySet<string>;
    readonly failed: ReadonlyMap<string, readonly string[]>;
}

export interface BuildOptions {
    packageDir: string;
    generatedDir: string;
    moduleSpecs: ReadonlyMap<string, readonly SpecEntry[]>;
    specs: ReadonlyMap<SpecRef, SpecEntry>;
    specGraph: Graph;
    moduleDag: Graph;
    staleModules: Iterable<string>;
    backend: GeneratorBackend;
    sharedGuidance?: string;
    jobs?: number;
    progress?: ProgressReporter;
    responseCache?: ResponseCache;
    costTracker?: CostTracker;
    typeCheckValidator?: TypeCheckValidator;
    /** Extra attempts granted when a type checker is configured. */
    typeCheckRetryAttempts?: number;
    buildId?: string;
}

export type TaskOutcome =
    | { module: string; status: 'ok' }
    | { module: string; status: 'failed'; errors: string[] }
    | { module: string; status: 'cancelled' };

/* -------------------------------------------------------------------------- */
/* Ready queue                                                                */
/* -------------------------------------------------------------------------- */

/** Binary max-heap on priority; equal priorities pop in name order. */
class ReadyQueue {
    private heap: Array<{ prio: number; name: string }> = [];

    get size(): number {
        return this.heap.length;
    }

    private before(a: { prio: number; name: string }, b: { prio: number; name: string }): boolean {
        return a.prio !== b.prio ? a.prio > b.prio : a.name < b.name;
    }

    push(name: string, prio: number): void {
        const h = this.heap;
        h.push({ prio, name });
        let i = h.length - 1;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!this.before(h[i], h[parent])) break;
            [h[i], h[parent]] = [h[parent], h[i]];
            i = parent;
        }
    }

    pop(): string | undefined {
        const h = this.heap;
        const top = h[0];
        const last = h.pop();
        if (top === undefined || last === undefined) return undefined;
        if (h.length > 0) {
            h[0] = last;
            let i = 0;
            for (;;) {
                const l = 2 * i + 1;
                const r = l + 1;
                let best = i;
                if (l < h.length && this.before(h[l], h[best])) best = l;
                if (r < h.length && this.before(h[r], h[best])) best = r;
                if (best === i) break;
                [h[i], h[best]] = [h[best], h[i]];
                i = best;
            }
        }
        return top.name;
    }
}

/* -------------------------------------------------------------------------- */
/* Per-module generation                                                      */
/* -------------------------------------------------------------------------- */

class ModuleBuilder {
    /** In-run memo of generated source, written only by the control loop. */
    readonly generatedSources = new Map<string, string>();
    private readonly maxAttempts: number;

    constructor(private readonly opts: BuildOptions) {
        const retries = Math.max(0, opts.typeCheckRetryAttempts ?? 0);
        this.maxAttempts = opts.typeCheckValidator ? 2 + retries : 2;
    }

    private dependencyContext(module: string): {
        apis: Array<[SpecRef, string]>;
        generated: Array<[string, string]>;
    } {
        const { moduleDag, moduleSpecs, packageDir, generatedDir } = this.opts;
        const apis: Array<[SpecRef, string]> = [];
        const generated: Array<[string, string]> = [];

        for (const dep of moduleDag.get(module) ?? []) {
            for (const entry of moduleSpecs.get(dep) ?? []) apis.push([entry.specRef, entry.source]);

            const memo = this.generatedSources.get(dep);
            if (memo !== undefined) {
                generated.push([dep, memo]);
                continue;
            }
            const onDisk = readGeneratedModule(packageDir, generatedDir, dep);
            if (onDisk !== null) generated.push([dep, stripHeader(onDisk)]);
        }
        return { apis, generated };
    }

    async build(module: string, signal: AbortSignal): Promise<TaskOutcome> {
        const { backend, responseCache, costTracker, typeCheckValidator } = this.opts;
        const mlog: Logger = log.child(module);
        const entries = this.opts.moduleSpecs.get(module) ?? [];
        const expected = entries.map((e) => e.qualname);
        const deps = this.dependencyContext(module);

        const ctx = createModuleContext({
            kind: 'build',
            specModule: module,
            generatedModule: `${this.opts.generatedDir}/${module}`,
            expectedNames: expected,
            specSources: entries.map((e) => [e.specRef, e.source] as const),
            specPrompts: entries.flatMap((e) => (e.prompt ? [[e.specRef, e.prompt] as const] : [])),
            dependencyApis: deps.apis,
            dependencyGeneratedModules: deps.generated,
            sharedGuidance: this.opts.sharedGuidance,
        });

        const typeCheck = typeCheckValidator
            ? (source: string): Promise<string[]> => typeCheckValidator.check(source, module, signal)
            : undefined;

        const validateCandidate = async (source: string): Promise<string[]> => {
            const errs = validateGeneratedSource(source, expected);
            if (errs.length > 0 || !typeCheck) return errs;
            return typeCheck(source);
        };

        let source: string | undefined;
        let cacheKey: string | undefined;

        if (responseCache) {
            cacheKey = cacheKeyFromContext(ctx, { model: backend.modelName, provider: backend.providerName });
            const cached = responseCache.get(cacheKey);
            if (cached) {
                const cacheErrors = await validateCandidate(cached.source);
                if (signal.aborted) return { module, status: 'cancelled' };
                if (cacheErrors.length === 0) {
                    source = cached.source;
                    costTracker?.recordCacheHit();
                    mlog.debug('Cache hit accepted');
                } else {
                    mlog.debug('Cached source failed re-validation', { errors: cacheErrors.length });
                }
            }
        }

        if (source === undefined) {
            const result = await backend.generateWithRetry(ctx, {
                maxAttempts: this.maxAttempts,
                extraValidator: typeCheck,
                signal,
            });
            // tokens were spent whether or not the build goes on
            if (result.usage) costTracker?.record(module, result.usage);
            if (signal.aborted) return { module, status: 'cancelled' };

            if (result.source === undefined) {
                return { module, status: 'failed', errors: result.errors.length > 0 ? result.errors : ['No source returned.'] };
            }
            if (result.errors.length > 0) {
                mlog.warn('Validation failed after retries', { attempts: result.attempts, errors: result.errors.length });
                return { module, status: 'failed', errors: result.errors };
            }
            source = result.source;
            mlog.debug('Generated', { attempts: result.attempts });

            if (responseCache && cacheKey) {
                responseCache.put(cacheKey, {
                    source,
                    promptTokens: result.usage?.promptTokens ?? 0,
                    completionTokens: result.usage?.completionTokens ?? 0,
                    model: result.usage?.model ?? '',
                    provider: result.usage?.provider ?? '',
                    cachedAt: Date.now() / 1000,
                });
            }
        }

        if (signal.aborted) return { module, status: 'cancelled' };

        const { specs, specGraph, packageDir, generatedDir } = this.opts;
        writeGeneratedModule({
            packageDir,
            generatedDir,
            moduleName: module,
            source,
            header: {
                toolVersion: TOOL_VERSION,
                kind: 'build',
                sourceModule: module,
                moduleDigest: moduleDigest(module, entries, specs, specGraph),
                specRefs: entries.map((e) => e.specRef),
            },
        });
        this.generatedSources.set(module, source);
        return { module, status: 'ok' };
    }

    /** Never rejects: every failure becomes a failed outcome. */
    async run(module: string, signal: AbortSignal): Promise<TaskOutcome> {
        try {
            return await this.build(module, signal);
        } catch (e) {
            if (signal.aborted) return { module, status: 'cancelled' };
            log.child(module).warn('Generation error', { error: errorMessage(e) });
            return { module, status: 'failed', errors: [errorMessage(e) || 'Unknown error.'] };
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Scheduler                                                                  */
/* -------------------------------------------------------------------------- */

function freezeReport(
    generated: Set<string>,
    skipped: Set<string>,
    failed: Map<string, string[]>,
): BuildReport {
    const f = new Map<string, readonly string[]>();
    for (const m of [...failed.keys()].sort()) f.set(m, Object.freeze([...(failed.get(m) ?? [])]));
    return Object.freeze({ generated, skipped, failed: f });
}

function notify(progress: ProgressReporter | undefined, module: string, ok: boolean): void {
    if (!progress) return;
    try {
        progress.advance(module, ok);
    } catch (e) {
        log.debug('Progress reporter failed', { error: errorMessage(e) });
    }
}

/** Per-module results of one build; the report is frozen from it. */
export class BuildLedger {
    readonly generated = new Set<string>();
    readonly failed = new Map<string, string[]>();
    readonly completed = new Set<string>();

    constructor(private readonly progress?: ProgressReporter) {}

    record(outcome: TaskOutcome): void {
        this.completed.add(outcome.module);
        if (outcome.status === 'ok') {
            this.generated.add(outcome.module);
        } else if (outcome.status === 'failed') {
            this.failed.set(outcome.module, outcome.errors.length > 0 ? outcome.errors : ['Unknown error.']);
        } else {
            this.failed.set(outcome.module, [BUDGET_EXCEEDED_MESSAGE]);
        }
        notify(this.progress, outcome.module, outcome.status === 'ok');
    }

    /**
     * Close out a build stopped by the budget. Work that settled while in-flight
     * tasks drained keeps its own result; every other incomplete module fails
     * with the budget error.
     */
    settleBudgetOverrun(drained: readonly TaskOutcome[], modules: Iterable<string>, e: BudgetExceededError): void {
        for (const outcome of drained) {
            if (outcome.status !== 'cancelled') this.record(outcome);
        }
        for (const m of [...modules].sort()) {
            if (this.completed.has(m)) continue;
            this.failed.set(m, [BUDGET_EXCEEDED_MESSAGE, e.message]);
            this.completed.add(m);
        }
    }
}

export async function runBuild(opts: BuildOptions): Promise<BuildReport> {
    const jobs = Math.max(1, Math.floor(opts.jobs ?? 4));
    const buildId = opts.buildId ?? randomUUID();

    // 1. expand, restrict to modules that have specs
    const expanded = expandStaleModules(opts.moduleDag, opts.staleModules);
    const stale = new Set([...expanded].filter((m) => opts.moduleSpecs.has(m)));
    const skipped = new Set([...opts.moduleSpecs.keys()].filter((m) => !stale.has(m)));

    // 2. nothing to do
    if (stale.size === 0) {
        log.info('Nothing stale', { skipped: skipped.size });
        return freezeReport(new Set(), skipped, new Map());
    }

    // 3. induced subgraph must be acyclic
    const induced = induceSubgraph(opts.moduleDag, stale);
    topologicalOrder(induced);

    // 4. priorities
    const prio = criticalPathLengths(stale, induced);

    // 5. ready queue seeded with in-degree 0
    const dependents = invertGraph(induced);
    const pendingDeps = new Map<string, number>();
    const ready = new ReadyQueue();
    for (const m of [...stale].sort()) {
        const n = induced.get(m)?.size ?? 0;
        pendingDeps.set(m, n);
        if (n === 0) ready.push(m, prio.get(m) ?? 0);
    }

    setCorrelation({ buildId });
    log.info('Build started', { stale: stale.size, skipped: skipped.size, jobs });

    const builder = new ModuleBuilder(opts);
    const ledger = new BuildLedger(opts.progress);
    const { generated, failed, completed } = ledger;

    const inFlight = new Map<string, { promise: Promise<void>; controller: AbortController }>();
    const finished: TaskOutcome[] = [];

    // 8. dependency-completion propagation, iterative
    const propagate = (root: string): void => {
        const work = [root];
        while (work.length > 0) {
            const m = work.pop();
            if (m === undefined) break;
            for (const dep of [...(dependents.get(m) ?? [])].sort()) {
                if (completed.has(dep)) continue;
                const left = (pendingDeps.get(dep) ?? 1) - 1;
                pendingDeps.set(dep, left);
                if (left !== 0) continue;

                const bad = [...(induced.get(dep) ?? [])].filter((d) => failed.has(d)).sort();
                if (bad.length > 0) {
                    failed.set(dep, bad.map((d) => `Dependency failed: ${d}`));
                    completed.add(dep);
                    notify(opts.progress, dep, false);
                    work.push(dep);
                } else {
                    ready.push(dep, prio.get(dep) ?? 0);
                }
            }
        }
    };

    try {
        // 6. execution loop
        while (ready.size > 0 || inFlight.size > 0) {
            // a. launch up to the limit
            while (ready.size > 0 && inFlight.size < jobs) {
                const m = ready.pop();
                if (m === undefined || completed.has(m)) continue;
                const controller = new AbortController();
                const promise = builder.run(m, controller.signal).then((outcome) => {
                    finished.push(outcome);
                });
                inFlight.set(m, { promise, controller });
            }
            if (inFlight.size === 0) break;

            // b. wait for at least one
            await Promise.race([...inFlight.values()].map((t) => t.promise));

            // c. serial completion handling for the whole batch
            const batch = finished.splice(0, finished.length);
            for (const outcome of batch) {
                inFlight.delete(outcome.module);
                ledger.record(outcome);
                propagate(outcome.module);
            }

            // d. post-batch budget check
            if (opts.costTracker) {
                try {
                    opts.costTracker.checkBudget();
                } catch (e) {
                    if (!(e instanceof BudgetExceededError)) throw e;
                    log.error('Budget exceeded; cancelling in-flight work', {
                        spent_usd: e.spentUsd,
                        budget_usd: e.budgetUsd,
                        in_flight: inFlight.size,
                    });
                    for (const t of inFlight.values()) t.controller.abort(e);
                    await Promise.allSettled([...inFlight.values()].map((t) => t.promise));
                    inFlight.clear();
                    ledger.settleBudgetOverrun(finished.splice(0, finished.length), stale, e);
                    break;
                }
            }
        }

        // 9. anything left means the schedule deadlocked
        const remaining = new Set([...stale].filter((m) => !completed.has(m)));
        if (remaining.size > 0) {
            throw new DependencyCycleError(findFirstCycle(induceSubgraph(induced, remaining)) ?? [...remaining].sort());
        }

        if (opts.progress) {
            try {
                opts.progress.finish();
            } catch (e) {
                log.debug('Progress reporter failed', { error: errorMessage(e) });
            }
        }

        log.info('Build finished', { generated: generated.size, failed: failed.size, skipped: skipped.size });
        // 10. report
        return freezeReport(generated, skipped, failed);
    } finally {
        clearCorrelation();
    }
}
