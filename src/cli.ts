#!/usr/bin/env node
/**
 * CLI entry point for specforge
 */

import * as fs from 'fs';
import * as path from 'path';

import { BUDGET_EXCEEDED_MESSAGE, BuildReport } from './build_scheduler';
import {
    CONFIG_FILE_NAME,
    findProjectRoot,
    initialConfigText,
    loadProjectConfig,
    LoadedConfig,
    TOOL_NAME,
    TOOL_VERSION,
} from './config';
import type { CostTracker } from './cost_tracker';
import {
    BuildLockedError,
    ConfigError,
    DependencyCycleError,
    DiscoveryError,
    errorMessage,
    ForgeError,
    formatErrorWithHint,
    GenerationError,
    toStructuredError,
} from './errors';
import type { GeneratorBackend } from './generate/backend';
import { createLogger, setLogLevel } from './logger';
import { cleanGeneratedDirs } from './output_writer';
import { buildProject, projectStatus } from './project';
import { openCacheStore, ResponseCache } from './response_cache';

const log = createLogger('cli');

export const EXIT = {
    OK: 0,
    INTERNAL: 1,
    CONFIG: 2,
    GENERATION: 3,
} as const;

export interface CliIO {
    stdout: { write(chunk: string): boolean };
    stderr: { write(chunk: string): boolean };
    cwd: string;
    env: NodeJS.ProcessEnv;
}

const USAGE = `Usage: ${TOOL_NAME} <command> [options]

Commands:
  init                 Write a starter ${CONFIG_FILE_NAME}
  build                Generate stale modules
  status               List stale and fresh modules
  clean                Remove the generated directory
  cache info|clear     Inspect or empty the response cache
  help                 Show this message

Common options:
  --root <dir>         Project root (default: nearest dir with ${CONFIG_FILE_NAME})
  --config <file>      Config file, relative to the root
  --json               Machine-readable output on stdout
  --verbose            Debug logging on stderr

build options:
  --jobs <n>           Parallel generations (default: build.jobs)
  --force              Rebuild every module
  --target <m[:Name]>  Build only this module and its dependencies (repeatable)
  --no-infer-deps      Only use explicit @deps edges
  --no-cache           Skip the response cache
  --no-progress        No progress lines
  --max-cost <usd>     Abort once estimated spend exceeds this

init options:
  --force              Overwrite an existing ${CONFIG_FILE_NAME}

clean options:
  --dry-run            Report what would be removed
`;

/* -------------------------------------------------------------------------- */
/* Argument reading                                                           */
/* -------------------------------------------------------------------------- */

class UsageError extends ForgeError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', `Run \`${TOOL_NAME} help\` for usage.`);
        this.name = 'UsageError';
    }
}

const VALUE_OPTIONS = new Set(['--root', '--config', '--jobs', '--target', '--max-cost']);

/** Hand-rolled reader: every option must be consumed, leftovers are usage errors. */
class ArgReader {
    private rest: string[];

    constructor(args: readonly string[]) {
        this.rest = [...args];
    }

    flag(name: string): boolean {
        const i = this.rest.indexOf(name);
        if (i === -1) return false;
        this.rest.splice(i, 1);
        return true;
    }

    values(name: string): string[] {
        const out: string[] = [];
        for (;;) {
            const i = this.rest.indexOf(name);
            if (i === -1) return out;
            const v = this.rest[i + 1];
            if (v === undefined || v.startsWith('--')) throw new UsageError(`${name} requires a value`);
            out.push(v);
            this.rest.splice(i, 2);
        }
    }

    value(name: string): string | undefined {
        const vs = this.values(name);
        if (vs.length > 1) throw new UsageError(`${name} given more than once`);
        return vs[0];
    }

    number(name: string, check: (n: number) => boolean, what: string): number | undefined {
        const raw = this.value(name);
        if (raw === undefined) return undefined;
        const n = Number(raw);
        if (!Number.isFinite(n) || !check(n)) throw new UsageError(`${name} must be ${what}, got "${raw}"`);
        return n;
    }

    positional(): string | undefined {
        for (let i = 0; i < this.rest.length; i++) {
            const a = this.rest[i];
            if (VALUE_OPTIONS.has(a)) {
                i++;
                continue;
            }
            if (!a.startsWith('--')) return this.rest.splice(i, 1)[0];
        }
        return undefined;
    }

    done(): void {
        if (this.rest.length > 0) throw new UsageError(`Unexpected argument: ${this.rest[0]}`);
    }
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

function exitCodeFor(e: unknown): number {
    if (
        e instanceof ConfigError ||
        e instanceof DiscoveryError ||
        e instanceof DependencyCycleError ||
        e instanceof BuildLockedError ||
        e instanceof UsageError
    ) {
        return EXIT.CONFIG;
    }
    if (e instanceof GenerationError) return EXIT.GENERATION;
    return EXIT.INTERNAL;
}

function budgetExceeded(report: BuildReport): boolean {
    for (const errs of report.failed.values()) {
        if (errs[0] === BUDGET_EXCEEDED_MESSAGE) return true;
    }
    return false;
}

export class SpecforgeCli {
    private json = false;

    constructor(
        private readonly io: CliIO = {
            stdout: process.stdout,
            stderr: process.stderr,
            cwd: process.cwd(),
            env: process.env,
        },
        /** Replaces the configured backend for `build`. */
        private readonly backend?: GeneratorBackend,
    ) {}

    private out(line = ''): void {
        this.io.stdout.write(line + '\n');
    }

    private err(line: string): void {
        this.io.stderr.write(line + '\n');
    }

    private emitJson(value: unknown): void {
        this.out(JSON.stringify(value, null, 2));
    }

    /** argv without the node binary and script. Resolves to the exit code. */
    async run(argv: readonly string[]): Promise<number> {
        const reader = new ArgReader(argv);
        this.json = reader.flag('--json');
        if (reader.flag('--verbose')) setLogLevel('debug');

        try {
            if (reader.flag('--version')) {
                reader.done();
                this.out(TOOL_VERSION);
                return EXIT.OK;
            }
            const command = reader.flag('--help') ? 'help' : (reader.positional() ?? 'help');
            switch (command) {
                case 'init':
                    return this.runInit(reader);
                case 'build':
                    return await this.runBuild(reader);
                case 'status':
                    return this.runStatus(reader);
                case 'clean':
                    return this.runClean(reader);
                case 'cache':
                    return this.runCache(reader);
                case 'help':
                    this.out(USAGE);
                    return EXIT.OK;
                default:
                    throw new UsageError(`Unknown command: ${command}`);
            }
        } catch (e) {
            const code = exitCodeFor(e);
            if (code === EXIT.INTERNAL) log.error('Unexpected failure', { error: errorMessage(e) });
            if (this.json) this.emitJson({ ok: false, error: toStructuredError(e) });
            else this.err(formatErrorWithHint(e));
            return code;
        }
    }

    private loadConfig(reader: ArgReader): LoadedConfig {
        const rootArg = reader.value('--root');
        const configPath = reader.value('--config');
        const root = rootArg ? path.resolve(this.io.cwd, rootArg) : findProjectRoot(this.io.cwd);
        return loadProjectConfig({ root, configPath });
    }

    private runInit(reader: ArgReader): number {
        const rootArg = reader.value('--root');
        const force = reader.flag('--force');
        reader.done();

        const root = path.resolve(this.io.cwd, rootArg ?? '.');
        const file = path.join(root, CONFIG_FILE_NAME);
        if (fs.existsSync(file) && !force) {
            throw new ConfigError(`${file} already exists.`, 'Pass --force to overwrite it.');
        }
        fs.mkdirSync(root, { recursive: true });
        fs.writeFileSync(file, initialConfigText(), 'utf8');

        if (this.json) this.emitJson({ ok: true, config_path: file });
        else this.out(`Wrote ${file}`);
        return EXIT.OK;
    }

    private async runBuild(reader: ArgReader): Promise<number> {
        const loaded = this.loadConfig(reader);
        const jobs = reader.number('--jobs', (n) => Number.isInteger(n) && n >= 1, 'a positive integer');
        const maxCostUsd = reader.number('--max-cost', (n) => n >= 0, 'a non-negative number');
        const force = reader.flag('--force');
        const targets = reader.values('--target');
        const noInfer = reader.flag('--no-infer-deps');
        const noCache = reader.flag('--no-cache');
        const noProgress = reader.flag('--no-progress');
        reader.done();

        const { report, cost, buildId } = await buildProject({
            root: loaded.root,
            config: loaded.config,
            targets,
            inferDeps: noInfer ? false : undefined,
            force,
            jobs,
            maxCostUsd,
            noCache,
            progress: !noProgress,
            backend: this.backend,
            env: this.io.env,
        });

        const overBudget = budgetExceeded(report);
        const ok = report.failed.size === 0;

        if (this.json) {
            this.emitJson({
                ok,
                build_id: buildId,
                generated: [...report.generated].sort(),
                skipped: [...report.skipped].sort(),
                failed: Object.fromEntries(report.failed),
                budget_exceeded: overBudget,
                cost: cost.summary(),
            });
        } else {
            this.printReport(report, cost);
        }
        return ok ? EXIT.OK : EXIT.GENERATION;
    }

    private printReport(report: BuildReport, cost: CostTracker): void {
        for (const m of [...report.generated].sort()) this.out(`generated ${m}`);
        for (const [m, errs] of report.failed) {
            this.out(`FAIL      ${m}`);
            for (const e of errs) this.out(`  ${e.split('\n').join('\n  ')}`);
        }
        this.out(
            `Built ${report.generated.size}, skipped ${report.skipped.size}, failed ${report.failed.size}.`,
        );
        this.out(cost.formatSummary());
    }

    private runStatus(reader: ArgReader): number {
        const loaded = this.loadConfig(reader);
        const targets = reader.values('--target');
        const noInfer = reader.flag('--no-infer-deps');
        const force = reader.flag('--force');
        reader.done();

        const status = projectStatus({
            root: loaded.root,
            config: loaded.config,
            targets,
            inferDeps: noInfer ? false : undefined,
            force,
        });

        if (this.json) {
            this.emitJson({ ok: true, ...status });
        } else {
            for (const m of status.stale) this.out(`stale  ${m}`);
            for (const m of status.fresh) this.out(`fresh  ${m}`);
            this.out(`${status.stale.length} stale, ${status.fresh.length} fresh.`);
        }
        return EXIT.OK;
    }

    private runClean(reader: ArgReader): number {
        const loaded = this.loadConfig(reader);
        const dryRun = reader.flag('--dry-run');
        reader.done();

        const removed = cleanGeneratedDirs({
            roots: [loaded.root],
            generatedDir: loaded.config.paths.generatedDir,
            dryRun,
        });

        if (this.json) {
            this.emitJson({ ok: true, dry_run: dryRun, removed });
        } else if (removed.length === 0) {
            this.out('Nothing to clean.');
        } else {
            for (const d of removed) this.out(`${dryRun ? 'would remove' : 'removed'} ${d}`);
        }
        return EXIT.OK;
    }

    private runCache(reader: ArgReader): number {
        const action = reader.positional();
        const loaded = this.loadConfig(reader);
        reader.done();

        const { cache: cfg } = loaded.config;
        const cache = new ResponseCache(openCacheStore(cfg.backend, path.resolve(loaded.root, cfg.dir)), {
            enabled: cfg.enabled,
        });
        try {
            if (action === 'info') {
                const info = cache.info();
                if (this.json) {
                    this.emitJson({ ok: true, backend: info.backend, path: info.path, entries: info.entries, size_bytes: info.sizeBytes, enabled: info.enabled });
                } else {
                    this.out(`Backend: ${info.backend}`);
                    this.out(`Path:    ${info.path}`);
                    this.out(`Entries: ${info.entries}`);
                    this.out(`Size:    ${info.sizeBytes} bytes`);
                    this.out(`Enabled: ${info.enabled ? 'yes' : 'no'}`);
                }
                return EXIT.OK;
            }
            if (action === 'clear') {
                const removed = cache.clear();
                if (this.json) this.emitJson({ ok: true, removed });
                else this.out(`Removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}.`);
                return EXIT.OK;
            }
            throw new UsageError(`cache expects "info" or "clear", got ${action === undefined ? 'nothing' : `"${action}"`}`);
        } finally {
            cache.close();
        }
    }
}

// Run CLI
if (require.main === module) {
    new SpecforgeCli()
        .run(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
            process.exitCode = EXIT.INTERNAL;
        });
}
