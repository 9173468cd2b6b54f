/**
 * TypeCheckValidator — runs tsc over one candidate module in a scratch tree.
 *
 * The candidate is checked in isolation, so unresolved imports (TS2307) are
 * expected and tolerated. Any other diagnostic fails the candidate.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TIMEOUTS } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('typecheck');

const MAX_DIAGNOSTIC_LINES = 16;
const UNRESOLVED_IMPORT = 'TS2307';

export interface TypeCheckOptions {
    /** argv; the file list and flags are appended. */
    command: readonly string[];
    generatedDir: string;
    timeoutMs?: number;
}

/** `node <tsc>` for the project's own typescript, else the one bundled with this tool. */
export function resolveTypeCheckCommand(root: string): string[] | null {
    const local = path.join(root, 'node_modules', 'typescript', 'bin', 'tsc');
    if (fs.existsSync(local)) return [process.execPath, local];
    try {
        return [process.execPath, require.resolve('typescript/bin/tsc')];
    } catch (e) {
        log.debug('No TypeScript compiler found', { error: errorMessage(e) });
        return null;
    }
}

interface RunResult {
    code: number | null;
    output: string;
    timedOut: boolean;
}

function run(argv: readonly string[], cwd: string, timeoutMs: number, signal?: AbortSignal): Promise<RunResult> {
    return new Promise((resolve, reject) => {
        const [cmd, ...args] = argv;
        const child = spawn(cmd, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'], signal });
        let output = '';
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
        }, timeoutMs);

        child.stdout.on('data', (d: Buffer) => (output += d.toString('utf8')));
        child.stderr.on('data', (d: Buffer) => (output += d.toString('utf8')));
        child.on('error', (err) => {
            clearTimeout(timer);
            reject(err);
        });
        child.on('close', (code) => {
            clearTimeout(timer);
            resolve({ code, output, timedOut });
        });
    });
}

/** Error codes (`TSnnnn`) in tsc output, in order. */
export function diagnosticCodes(output: string): string[] {
    return [...output.matchAll(/error (TS\d+)/g)].map((m) => m[1]);
}

export class TypeCheckValidator {
    private readonly timeoutMs: number;

    constructor(private readonly opts: TypeCheckOptions) {
        this.timeoutMs = opts.timeoutMs ?? TIMEOUTS.TYPECHECK_MS;
    }

    /** Empty list means the candidate type-checks. */
    async check(source: string, moduleName: string, signal?: AbortSignal): Promise<string[]> {
        const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'specforge-tc-'));
        try {
            const rel = path.join(this.opts.generatedDir, ...`${moduleName}.ts`.split('/'));
            const file = path.join(tmp, rel);
            fs.mkdirSync(path.dirname(file), { recursive: true });
            fs.writeFileSync(file, source, 'utf8');

            const argv = [
                ...this.opts.command,
                '--noEmit',
                '--pretty',
                'false',
                '--strict',
                '--skipLibCheck',
                '--target',
                'ES2022',
                '--module',
                'commonjs',
                '--esModuleInterop',
                rel,
            ];

            let res: RunResult;
            try {
                res = await run(argv, tmp, this.timeoutMs, signal);
            } catch (e) {
                if (signal?.aborted) throw e;
                return [`Type checker could not start: ${errorMessage(e)}`];
            }

            if (res.timedOut) {
                return [`Type check timed out after ${this.timeoutMs}ms.`];
            }
            if (res.code === 0) return [];

            const codes = diagnosticCodes(res.output);
            if (codes.length > 0 && codes.every((c) => c === UNRESOLVED_IMPORT)) {
                log.debug('Only unresolved imports reported; accepted', { module: moduleName });
                return [];
            }

            const lines = res.output
                .split(/\r?\n/)
                .map((l) => l.trimEnd())
                .filter((l) => l.length > 0)
                .slice(0, MAX_DIAGNOSTIC_LINES);
            return [`Type check failed:\n${lines.join('\n')}`];
        } finally {
            fs.rmSync(tmp, { recursive: true, force: true });
        }
    }
}
