/**
 * Structured Logger — component-scoped logging for specforge
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when SPECFORGE_LOG_JSON=1
 * - Optional file output via SPECFORGE_LOG_FILE
 * - Build correlation (build id + module) on every line
 *
 * All log output goes to stderr; stdout belongs to command output.
 *
 * Environment:
 *   SPECFORGE_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   SPECFORGE_LOG_JSON   = 1 (default: text)
 *   SPECFORGE_LOG_FILE   = path (optional, appends)
 *   SPECFORGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLevelName(s: string): s is LogLevel | 'silent' {
    return s in LEVEL_ORDER;
}

function levelFromEnv(): number {
    if (process.env.SPECFORGE_DEBUG === '1' || process.env.SPECFORGE_DEBUG === 'true') return 0;
    const raw = (process.env.SPECFORGE_LOG_LEVEL || 'info').toLowerCase();
    return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

let _minLevel: number | null = null;

/** Override the minimum level for this process (CLI flags, tests). */
export function setLogLevel(level: LogLevel | 'silent'): void {
    _minLevel = LEVEL_ORDER[level];
}

/* -------------------------------------------------------------------------- */
/* Build Correlation Context                                                  */
/* -------------------------------------------------------------------------- */

let _buildId = '';
let _module = '';

/** Set the active build correlation context. Called by the scheduler at build start. */
export function setCorrelation(opts: { buildId?: string; module?: string }): void {
    if (opts.buildId !== undefined) _buildId = opts.buildId;
    if (opts.module !== undefined) _module = opts.module;
}

export function clearCorrelation(): void {
    _buildId = '';
    _module = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    const min = _minLevel ?? levelFromEnv();
    if (LEVEL_ORDER[level] < min) return;

    const ts = new Date().toISOString();

    if (process.env.SPECFORGE_LOG_JSON === '1') {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_buildId) entry.build_id = _buildId;
        if (_module) entry.module = _module;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _buildId ? ` [${_buildId.slice(0, 8)}${_module ? '/' + _module : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        writeOutput(data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
    }
}

function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    const logFile = process.env.SPECFORGE_LOG_FILE;
    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch {
            // a broken log file must never fail the build
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
