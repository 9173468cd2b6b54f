/**
 * Error taxonomy for specforge.
 *
 * Build-level failures (configuration, discovery, dependency cycles, budget)
 * are thrown as ForgeError subclasses. Per-module generation failures are
 * never thrown through the scheduler; they land in the BuildReport instead.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    | 'CONFIG_ERROR'
    | 'DISCOVERY_ERROR'
    | 'DEPENDENCY_CYCLE'
    | 'GENERATION_ERROR'
    | 'BUDGET_EXCEEDED'
    | 'BUILD_LOCKED'
    | 'INTERNAL';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    hint: string | null;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class ForgeError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly hint?: string,
    ) {
        super(message);
        this.name = 'ForgeError';
    }

    /** Extra machine-readable detail for --json output. */
    context(): Record<string, unknown> {
        return {};
    }
}

export class ConfigError extends ForgeError {
    constructor(message: string, hint?: string) {
        super(message, 'CONFIG_ERROR', hint ?? 'Check specforge.json (run `specforge init` to create one).');
        this.name = 'ConfigError';
    }
}

export class DiscoveryError extends ForgeError {
    constructor(message: string, hint?: string) {
        super(message, 'DISCOVERY_ERROR', hint);
        this.name = 'DiscoveryError';
    }
}

export class DependencyCycleError extends ForgeError {
    constructor(public readonly participants: string[]) {
        super(
            participants.length > 0
                ? `Dependency cycle detected: ${[...participants, participants[0]].join(' -> ')}`
                : 'Dependency cycle detected.',
            'DEPENDENCY_CYCLE',
            'Break the cycle by removing one of the @deps edges (or pass --no-infer-deps).',
        );
        this.name = 'DependencyCycleError';
    }

    override context(): Record<string, unknown> {
        return { participants: this.participants };
    }
}

export class GenerationError extends ForgeError {
    constructor(message: string, code: ErrorCode = 'GENERATION_ERROR', hint?: string) {
        super(message, code, hint);
        this.name = 'GenerationError';
    }
}

export class BudgetExceededError extends GenerationError {
    constructor(
        public readonly spentUsd: number,
        public readonly budgetUsd: number,
    ) {
        super(
            `Build cost $${spentUsd.toFixed(4)} exceeds budget limit $${budgetUsd.toFixed(4)}. Aborting.`,
            'BUDGET_EXCEEDED',
            'Raise build.maxCostUsd or pass --max-cost with a higher limit.',
        );
        this.name = 'BudgetExceededError';
    }

    override context(): Record<string, unknown> {
        return { spent_usd: this.spentUsd, budget_usd: this.budgetUsd };
    }
}

export class BuildLockedError extends ForgeError {
    constructor(
        public readonly lockPath: string,
        public readonly holderPid?: number,
    ) {
        super(
            `Another build holds ${lockPath}${holderPid !== undefined ? ` (pid ${holderPid})` : ''}.`,
            'BUILD_LOCKED',
            'Wait for the other build to finish, or delete the lock file if that process is gone.',
        );
        this.name = 'BuildLockedError';
    }

    override context(): Record<string, unknown> {
        return { lock_path: this.lockPath, holder_pid: this.holderPid ?? null };
    }
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['INTERNAL', 'BUDGET_EXCEEDED', 'DEPENDENCY_CYCLE'];
    return fatalCodes.includes(code) ? 'FATAL' : 'ERROR';
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

export function toStructuredError(e: unknown): StructuredError {
    if (e instanceof ForgeError) {
        return {
            code: e.code,
            message: e.message,
            severity: getSeverity(e.code),
            context: e.context(),
            hint: e.hint ?? null,
            timestamp: new Date().toISOString(),
        };
    }
    return {
        code: 'INTERNAL',
        message: errorMessage(e),
        severity: 'FATAL',
        context: e instanceof Error ? { name: e.name } : {},
        hint: null,
        timestamp: new Date().toISOString(),
    };
}

export function formatErrorWithHint(e: unknown): string {
    const lines = [`error: ${errorMessage(e)}`];
    if (e instanceof ForgeError && e.hint) lines.push(`hint: ${e.hint}`);
    return lines.join('\n');
}
