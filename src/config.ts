/**
 * Shared Configuration
 *
 * Process-level constants (overridable via environment variables), the model
 * rate table, and the per-project `specforge.json` loader.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, errorMessage } from './errors';
import { createLogger } from './logger';
import { JsonSchema, SchemaValidator } from './schema_validator';

const log = createLogger('config');

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const TOOL_NAME = 'specforge';
export const TOOL_VERSION = '0.1.0';
export const CONFIG_FILE_NAME = 'specforge.json';

// Default model when specforge.json does not name one
export const DEFAULT_MODEL_ID = process.env.SPECFORGE_MODEL || 'openai/gpt-4.1-mini';

// Timeouts (milliseconds)
export const TIMEOUTS = {
    MODEL_CALL_MS: envInt('SPECFORGE_MODEL_TIMEOUT_MS', 120_000),
    TYPECHECK_MS: envInt('SPECFORGE_TYPECHECK_TIMEOUT_MS', 20_000),
    BUILD_LOCK_MS: 5_000,
};

// Model router limits
export const ROUTER_LIMITS = {
    MAX_CONCURRENT: 8,
    MAX_RETRIES: 3,
    RETRY_BASE_MS: 1_000,
    CIRCUIT_FAILURE_THRESHOLD: 5,
    CIRCUIT_COOLDOWN_MS: 30_000,
};

/**
 * Estimated USD per million tokens, keyed by model-id prefix. Matched against
 * both the full id and the part after the provider slash.
 */
export const MODEL_PRICING: Record<string, { prompt: number; completion: number }> = {
    'gpt-4.1': { prompt: 2.0, completion: 8.0 },
    'gpt-4.1-mini': { prompt: 0.4, completion: 1.6 },
    'gpt-4.1-nano': { prompt: 0.1, completion: 0.4 },
    'gpt-4o': { prompt: 2.5, completion: 10.0 },
    'gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
    'gpt-5': { prompt: 2.0, completion: 8.0 },
    o3: { prompt: 2.0, completion: 8.0 },
    'o4-mini': { prompt: 1.1, completion: 4.4 },
    'claude-sonnet': { prompt: 3.0, completion: 15.0 },
    'claude-3.5-sonnet': { prompt: 3.0, completion: 15.0 },
    'claude-opus': { prompt: 15.0, completion: 75.0 },
    'claude-haiku': { prompt: 0.25, completion: 1.25 },
    'claude-3.5-haiku': { prompt: 0.25, completion: 1.25 },
    'deepseek-chat': { prompt: 0.14, completion: 0.28 },
    'llama-3.1-70b': { prompt: 0.59, completion: 0.59 },
    'llama-4': { prompt: 0.6, completion: 0.6 },
};

const PRICING_PREFIXES = Object.keys(MODEL_PRICING).sort((a, b) => b.length - a.length);

/** Longest matching prefix wins; null for unknown models. */
export function getModelPricing(modelId: string): { prompt: number; completion: number } | null {
    const bare = modelId.slice(modelId.lastIndexOf('/') + 1);
    for (const prefix of PRICING_PREFIXES) {
        if (modelId.startsWith(prefix) || bare.startsWith(prefix)) return MODEL_PRICING[prefix];
    }
    return null;
}

/** Unknown models cost nothing. */
export function estimateModelCost(modelId: string, promptTokens: number, completionTokens: number): number {
    const pricing = getModelPricing(modelId);
    if (!pricing) return 0;
    return (promptTokens * pricing.prompt + completionTokens * pricing.completion) / 1_000_000;
}

/* -------------------------------------------------------------------------- */
/* Project configuration                                                      */
/* -------------------------------------------------------------------------- */

export type CacheBackendKind = 'file' | 'sqlite';

export interface ProjectConfig {
    version: 1;
    paths: { sourceRoots: string[]; generatedDir: string };
    llm: {
        provider: 'openrouter';
        model: string;
        apiKeyEnv: string;
        baseUrl: string;
        maxOutputTokens: number;
        temperature: number;
    };
    build: {
        jobs: number;
        inferDeps: boolean;
        typeCheck: boolean;
        typeCheckRetryAttempts: number;
        maxCostUsd?: number;
    };
    cache: { enabled: boolean; backend: CacheBackendKind; dir: string };
    prompts: { buildSystem: string; buildModule: string };
}

export interface LoadedConfig {
    root: string;
    configPath: string;
    config: ProjectConfig;
}

export function defaultProjectConfig(): ProjectConfig {
    return {
        version: 1,
        paths: { sourceRoots: ['src'], generatedDir: '__generated__' },
        llm: {
            provider: 'openrouter',
            model: DEFAULT_MODEL_ID,
            apiKeyEnv: 'OPENROUTER_API_KEY',
            baseUrl: 'https://openrouter.ai/api/v1',
            maxOutputTokens: 16384,
            temperature: 0.2,
        },
        build: { jobs: 8, inferDeps: true, typeCheck: false, typeCheckRetryAttempts: 1 },
        cache: { enabled: true, backend: 'file', dir: '.specforge/cache' },
        prompts: { buildSystem: '', buildModule: '' },
    };
}

const SEGMENT = '^[A-Za-z0-9_.-]+$';

const CONFIG_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['version'],
    additionalProperties: false,
    properties: {
        $schema: { type: 'string' },
        version: { type: 'integer', enum: [1] },
        paths: {
            type: 'object',
            additionalProperties: false,
            properties: {
                sourceRoots: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
                generatedDir: { type: 'string', pattern: SEGMENT },
            },
        },
        llm: {
            type: 'object',
            additionalProperties: false,
            properties: {
                provider: { type: 'string', enum: ['openrouter'] },
                model: { type: 'string', minLength: 1 },
                apiKeyEnv: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
                baseUrl: { type: 'string', pattern: '^https?://' },
                maxOutputTokens: { type: 'integer', minimum: 1 },
                temperature: { type: 'number', minimum: 0, maximum: 2 },
            },
        },
        build: {
            type: 'object',
            additionalProperties: false,
            properties: {
                jobs: { type: 'integer', minimum: 1 },
                inferDeps: { type: 'boolean' },
                typeCheck: { type: 'boolean' },
                typeCheckRetryAttempts: { type: 'integer', minimum: 0 },
                maxCostUsd: { type: 'number', minimum: 0 },
            },
        },
        cache: {
            type: 'object',
            additionalProperties: false,
            properties: {
                enabled: { type: 'boolean' },
                backend: { type: 'string', enum: ['file', 'sqlite'] },
                dir: { type: 'string', minLength: 1 },
            },
        },
        prompts: {
            type: 'object',
            additionalProperties: false,
            properties: {
                buildSystem: { type: 'string' },
                buildModule: { type: 'string' },
            },
        },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('specforge-config', CONFIG_SCHEMA);

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const v = raw[key];
    return typeof v === 'object' && v !== null && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

function str(v: unknown, fallback: string): string {
    return typeof v === 'string' ? v : fallback;
}

function num(v: unknown, fallback: number): number {
    return typeof v === 'number' ? v : fallback;
}

function bool(v: unknown, fallback: boolean): boolean {
    return typeof v === 'boolean' ? v : fallback;
}

/** Merge a schema-valid document over the defaults. */
export function resolveProjectConfig(raw: Record<string, unknown>): ProjectConfig {
    const d = defaultProjectConfig();
    const paths = section(raw, 'paths');
    const llm = section(raw, 'llm');
    const build = section(raw, 'build');
    const cache = section(raw, 'cache');
    const prompts = section(raw, 'prompts');

    const roots = paths.sourceRoots;
    const sourceRoots = Array.isArray(roots)
        ? roots.filter((r): r is string => typeof r === 'string')
        : d.paths.sourceRoots;

    return {
        version: 1,
        paths: { sourceRoots, generatedDir: str(paths.generatedDir, d.paths.generatedDir) },
        llm: {
            provider: 'openrouter',
            model: process.env.SPECFORGE_MODEL || str(llm.model, d.llm.model),
            apiKeyEnv: str(llm.apiKeyEnv, d.llm.apiKeyEnv),
            baseUrl: str(llm.baseUrl, d.llm.baseUrl),
            maxOutputTokens: num(llm.maxOutputTokens, d.llm.maxOutputTokens),
            temperature: num(llm.temperature, d.llm.temperature),
        },
        build: {
            jobs: num(build.jobs, d.build.jobs),
            inferDeps: bool(build.inferDeps, d.build.inferDeps),
            typeCheck: bool(build.typeCheck, d.build.typeCheck),
            typeCheckRetryAttempts: num(build.typeCheckRetryAttempts, d.build.typeCheckRetryAttempts),
            maxCostUsd: typeof build.maxCostUsd === 'number' ? build.maxCostUsd : undefined,
        },
        cache: {
            enabled: bool(cache.enabled, d.cache.enabled),
            backend: cache.backend === 'sqlite' ? 'sqlite' : d.cache.backend,
            dir: str(cache.dir, d.cache.dir),
        },
        prompts: {
            buildSystem: str(prompts.buildSystem, d.prompts.buildSystem),
            buildModule: str(prompts.buildModule, d.prompts.buildModule),
        },
    };
}

export function parseProjectConfig(text: string, configPath: string): ProjectConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(e)}`);
    }

    const result = validator.validate(raw, 'specforge-config');
    if (!result.valid || typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        const detail = result.errors.map((e) => `  ${e.path || '(root)'}: ${e.message}`).join('\n');
        throw new ConfigError(`Invalid ${configPath}:\n${detail}`);
    }
    return resolveProjectConfig(Object.fromEntries(Object.entries(raw)));
}

/** Walk upward from `cwd` to the nearest directory holding specforge.json. */
export function findProjectRoot(cwd: string): string {
    let dir = path.resolve(cwd);
    for (;;) {
        if (fs.existsSync(path.join(dir, CONFIG_FILE_NAME))) return dir;
        const parent = path.dirname(dir);
        if (parent === dir) {
            throw new ConfigError(`No ${CONFIG_FILE_NAME} found in ${cwd} or any parent directory.`);
        }
        dir = parent;
    }
}

export function loadProjectConfig(opts: { root: string; configPath?: string }): LoadedConfig {
    const root = path.resolve(opts.root);
    const configPath = opts.configPath ? path.resolve(root, opts.configPath) : path.join(root, CONFIG_FILE_NAME);

    let text: string;
    try {
        text = fs.readFileSync(configPath, 'utf8');
    } catch (e) {
        throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(e)}`);
    }

    const config = parseProjectConfig(text, configPath);
    log.debug('Config loaded', { configPath, model: config.llm.model, jobs: config.build.jobs });
    return { root, configPath, config };
}

/** Starter specforge.json written by `specforge init`. */
export function initialConfigText(): string {
    const d = defaultProjectConfig();
    const doc = {
        version: d.version,
        paths: d.paths,
        llm: { model: d.llm.model, apiKeyEnv: d.llm.apiKeyEnv },
        build: { jobs: d.build.jobs, inferDeps: d.build.inferDeps, typeCheck: d.build.typeCheck },
        cache: d.cache,
    };
    return JSON.stringify(doc, null, 2) + '\n';
}
