// model_router.ts - OpenAI-compatible chat completions with retry, circuit breaker and slot limiting

import crypto from "crypto";
import { estimateModelCost, ROUTER_LIMITS, TIMEOUTS, TOOL_NAME } from "./config";
import { createLogger } from "./logger";

const log = createLogger('model-router');

// ============================================================================
// Types
// ============================================================================

export type ModelRole = "system" | "user" | "assistant";

export interface ModelMessage {
    role: ModelRole;
    content: string;
}

export interface ModelRequest {
    model_id: string;
    messages: ModelMessage[];
    max_tokens?: number;
    temperature?: number;
    seed?: number;
    stop?: string[];
    timeout_ms?: number;
}

export interface CallContext {
    build_id?: string | null;
    target_id?: string | null;
}

export interface ModelResponse {
    ok: true;
    completion: string;
    finish_reason: string | null;
    tokenUsage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    costUsd: number;
    provider: {
        requestId: string | null;
        modelId: string;
        latencyMs: number;
    };
    meta: {
        idempotencyKey: string;
        attemptNo: number;
        promptHash: string;
        responseHash: string;
    };
}

export type ModelRouterErrorCode =
    | "INVALID_CONFIG"
    | "CIRCUIT_OPEN"
    | "RATE_LIMIT"
    | "NETWORK_ERROR"
    | "MODEL_ERROR"
    | "INFRA_ERROR"
    | "CANCELLED";

export interface ModelRouterError {
    ok: false;
    errorCode: ModelRouterErrorCode;
    message: string;
    retryable: boolean;
    attemptsUsed: number;
    httpStatus: number | null;
    providerBodySnippet: string | null;
    meta?: {
        idempotencyKey?: string;
        modelId?: string;
        buildId?: string | null;
        targetId?: string | null;
    };
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ModelRouterConfig {
    apiKey: string;
    /** Base URL of an OpenAI-compatible API, without `/chat/completions`. */
    baseUrl?: string;
    /** Defaults to the global fetch. */
    fetch?: FetchLike;
    /** Waits before attempts 2, 3, ...; the last value repeats. */
    retryBackoffMs?: readonly number[];
    maxAttempts?: number;
    maxConcurrent?: number;
    debug?: boolean;
}

// ============================================================================
// Frozen constants
// ============================================================================

const FROZEN = {
    DEFAULT_BASE_URL: "https://openrouter.ai/api/v1",
    MAX_PROMPT_CHARS: 1_000_000,
    MAX_COMPLETION_TOKENS: 32000,
    RETRY_BACKOFF_MS: [2000, 5000, 10000] as const,

    CIRCUIT_BREAKER: {
        MAX_FAILURES: ROUTER_LIMITS.CIRCUIT_FAILURE_THRESHOLD,
        WINDOW_MS: 60_000,
        COOLDOWN_MS: ROUTER_LIMITS.CIRCUIT_COOLDOWN_MS,
    },

    SANITIZE: {
        ERROR_SNIPPET_MAX_CHARS: 500,
        STRIP_PATTERNS: [
            /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
            /[a-fA-F0-9]{32,}/g,
            /sk-[A-Za-z0-9-]{10,}/g,
            /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        ],
    },
} as const;

// ============================================================================
// Circuit Breaker
// ============================================================================

class CircuitBreaker {
    private failures: number[] = [];
    private openUntilMs = 0;

    isOpen(nowMs: number): boolean {
        return nowMs < this.openUntilMs;
    }

    recordFailure(nowMs: number): void {
        this.failures.push(nowMs);
        const cutoff = nowMs - FROZEN.CIRCUIT_BREAKER.WINDOW_MS;
        this.failures = this.failures.filter((t) => t >= cutoff);

        if (this.failures.length >= FROZEN.CIRCUIT_BREAKER.MAX_FAILURES) {
            this.openUntilMs = nowMs + FROZEN.CIRCUIT_BREAKER.COOLDOWN_MS;
        }
    }

    recordSuccess(): void {
        this.failures = [];
    }
}

// ============================================================================
// Concurrency Limiter (simple semaphore)
// ============================================================================

class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Array<() => void> = [];

    constructor(private maxSlots: number) { }

    async acquireSlot(): Promise<void> {
        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    releaseSlot(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }
}

// ============================================================================
// Helpers
// ============================================================================

function clampInt(n: unknown): number {
    const x = Number(n);
    if (!Number.isFinite(x)) return 0;
    return Math.max(0, Math.floor(x));
}

function sha256Hex(s: string): string {
    return crypto.createHash("sha256").update(s).digest("hex");
}

export function sanitizeErrorSnippet(input: string): string {
    let out = input || "";
    for (const re of FROZEN.SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, "[REDACTED]");
    }
    if (out.length > FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, " ");
}

function safeTemperature(x: number | undefined): number {
    if (x === undefined || !Number.isFinite(x)) return 0.2;
    return Math.max(0, Math.min(2.0, x));
}

function validateMessages(messages: ModelMessage[]): { ok: true } | { ok: false; err: string } {
    if (messages.length === 0) {
        return { ok: false, err: "messages must be a non-empty array" };
    }
    for (const m of messages) {
        if (m.content.trim().length === 0) {
            return { ok: false, err: `${m.role} message content must be non-empty` };
        }
    }
    return { ok: true };
}

interface ChatPayload {
    model: string;
    messages: ModelMessage[];
    temperature: number;
    max_tokens: number;
    stream: false;
    seed?: number;
    stop?: string[];
}

function computePayload(req: ModelRequest): ChatPayload {
    const payload: ChatPayload = {
        model: req.model_id,
        messages: req.messages,
        temperature: safeTemperature(req.temperature),
        max_tokens: req.max_tokens || FROZEN.MAX_COMPLETION_TOKENS,
        stream: false,
    };
    if (req.seed !== undefined) payload.seed = req.seed;
    if (req.stop !== undefined) payload.stop = req.stop;
    return payload;
}

function field(obj: unknown, key: string): unknown {
    if (typeof obj !== "object" || obj === null || !(key in obj)) return undefined;
    return Object.getOwnPropertyDescriptor(obj, key)?.value;
}

function asString(v: unknown): string | null {
    return typeof v === "string" ? v : null;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(t);
            reject(signal?.reason);
        };
        const t = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

// ============================================================================
// ModelRouter
// ============================================================================

export class ModelRouter {
    private breaker = new CircuitBreaker();
    private limiter: ConcurrencyLimiter;
    private apiKey: string;
    private endpoint: string;
    private fetchImpl: FetchLike;
    private backoff: readonly number[];
    private maxAttempts: number;
    private debug: boolean;

    constructor(config: ModelRouterConfig) {
        if (!config.apiKey) {
            log.warn("No API key configured; requests will be rejected by the provider.");
        }
        this.apiKey = config.apiKey;
        this.endpoint = `${(config.baseUrl ?? FROZEN.DEFAULT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
        this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
        this.backoff = config.retryBackoffMs ?? FROZEN.RETRY_BACKOFF_MS;
        this.maxAttempts = Math.max(1, config.maxAttempts ?? ROUTER_LIMITS.MAX_RETRIES);
        this.debug = config.debug ?? false;
        this.limiter = new ConcurrencyLimiter(Math.max(1, config.maxConcurrent ?? ROUTER_LIMITS.MAX_CONCURRENT));
    }

    async executeModelCall(
        req: ModelRequest,
        ctx?: CallContext,
        signal?: AbortSignal
    ): Promise<ModelResponse | ModelRouterError> {
        const vm = validateMessages(req.messages);
        if (!vm.ok) {
            return this.err("INVALID_CONFIG", vm.err, false, 1, null, null, req.model_id, ctx);
        }

        const payload = computePayload(req);
        const body = JSON.stringify(payload);
        if (body.length > FROZEN.MAX_PROMPT_CHARS) {
            return this.err(
                "INVALID_CONFIG",
                `Prompt too large: ${body.length} chars > ${FROZEN.MAX_PROMPT_CHARS}`,
                false,
                1,
                null,
                null,
                req.model_id,
                ctx
            );
        }

        const idempotencyKey = sha256Hex(body);

        if (this.breaker.isOpen(Date.now())) {
            return this.err(
                "CIRCUIT_OPEN",
                "Circuit breaker open (too many recent failures)",
                false,
                1,
                null,
                null,
                req.model_id,
                ctx,
                idempotencyKey
            );
        }

        await this.limiter.acquireSlot();

        try {
            for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
                if (attempt > 1) {
                    const wait = this.backoff[Math.min(attempt - 2, this.backoff.length - 1)] ?? 0;
                    try {
                        await sleep(wait, signal);
                    } catch {
                        return this.err("CANCELLED", "cancelled during retry backoff", false, attempt - 1, null, null, req.model_id, ctx, idempotencyKey);
                    }
                }

                if (this.debug) {
                    log.debug(`API call`, { attempt, max_attempts: this.maxAttempts, model: req.model_id, target: ctx?.target_id, prompt_chars: body.length });
                }

                const res = await this.tryOnce(body, payload, req, attempt, ctx, idempotencyKey, signal);

                if (res.ok) {
                    this.breaker.recordSuccess();
                    if (this.debug) {
                        log.debug(`API success`, { latency_ms: res.provider.latencyMs, cost: res.costUsd, tokens: res.tokenUsage.totalTokens, finish: res.finish_reason });
                    }
                    return res;
                }

                if (res.retryable && attempt < this.maxAttempts) {
                    log.warn(`Retryable model error`, { attempt, code: res.errorCode, status: res.httpStatus, target: ctx?.target_id });
                    continue;
                }

                if (res.errorCode === "NETWORK_ERROR" || res.errorCode === "RATE_LIMIT" || res.errorCode === "INFRA_ERROR") {
                    this.breaker.recordFailure(Date.now());
                }
                return res;
            }

            return this.err("INFRA_ERROR", "Unreachable retry loop end", true, this.maxAttempts, null, null, req.model_id, ctx, idempotencyKey);
        } finally {
            this.limiter.releaseSlot();
        }
    }

    private async tryOnce(
        body: string,
        payload: ChatPayload,
        req: ModelRequest,
        attempt: number,
        ctx: CallContext | undefined,
        idempotencyKey: string,
        external?: AbortSignal
    ): Promise<ModelResponse | ModelRouterError> {
        if (external?.aborted) {
            return this.err("CANCELLED", "cancelled before request", false, attempt, null, null, req.model_id, ctx, idempotencyKey);
        }

        const timeoutMs = Math.min(req.timeout_ms ?? TIMEOUTS.MODEL_CALL_MS, TIMEOUTS.MODEL_CALL_MS);
        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), timeoutMs);
        const onExternalAbort = (): void => ac.abort();
        external?.addEventListener("abort", onExternalAbort, { once: true });

        const started = Date.now();

        try {
            const resp = await this.fetchImpl(this.endpoint, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "Authorization": `Bearer ${this.apiKey}`,
                    "X-Title": TOOL_NAME,
                },
                body,
                signal: ac.signal,
            });

            const latencyMs = Date.now() - started;
            const bodyText = await resp.text();

            if (!resp.ok) {
                const httpStatus = resp.status;
                return this.err(
                    httpStatus === 429 ? "RATE_LIMIT" : "INFRA_ERROR",
                    `Provider error ${httpStatus}`,
                    httpStatus >= 500 || httpStatus === 429,
                    attempt,
                    httpStatus,
                    bodyText,
                    req.model_id,
                    ctx,
                    idempotencyKey
                );
            }

            let data: unknown;
            try {
                data = JSON.parse(bodyText);
            } catch {
                return this.err("MODEL_ERROR", "provider_response_not_json", false, attempt, resp.status, bodyText, req.model_id, ctx, idempotencyKey);
            }

            const choices = field(data, "choices");
            const choice = Array.isArray(choices) ? choices[0] : undefined;
            const completion = asString(field(field(choice, "message"), "content")) ?? "";
            const finish_reason = asString(field(choice, "finish_reason"));

            const usage = field(data, "usage");
            const promptTokens = clampInt(field(usage, "prompt_tokens"));
            const completionTokens = clampInt(field(usage, "completion_tokens"));
            const tokenUsage = {
                promptTokens,
                completionTokens,
                totalTokens: clampInt(field(usage, "total_tokens")) || promptTokens + completionTokens,
            };

            return {
                ok: true,
                completion,
                finish_reason,
                tokenUsage,
                costUsd: estimateModelCost(req.model_id, promptTokens, completionTokens),
                provider: {
                    requestId: asString(field(data, "id")),
                    modelId: asString(field(data, "model")) ?? req.model_id,
                    latencyMs,
                },
                meta: {
                    idempotencyKey,
                    attemptNo: attempt,
                    promptHash: sha256Hex(JSON.stringify(payload.messages)),
                    responseHash: sha256Hex(completion),
                },
            };
        } catch (e) {
            if (external?.aborted) {
                return this.err("CANCELLED", "cancelled during request", false, attempt, null, null, req.model_id, ctx, idempotencyKey);
            }
            const isTimeout = e instanceof Error && e.name === "AbortError";
            const msg = isTimeout ? `timeout after ${timeoutMs}ms` : `network_error: ${e instanceof Error ? e.message : String(e)}`;
            return this.err("NETWORK_ERROR", msg, true, attempt, null, null, req.model_id, ctx, idempotencyKey);
        } finally {
            clearTimeout(tid);
            external?.removeEventListener("abort", onExternalAbort);
        }
    }

    private err(
        errorCode: ModelRouterErrorCode,
        message: string,
        retryable: boolean,
        attemptsUsed: number,
        httpStatus: number | null,
        providerBodySnippet: string | null,
        modelId: string,
        ctx?: CallContext,
        idempotencyKey?: string
    ): ModelRouterError {
        return {
            ok: false,
            errorCode,
            message: sanitizeErrorSnippet(message),
            retryable,
            attemptsUsed,
            httpStatus,
            providerBodySnippet: providerBodySnippet ? sanitizeErrorSnippet(providerBodySnippet) : null,
            meta: {
                idempotencyKey,
                modelId,
                buildId: ctx?.build_id ?? null,
                targetId: ctx?.target_id ?? null,
            },
        };
    }
}
