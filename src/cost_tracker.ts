/**
 * CostTracker — token usage and estimated spend for one build.
 *
 * The scheduler calls checkBudget() after each batch of completions, not
 * before each dispatch, so a build may overshoot its ceiling by whatever
 * one in-flight batch costs.
 */

import { estimateModelCost } from './config';
import { BudgetExceededError } from './errors';
import { createLogger } from './logger';

const log = createLogger('cost');

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    model: string;
    provider: string;
}

export interface UsageRecord {
    module: string;
    usage: TokenUsage;
    costUsd: number;
    timestamp: string;
}

export interface CostSummary {
    api_calls: number;
    cache_hits: number;
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
    estimated_cost_usd: number;
    budget_usd: number | null;
}

export class CostTracker {
    private records: UsageRecord[] = [];
    private hits = 0;

    constructor(public readonly maxCostUsd?: number) {}

    record(module: string, usage: TokenUsage): void {
        const costUsd = estimateModelCost(usage.model, usage.promptTokens, usage.completionTokens);
        this.records.push({ module, usage: { ...usage }, costUsd, timestamp: new Date().toISOString() });
        log.debug('Usage recorded', { module, model: usage.model, cost: costUsd, cumulative: this.estimatedCost });
    }

    recordCacheHit(): void {
        this.hits++;
    }

    get totalPromptTokens(): number {
        return this.records.reduce((n, r) => n + r.usage.promptTokens, 0);
    }

    get totalCompletionTokens(): number {
        return this.records.reduce((n, r) => n + r.usage.completionTokens, 0);
    }

    get totalTokens(): number {
        return this.totalPromptTokens + this.totalCompletionTokens;
    }

    get estimatedCost(): number {
        return this.records.reduce((n, r) => n + r.costUsd, 0);
    }

    get apiCalls(): number {
        return this.records.length;
    }

    get cacheHits(): number {
        return this.hits;
    }

    /** Throws BudgetExceededError once spend is strictly above the ceiling. */
    checkBudget(): void {
        if (this.maxCostUsd === undefined) return;
        const spent = this.estimatedCost;
        if (spent > this.maxCostUsd) {
            log.error('Budget exceeded', { spent, budget: this.maxCostUsd });
            throw new BudgetExceededError(spent, this.maxCostUsd);
        }
    }

    /** Copy of the spend ledger, in record order. */
    ledger(): UsageRecord[] {
        return this.records.map((r) => ({ ...r, usage: { ...r.usage } }));
    }

    summary(): CostSummary {
        return {
            api_calls: this.apiCalls,
            cache_hits: this.cacheHits,
            prompt_tokens: this.totalPromptTokens,
            completion_tokens: this.totalCompletionTokens,
            total_tokens: this.totalTokens,
            estimated_cost_usd: Math.round(this.estimatedCost * 1e6) / 1e6,
            budget_usd: this.maxCostUsd ?? null,
        };
    }

    formatSummary(): string {
        const fmt = (n: number): string => n.toLocaleString('en-US');
        const lines = [
            `Cost: ${this.apiCalls} API call(s), ${this.cacheHits} cache hit(s)`,
            `  Tokens: ${fmt(this.totalPromptTokens)} prompt + ${fmt(this.totalCompletionTokens)} completion = ${fmt(this.totalTokens)} total`,
            `  Estimated cost: $${this.estimatedCost.toFixed(4)}`,
        ];
        if (this.maxCostUsd !== undefined) lines.push(`  Budget limit: $${this.maxCostUsd.toFixed(4)}`);
        return lines.join('\n');
    }
}
