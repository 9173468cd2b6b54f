/**
 * GeneratorBackend — the capability the scheduler drives.
 *
 * Providers implement `generateModule`; `generateWithRetry` is shared and
 * deterministic: validate, and on failure retry with the previous errors
 * appended to the prompt context.
 */

import type { TokenUsage } from '../cost_tracker';
import { validateGeneratedSource } from '../validation';
import type { ModuleSpecContext } from './context';

export type ExtraValidator = (source: string) => string[] | Promise<string[]>;

export interface GenerateOptions {
    /** Accumulated "previous output errors: ..." lines from earlier attempts. */
    extraErrorContext?: readonly string[];
    signal?: AbortSignal;
}

export interface GeneratedModule {
    source: string;
    usage?: TokenUsage;
}

export interface RetryOptions {
    maxAttempts?: number;
    extraValidator?: ExtraValidator;
    signal?: AbortSignal;
}

export interface GenerationResult {
    attempts: number;
    /** Last attempt's source, valid or not; undefined when nothing came back. */
    source?: string;
    errors: string[];
    usage?: TokenUsage;
}

export abstract class GeneratorBackend {
    abstract readonly modelName: string;
    abstract readonly providerName: string;

    /** Throws GenerationError on an unrecoverable provider failure. */
    abstract generateModule(ctx: ModuleSpecContext, opts?: GenerateOptions): Promise<GeneratedModule>;

    async generateWithRetry(ctx: ModuleSpecContext, opts: RetryOptions = {}): Promise<GenerationResult> {
        const maxAttempts = Math.max(1, opts.maxAttempts ?? 2);
        let attempts = 0;
        let lastSource: string | undefined;
        let lastErrors: string[] = [];
        let extra: string[] = [];
        let promptTokens = 0;
        let completionTokens = 0;

        const aggregate = (): TokenUsage | undefined =>
            promptTokens || completionTokens
                ? { promptTokens, completionTokens, model: this.modelName, provider: this.providerName }
                : undefined;

        while (attempts < maxAttempts) {
            opts.signal?.throwIfAborted();
            attempts++;

            const out = await this.generateModule(ctx, {
                extraErrorContext: extra.length > 0 ? [...extra] : undefined,
                signal: opts.signal,
            });
            lastSource = out.source;
            if (out.usage) {
                promptTokens += out.usage.promptTokens;
                completionTokens += out.usage.completionTokens;
            }

            lastErrors = validateGeneratedSource(lastSource, ctx.expectedNames);
            if (lastErrors.length === 0 && opts.extraValidator) {
                lastErrors = await opts.extraValidator(lastSource);
            }
            if (lastErrors.length === 0) {
                return { attempts, source: lastSource, errors: [], usage: aggregate() };
            }

            extra = extra.concat(lastErrors.map((e) => `previous output errors: ${e}`));
        }

        return { attempts, source: lastSource, errors: lastErrors, usage: aggregate() };
    }
}
