// generate/openrouter_backend.ts — GeneratorBackend over an OpenAI-compatible chat API

import * as path from 'path';
import { GenerationError } from '../errors';
import { createLogger } from '../logger';
import { ModelMessage, ModelRouter } from '../model_router';
import { BUILD_MODULE_TEMPLATE, getBuildSystemPrompt } from '../prompts';
import { GenerateOptions, GeneratedModule, GeneratorBackend } from './backend';
import { ModuleSpecContext } from './context';
import { fmtKvBlock, renderTemplate, stripMarkdownFences } from './shared';

const log = createLogger('backend');

export interface OpenRouterBackendOptions {
    router: ModelRouter;
    model: string;
    maxOutputTokens?: number;
    temperature?: number;
    /** Extra instructions appended to the system prompt. */
    systemInstruction?: string;
    /** Replaces the default module template. */
    moduleTemplate?: string;
}

/** Relative import specifier from one generated module to another. */
export function importSpecifier(fromModule: string, toModule: string): string {
    const rel = path.posix.relative(path.posix.dirname(fromModule), toModule);
    return rel.startsWith('.') ? rel : `./${rel}`;
}

export function renderModulePrompt(ctx: ModuleSpecContext, template: string, errorContext: readonly string[]): string {
    const depModules = [...ctx.dependencyGeneratedModules].map(
        ([mod, src]) => [`${mod} (import from '${importSpecifier(ctx.specModule, mod)}')`, src] as const,
    );
    return renderTemplate(template, {
        generated_module: ctx.generatedModule,
        spec_module: ctx.specModule,
        expected_names: ctx.expectedNames.join(', '),
        spec_sources: fmtKvBlock(ctx.specSources),
        spec_prompts: fmtKvBlock(ctx.specPrompts),
        dependency_apis: fmtKvBlock(ctx.dependencyApis),
        dependency_modules: fmtKvBlock(depModules),
        shared_guidance: ctx.sharedGuidance.trim() || '(none)',
        error_context: errorContext.length > 0 ? errorContext.map((e) => `- ${e}`).join('\n') : '(none)',
    });
}

export class OpenRouterBackend extends GeneratorBackend {
    readonly providerName = 'openrouter';
    readonly modelName: string;
    private readonly router: ModelRouter;
    private readonly systemPrompt: string;
    private readonly moduleTemplate: string;
    private readonly maxOutputTokens?: number;
    private readonly temperature?: number;

    constructor(opts: OpenRouterBackendOptions) {
        super();
        this.router = opts.router;
        this.modelName = opts.model;
        this.systemPrompt = getBuildSystemPrompt(opts.systemInstruction ?? '');
        this.moduleTemplate = opts.moduleTemplate ?? BUILD_MODULE_TEMPLATE;
        this.maxOutputTokens = opts.maxOutputTokens;
        this.temperature = opts.temperature;
    }

    async generateModule(ctx: ModuleSpecContext, opts: GenerateOptions = {}): Promise<GeneratedModule> {
        const messages: ModelMessage[] = [
            { role: 'system', content: this.systemPrompt },
            { role: 'user', content: renderModulePrompt(ctx, this.moduleTemplate, opts.extraErrorContext ?? []) },
        ];

        const res = await this.router.executeModelCall(
            {
                model_id: this.modelName,
                messages,
                max_tokens: this.maxOutputTokens,
                temperature: this.temperature,
            },
            { target_id: ctx.specModule },
            opts.signal,
        );

        if (!res.ok) {
            log.warn('Model call failed', { module: ctx.specModule, code: res.errorCode, status: res.httpStatus });
            const detail = res.providerBodySnippet ? ` (${res.providerBodySnippet})` : '';
            throw new GenerationError(`${res.errorCode}: ${res.message}${detail}`);
        }

        if (res.finish_reason === 'length') {
            log.warn('Completion truncated at max tokens', { module: ctx.specModule });
        }

        return {
            source: stripMarkdownFences(res.completion),
            usage: {
                promptTokens: res.tokenUsage.promptTokens,
                completionTokens: res.tokenUsage.completionTokens,
                model: this.modelName,
                provider: this.providerName,
            },
        };
    }
}
