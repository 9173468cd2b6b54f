// validation.ts — structural checks on generated source

import { parseSource, syntaxErrors, topLevelNames } from './ts_source';

/**
 * Empty list means valid. Checks that the text parses and that every
 * expected name is declared at module top level.
 */
export function validateGeneratedSource(source: string, expectedNames: readonly string[]): string[] {
    if (source.trim() === '') return ['Generated source is empty.'];

    const syntax = syntaxErrors('generated.ts', source);
    if (syntax.length > 0) return syntax.map((e) => `Syntax error: ${e}`);

    const declared = topLevelNames(parseSource('generated.ts', source));
    const errors: string[] = [];
    for (const name of expectedNames) {
        if (!declared.has(name)) errors.push(`Missing top-level definition: ${name}`);
    }
    return errors;
}
