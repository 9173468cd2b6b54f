/**
 * Thin helpers over the TypeScript compiler API: syntax diagnostics,
 * top-level declarations and identifier scans. Used by discovery,
 * dependency inference and the structural validator.
 */

import * as ts from 'typescript';

export function parseSource(fileName: string, text: string): ts.SourceFile {
    return ts.createSourceFile(fileName, text, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
}

/** Syntax-only diagnostics, formatted as `L<line>: <message>`. */
export function syntaxErrors(fileName: string, text: string): string[] {
    const res = ts.transpileModule(text, {
        fileName,
        reportDiagnostics: true,
        compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.CommonJS },
    });
    const errors: string[] = [];
    for (const d of res.diagnostics ?? []) {
        const msg = ts.flattenDiagnosticMessageText(d.messageText, '\n');
        if (d.file && d.start !== undefined) {
            const { line } = d.file.getLineAndCharacterOfPosition(d.start);
            errors.push(`L${line + 1}: ${msg}`);
        } else {
            errors.push(msg);
        }
    }
    return errors;
}

function bindingNames(name: ts.BindingName, out: Set<string>): void {
    if (ts.isIdentifier(name)) {
        out.add(name.text);
        return;
    }
    for (const el of name.elements) {
        if (ts.isBindingElement(el)) bindingNames(el.name, out);
    }
}

/** Names declared or re-exported at the top level of a module. */
export function topLevelNames(sf: ts.SourceFile): Set<string> {
    const names = new Set<string>();
    for (const st of sf.statements) {
        if (
            (ts.isFunctionDeclaration(st) ||
                ts.isClassDeclaration(st) ||
                ts.isInterfaceDeclaration(st) ||
                ts.isTypeAliasDeclaration(st) ||
                ts.isEnumDeclaration(st)) &&
            st.name
        ) {
            names.add(st.name.text);
        } else if (ts.isVariableStatement(st)) {
            for (const decl of st.declarationList.declarations) bindingNames(decl.name, names);
        } else if (ts.isModuleDeclaration(st) && ts.isIdentifier(st.name)) {
            names.add(st.name.text);
        } else if (ts.isExportDeclaration(st) && st.exportClause && ts.isNamedExports(st.exportClause)) {
            for (const spec of st.exportClause.elements) names.add(spec.name.text);
        }
    }
    return names;
}

export function hasExportModifier(node: ts.Node): boolean {
    if (!ts.canHaveModifiers(node)) return false;
    return (ts.getModifiers(node) ?? []).some((m) => m.kind === ts.SyntaxKind.ExportKeyword);
}

/** Every identifier text that appears anywhere in `text`. */
export function identifiersIn(text: string): Set<string> {
    const sf = parseSource('fragment.ts', text);
    const out = new Set<string>();
    const visit = (node: ts.Node): void => {
        if (ts.isIdentifier(node)) out.add(node.text);
        ts.forEachChild(node, visit);
    };
    visit(sf);
    return out;
}

export interface JsDocTag {
    name: string;
    text: string;
}

/** JSDoc tags attached to a declaration, with their comment text trimmed. */
export function jsDocTags(node: ts.Node): JsDocTag[] {
    return ts.getJSDocTags(node).map((tag) => ({
        name: tag.tagName.text,
        text: (ts.getTextOfJSDocComment(tag.comment) ?? '').trim(),
    }));
}
