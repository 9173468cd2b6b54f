// generate/shared.ts — helpers shared by generation backends

/** Replace `{{name}}` placeholders. Unknown placeholders are left as-is. */
export function renderTemplate(text: string, mapping: Readonly<Record<string, string>>): string {
    let rendered = text;
    for (const [key, value] of Object.entries(mapping)) {
        rendered = rendered.split(`{{${key}}}`).join(value);
    }
    return rendered;
}

const FENCE_RE = /^\s*```[a-zA-Z0-9_-]*[ \t]*\n([\s\S]*)\n\s*```\s*$/;

/** Unwrap a reply that is one fenced code block; otherwise just trim it. */
export function stripMarkdownFences(text: string): string {
    const m = FENCE_RE.exec(text);
    return (m ? m[1] : text).trim();
}

export function fmtKvBlock(items: Iterable<readonly [string, string]>, empty = '(none)'): string {
    const chunks: string[] = [];
    for (const [key, value] of items) chunks.push(`// ${key}\n${value.trimEnd()}\n`);
    if (chunks.length === 0) return empty;
    return chunks.join('\n').trimEnd() + '\n';
}
