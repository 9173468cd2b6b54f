// src/output_writer/header.ts

import { ArtifactKind, GeneratedHeader } from "./types";

export const GENERATED_MARKER = "// @generated by specforge. DO NOT EDIT.";
const FIELD_PREFIX = "// specforge:";

export function formatHeader(h: GeneratedHeader): string {
    return [
        GENERATED_MARKER,
        `${FIELD_PREFIX}tool_version=${h.toolVersion}`,
        `${FIELD_PREFIX}kind=${h.kind}`,
        `${FIELD_PREFIX}source_module=${h.sourceModule}`,
        `${FIELD_PREFIX}module_digest=${h.moduleDigest}`,
        `${FIELD_PREFIX}spec_refs=${JSON.stringify([...h.specRefs].sort())}`,
    ].join("\n") + "\n";
}

function parseRefs(raw: string): string[] | null {
    try {
        const v: unknown = JSON.parse(raw);
        if (Array.isArray(v) && v.every((x): x is string => typeof x === "string")) return v;
    } catch {
        return null;
    }
    return null;
}

/** Null when `text` does not start with a complete header. */
export function parseHeader(text: string): GeneratedHeader | null {
    const lines = text.split(/\r?\n/);
    if (lines[0] !== GENERATED_MARKER) return null;

    const fields = new Map<string, string>();
    for (const line of lines.slice(1)) {
        if (!line.startsWith(FIELD_PREFIX)) break;
        const body = line.slice(FIELD_PREFIX.length);
        const eq = body.indexOf("=");
        if (eq <= 0) continue;
        fields.set(body.slice(0, eq), body.slice(eq + 1));
    }

    const toolVersion = fields.get("tool_version");
    const kind = fields.get("kind");
    const sourceModule = fields.get("source_module");
    const moduleDigest = fields.get("module_digest");
    const specRefs = parseRefs(fields.get("spec_refs") ?? "");
    if (!toolVersion || !sourceModule || !moduleDigest || !specRefs) return null;
    if (kind !== "build" && kind !== "test") return null;

    const k: ArtifactKind = kind;
    return { toolVersion, kind: k, sourceModule, moduleDigest, specRefs };
}

export function extractModuleDigest(text: string): string | null {
    return parseHeader(text)?.moduleDigest ?? null;
}

/** Drop the header block so generated source can be fed back as context. */
export function stripHeader(text: string): string {
    const lines = text.split(/\r?\n/);
    if (lines[0] !== GENERATED_MARKER) return text;
    let i = 1;
    while (i < lines.length && lines[i].startsWith(FIELD_PREFIX)) i++;
    while (i < lines.length && lines[i].trim() === "") i++;
    return lines.slice(i).join("\n");
}
