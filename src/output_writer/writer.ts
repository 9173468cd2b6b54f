// src/output_writer/writer.ts

import * as fs from "fs";
import * as path from "path";

import { GenerationError } from "../errors";
import { createLogger } from "../logger";
import { atomicWriteFileSync } from "./atomic_write";
import { formatHeader, GENERATED_MARKER } from "./header";
import { CleanParams, WriteModuleParams, WriteModuleResult } from "./types";
import { isContained, isPathTraversal } from "./validate";

const log = createLogger("writer");

export const GENERATED_ROOT_MARKER = "AGENTS.md";

const MARKER_TEXT = [
    "# Generated code",
    "",
    "Every `.ts` file under this directory is written by `specforge build`.",
    "Edit the `@forge` stubs in the source roots instead, then rebuild.",
    "",
].join("\n");

/** `<generatedDir>/<module>.ts`, posix separators. */
export function generatedRelPath(moduleName: string, generatedDir: string): string {
    return `${generatedDir}/${moduleName}.ts`;
}

export function generatedAbsPath(packageDir: string, generatedDir: string, moduleName: string): string {
    return path.join(packageDir, ...generatedRelPath(moduleName, generatedDir).split("/"));
}

function rejectSymlink(p: string): void {
    if (fs.existsSync(p) && fs.lstatSync(p).isSymbolicLink()) {
        throw new GenerationError(`Refusing to write through symlink ${p}.`);
    }
}

export function writeGeneratedModule(params: WriteModuleParams): WriteModuleResult {
    const { packageDir, generatedDir, moduleName, source, header } = params;
    const rel = generatedRelPath(moduleName, generatedDir);

    if (isPathTraversal(rel)) {
        throw new GenerationError(`Path traversal detected in generated path ${rel}.`);
    }
    const target = generatedAbsPath(packageDir, generatedDir, moduleName);
    if (!isContained(packageDir, target)) {
        throw new GenerationError(`Refusing to write ${target}: outside package root ${packageDir}.`);
    }

    const generatedRoot = path.join(packageDir, generatedDir);
    fs.mkdirSync(path.dirname(target), { recursive: true, mode: 0o755 });
    rejectSymlink(target);

    const marker = path.join(generatedRoot, GENERATED_ROOT_MARKER);
    if (!fs.existsSync(marker)) {
        atomicWriteFileSync({ filePath: marker, content: MARKER_TEXT });
    }

    const body = source.endsWith("\n") ? source : source + "\n";
    const content = formatHeader(header) + "\n" + body;
    const warnings: string[] = [];
    atomicWriteFileSync({ filePath: target, content, warnings });

    for (const w of warnings) log.debug(w, { module: moduleName });
    return { path: target, bytes: Buffer.byteLength(content, "utf8"), warnings };
}

/** Read a previously written artifact; null when missing or unreadable. */
export function readGeneratedModule(packageDir: string, generatedDir: string, moduleName: string): string | null {
    try {
        return fs.readFileSync(generatedAbsPath(packageDir, generatedDir, moduleName), "utf8");
    } catch (e) {
        log.debug("Artifact not readable", { module: moduleName, error: e instanceof Error ? e.message : String(e) });
        return null;
    }
}

function isOurs(dir: string): boolean {
    if (fs.existsSync(path.join(dir, GENERATED_ROOT_MARKER))) return true;
    // fall back to sniffing one generated file
    const stack = [dir];
    while (stack.length > 0) {
        const cur = stack.pop();
        if (cur === undefined) break;
        for (const ent of fs.readdirSync(cur, { withFileTypes: true })) {
            const full = path.join(cur, ent.name);
            if (ent.isDirectory()) stack.push(full);
            else if (ent.name.endsWith(".ts")) {
                return fs.readFileSync(full, "utf8").startsWith(GENERATED_MARKER);
            }
        }
    }
    return false;
}

/** Remove each root's generated directory. Returns the directories removed (or that would be). */
export function cleanGeneratedDirs(params: CleanParams): string[] {
    const removed: string[] = [];
    for (const root of params.roots) {
        const dir = path.join(root, params.generatedDir);
        if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) continue;
        if (!isOurs(dir)) {
            log.warn("Skipping directory without generated marker", { dir });
            continue;
        }
        removed.push(dir);
        if (!params.dryRun) fs.rmSync(dir, { recursive: true, force: true });
    }
    return removed;
}
