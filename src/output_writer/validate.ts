// src/output_writer/validate.ts

import * as path from "path";

export function isPathTraversal(relPath: string): boolean {
    // reject absolute unix or windows drive
    if (path.isAbsolute(relPath)) return true;
    if (/^[a-zA-Z]:[\\/]/.test(relPath)) return true;

    return relPath.split(/[\\/]+/).some((p) => p === "..");
}

/** True when `target` resolves to `root` itself or somewhere beneath it. */
export function isContained(root: string, target: string): boolean {
    const rel = path.relative(path.resolve(root), path.resolve(target));
    return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
