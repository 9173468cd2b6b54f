// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

export function errnoOf(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function fsyncPath(p: string, flags: string, mode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(p, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoOf(e);
        if (mode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        // directories cannot be opened for fsync on every platform
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${p}`);
    }
}

/**
 * Write via a temp file in the destination directory, fsync, rename into
 * place, then fsync the directory. Readers see the old file or the new one.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode?: number;
    fsyncMode?: FsyncMode;
    warnings?: string[];
}): void {
    const { filePath, content } = params;
    const mode = params.mode ?? 0o644;
    const fsyncMode = params.fsyncMode ?? "BEST_EFFORT";
    const warnings = params.warnings ?? [];

    const dir = path.dirname(filePath);
    const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString("hex")}`);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        fsyncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        try {
            if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        } catch (cleanupErr) {
            warnings.push(`TMP_CLEANUP_FAILED(${errnoOf(cleanupErr) || "UNKNOWN"}) on ${tmp}`);
        }
        throw e;
    }
}
