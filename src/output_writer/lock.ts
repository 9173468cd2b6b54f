// src/output_writer/lock.ts

import * as fs from "fs";
import * as path from "path";

import { BuildLockedError } from "../errors";
import { errnoOf } from "./atomic_write";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

interface LockIdentity {
    pid?: number;
    started_ms?: number;
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    return Math.min(50 * Math.pow(2, attempt), 1000);
}

function readIdentity(lockPath: string): LockIdentity | null {
    try {
        const v: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
        if (typeof v !== "object" || v === null) return null;
        const pid = "pid" in v && typeof v.pid === "number" ? v.pid : undefined;
        const started = "started_ms" in v && typeof v.started_ms === "number" ? v.started_ms : undefined;
        return { pid, started_ms: started };
    } catch {
        return null;
    }
}

function pidAlive(pid: number): boolean {
    try {
        // signal 0 only probes for existence
        process.kill(pid, 0);
        return true;
    } catch (e) {
        return errnoOf(e) === "EPERM";
    }
}

function removeIfPresent(p: string): void {
    try {
        fs.unlinkSync(p);
    } catch (e) {
        if (errnoOf(e) !== "ENOENT") throw e;
    }
}

/**
 * Exclusive per-project build lock (O_CREAT | O_EXCL). A lock whose owner
 * is dead, or older than `staleTtlMs`, is taken over.
 */
export async function acquireBuildLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    identity: Record<string, string | number>;
    staleTtlMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings } = params;
    const staleMs = params.staleTtlMs ?? 600_000;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    for (;;) {
        try {
            const fd = fs.openSync(lockPath, "wx");
            fs.writeSync(
                fd,
                JSON.stringify({ ...params.identity, pid: process.pid, started_ms: Date.now() }, null, 2),
            );
            return { fd, lockPath };
        } catch (e) {
            if (errnoOf(e) !== "EEXIST") throw e;
        }

        const held = readIdentity(lockPath);
        if (held === null) {
            warnings.push(`STALE_LOCK(UNREADABLE) ${lockPath}`);
            removeIfPresent(lockPath);
            continue;
        }
        if (held.pid !== undefined && !pidAlive(held.pid)) {
            warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${held.pid}`);
            removeIfPresent(lockPath);
            continue;
        }
        const age = Date.now() - (held.started_ms ?? 0);
        if (age > staleMs) {
            warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${age}ms`);
            removeIfPresent(lockPath);
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new BuildLockedError(lockPath, held.pid);
        }

        const wait = backoff(attempt++);
        warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
        await sleep(wait);
    }
}

export function releaseBuildLock(handle: LockHandle): void {
    fs.closeSync(handle.fd);
    removeIfPresent(handle.lockPath);
}
