/**
 * ResponseCache — content-addressed store of previous generations.
 *
 * Keys hash the full generation context plus model and provider identity.
 * Reads go through a bounded in-process memo (lru-cache), then a CacheStore.
 * Persistent reads that fail count as misses and writes that fail are
 * logged at debug; the cache never fails a build.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { LRUCache } from 'lru-cache';

import type { ModuleSpecContext } from './generate/context';
import { createLogger } from './logger';
import { atomicWriteFileSync } from './output_writer/atomic_write';
import { mapToJson, stableStringify } from './output_writer/stable_stringify';

const log = createLogger('cache');

export interface CacheEntry {
    source: string;
    promptTokens: number;
    completionTokens: number;
    model: string;
    provider: string;
    /** Epoch seconds. */
    cachedAt: number;
}

export interface CacheInfo {
    backend: 'file' | 'sqlite';
    path: string;
    entries: number;
    sizeBytes: number;
    enabled: boolean;
    hits: number;
    misses: number;
}

const KEY_RE = /^[0-9a-f]{64}$/;

/**
 * 64-hex sha256 over NUL-separated fields. Every field is JSON-encoded, so a
 * raw NUL never appears inside one; maps are serialised with sorted keys.
 */
export function cacheKeyFromContext(ctx: ModuleSpecContext, id: { model: string; provider: string }): string {
    const fields = [
        stableStringify(id.provider),
        stableStringify(id.model),
        stableStringify(ctx.kind),
        stableStringify(ctx.specModule),
        stableStringify(ctx.generatedModule),
        stableStringify([...ctx.expectedNames].sort()),
        stableStringify(mapToJson(ctx.specSources)),
        stableStringify(mapToJson(ctx.specPrompts)),
        stableStringify(mapToJson(ctx.dependencyApis)),
        stableStringify(mapToJson(ctx.dependencyGeneratedModules)),
        stableStringify(ctx.sharedGuidance),
    ];
    const h = crypto.createHash('sha256');
    fields.forEach((f, i) => {
        if (i > 0) h.update('\0');
        h.update(f, 'utf8');
    });
    return h.digest('hex');
}

/** Null for anything that is not a well-formed entry. */
export function parseCacheEntry(raw: unknown): CacheEntry | null {
    if (typeof raw !== 'object' || raw === null) return null;
    const get = (k: string): unknown => Object.getOwnPropertyDescriptor(raw, k)?.value;
    const source = get('source');
    if (typeof source !== 'string') return null;
    const num = (k: string): number => {
        const v = get(k);
        return typeof v === 'number' && Number.isFinite(v) ? v : 0;
    };
    const str = (k: string): string => {
        const v = get(k);
        return typeof v === 'string' ? v : '';
    };
    return {
        source,
        promptTokens: num('prompt_tokens'),
        completionTokens: num('completion_tokens'),
        model: str('model'),
        provider: str('provider'),
        cachedAt: num('cached_at'),
    };
}

function serialiseEntry(e: CacheEntry): string {
    return JSON.stringify({
        source: e.source,
        prompt_tokens: e.promptTokens,
        completion_tokens: e.completionTokens,
        model: e.model,
        provider: e.provider,
        cached_at: e.cachedAt,
    });
}

/* -------------------------------------------------------------------------- */
/* Stores                                                                     */
/* -------------------------------------------------------------------------- */

export interface CacheStore {
    readonly kind: 'file' | 'sqlite';
    readonly location: string;
    /** Raw stored text, or null when absent. May throw on I/O failure. */
    read(key: string): string | null;
    write(key: string, text: string): void;
    /** Number of entries removed. */
    clear(): number;
    stats(): { entries: number; sizeBytes: number };
    close(): void;
}

/** `<dir>/<first two hex chars>/<key>.json` */
export class FileCacheStore implements CacheStore {
    readonly kind = 'file';

    constructor(public readonly location: string) {}

    private entryPath(key: string): string {
        return path.join(this.location, key.slice(0, 2), `${key}.json`);
    }

    read(key: string): string | null {
        const p = this.entryPath(key);
        if (!fs.existsSync(p)) return null;
        return fs.readFileSync(p, 'utf8');
    }

    write(key: string, text: string): void {
        atomicWriteFileSync({ filePath: this.entryPath(key), content: text });
    }

    private files(): string[] {
        if (!fs.existsSync(this.location)) return [];
        const out: string[] = [];
        for (const shard of fs.readdirSync(this.location, { withFileTypes: true })) {
            if (!shard.isDirectory()) continue;
            const dir = path.join(this.location, shard.name);
            for (const f of fs.readdirSync(dir)) {
                if (f.endsWith('.json')) out.push(path.join(dir, f));
            }
        }
        return out;
    }

    clear(): number {
        const n = this.files().length;
        fs.rmSync(this.location, { recursive: true, force: true });
        return n;
    }

    stats(): { entries: number; sizeBytes: number } {
        let sizeBytes = 0;
        const files = this.files();
        for (const f of files) sizeBytes += fs.statSync(f).size;
        return { entries: files.length, sizeBytes };
    }

    close(): void {
        // nothing held open
    }
}

interface EntryRow {
    value: string;
}

interface StatsRow {
    entries: number;
    size: number | null;
}

/** Single-table SQLite store (WAL). */
export class SqliteCacheStore implements CacheStore {
    readonly kind = 'sqlite';
    private db: Database.Database;
    private selectStmt: Database.Statement<[string], EntryRow>;
    private upsertStmt: Database.Statement<[string, string, number]>;

    constructor(public readonly location: string) {
        fs.mkdirSync(path.dirname(location), { recursive: true });
        this.db = new Database(location);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS cache_entries (
                key        TEXT PRIMARY KEY,
                value      TEXT NOT NULL,
                created_at INTEGER NOT NULL
            )
        `);
        this.selectStmt = this.db.prepare<[string], EntryRow>('SELECT value FROM cache_entries WHERE key = ?');
        this.upsertStmt = this.db.prepare<[string, string, number]>(
            'INSERT OR REPLACE INTO cache_entries (key, value, created_at) VALUES (?, ?, ?)',
        );
    }

    read(key: string): string | null {
        return this.selectStmt.get(key)?.value ?? null;
    }

    write(key: string, text: string): void {
        this.upsertStmt.run(key, text, Date.now());
    }

    clear(): number {
        return this.db.prepare('DELETE FROM cache_entries').run().changes;
    }

    stats(): { entries: number; sizeBytes: number } {
        const row = this.db
            .prepare<[], StatsRow>('SELECT COUNT(*) AS entries, SUM(LENGTH(value)) AS size FROM cache_entries')
            .get();
        return { entries: row?.entries ?? 0, sizeBytes: row?.size ?? 0 };
    }

    close(): void {
        this.db.close();
    }
}

/* -------------------------------------------------------------------------- */
/* Cache                                                                      */
/* -------------------------------------------------------------------------- */

export interface ResponseCacheOptions {
    enabled?: boolean;
    /** Max bytes of source held in the in-process memo. */
    memoSize?: number;
}

export class ResponseCache {
    readonly enabled: boolean;
    private memo: LRUCache<string, CacheEntry>;
    private _hits = 0;
    private _misses = 0;

    constructor(
        private readonly store: CacheStore,
        opts: ResponseCacheOptions = {},
    ) {
        this.enabled = opts.enabled ?? true;
        this.memo = new LRUCache<string, CacheEntry>({
            maxSize: opts.memoSize ?? 64 * 1024 * 1024,
            sizeCalculation: (e) => Math.max(1, e.source.length),
        });
    }

    get hits(): number {
        return this._hits;
    }

    get misses(): number {
        return this._misses;
    }

    get(key: string): CacheEntry | null {
        if (!this.enabled || !KEY_RE.test(key)) {
            this._misses++;
            return null;
        }

        const memo = this.memo.get(key);
        if (memo) {
            this._hits++;
            return memo;
        }

        let entry: CacheEntry | null = null;
        try {
            const text = this.store.read(key);
            entry = text === null ? null : parseCacheEntry(JSON.parse(text));
        } catch (e) {
            log.debug('Cache read failed', { key: key.slice(0, 12), error: e instanceof Error ? e.message : String(e) });
            entry = null;
        }

        if (!entry) {
            this._misses++;
            return null;
        }
        this.memo.set(key, entry);
        this._hits++;
        return entry;
    }

    put(key: string, entry: CacheEntry): void {
        if (!this.enabled || !KEY_RE.test(key)) return;
        this.memo.set(key, entry);
        try {
            this.store.write(key, serialiseEntry(entry));
        } catch (e) {
            log.debug('Cache write failed', { key: key.slice(0, 12), error: e instanceof Error ? e.message : String(e) });
        }
    }

    /** Removes every persisted entry; returns how many there were. */
    clear(): number {
        this.memo.clear();
        return this.store.clear();
    }

    info(): CacheInfo {
        const { entries, sizeBytes } = this.store.stats();
        return {
            backend: this.store.kind,
            path: this.store.location,
            entries,
            sizeBytes,
            enabled: this.enabled,
            hits: this._hits,
            misses: this._misses,
        };
    }

    close(): void {
        this.store.close();
    }
}

export function openCacheStore(kind: 'file' | 'sqlite', dir: string): CacheStore {
    return kind === 'sqlite' ? new SqliteCacheStore(path.join(dir, 'cache.sqlite')) : new FileCacheStore(dir);
}
