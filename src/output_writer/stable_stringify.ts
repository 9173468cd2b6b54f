// src/output_writer/stable_stringify.ts

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: JsonValue): string {
    if (value === null) return "null";

    if (typeof value === "number" || typeof value === "boolean" || typeof value === "string") {
        return JSON.stringify(value);
    }

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    const keys = Object.keys(value).sort(); // UTF-16 lex order like JS sort()
    return "{" + keys.map((k) => JSON.stringify(k) + ":" + stableStringify(value[k])).join(",") + "}";
}

export function mapToJson(map: ReadonlyMap<string, string>): { [key: string]: string } {
    const out: { [key: string]: string } = {};
    for (const [k, v] of map) out[k] = v;
    return out;
}
