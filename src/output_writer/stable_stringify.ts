// src/output_writer/stable_stringify.ts

/**
 * Compact JSON with object keys sorted, so equal values always produce the
 * same text. Undefined object members are skipped, like JSON.stringify.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";
    const t = typeof value;

    if (t === "number") {
        if (typeof value === "number" && !Number.isFinite(value)) throw new Error("NON_FINITE_NUMBER");
        return JSON.stringify(value);
    }
    if (t === "boolean" || t === "string") return JSON.stringify(value);

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    if (typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)); // UTF-16 order like JS sort()
        return (
            "{" +
            entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") +
            "}"
        );
    }

    // undefined, function, symbol, bigint
    throw new Error("UNSUPPORTED_JSON_TYPE");
}
