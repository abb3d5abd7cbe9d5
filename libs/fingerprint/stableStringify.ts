/**
 * Canonical JSON: object keys sorted at every depth (UTF-16 order, as
 * Array.prototype.sort), no whitespace. Undefined object members are
 * dropped, as JSON.stringify drops them.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";

    if (typeof value === "number") {
        if (!Number.isFinite(value)) throw new Error("UNSUPPORTED_JSON_NUMBER");
        return JSON.stringify(value);
    }
    if (typeof value === "boolean" || typeof value === "string") return JSON.stringify(value);

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    if (typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, member]) => member !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return (
            "{" +
            entries.map(([k, member]) => JSON.stringify(k) + ":" + stableStringify(member)).join(",") +
            "}"
        );
    }

    // undefined, function, symbol, bigint
    throw new Error(`UNSUPPORTED_JSON_TYPE: ${typeof value}`);
}
