export const unixNow = () => BigInt(Math.floor(Date.now() / 1000));

export function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) throw new Error(`${name} is not set`);
    return value;
}

// JSON-safe copy with bigints as decimal strings.
export function toJsonSafe(value: unknown): unknown {
    if (typeof value === "bigint") return value.toString();
    if (value instanceof Map) return Object.fromEntries([...value].map(([k, v]) => [String(k), toJsonSafe(v)]));
    if (value instanceof Set) return [...value].map(toJsonSafe);
    if (Array.isArray(value)) return value.map(toJsonSafe);
    if (value !== null && typeof value === "object") {
        return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJsonSafe(v)]));
    }
    return value;
}
