// -----------------------------------------
// file: src/utils/normalize.ts
// -----------------------------------------
/**
 * Narrowing helpers for loosely-typed payloads (upstream JSON, DB rows)
 * plus the team-name token used to match names across sources.
 */

export type RawRecord = Record<string, unknown>;

export function isRecord(v: unknown): v is RawRecord {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Keep only the object entries of an array; anything else -> []. */
export function recordArray(v: unknown): RawRecord[] {
    return Array.isArray(v) ? v.filter(isRecord) : [];
}

/** Non-empty trimmed string, or null. Numbers are stringified. */
export function strOrNull(v: unknown): string | null {
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
    if (typeof v !== "string") return null;
    const s = v.trim();
    return s ? s : null;
}

/** Whole number from a number or an integer-looking string. */
export function intOrNull(v: unknown): number | null {
    if (typeof v === "number") return Number.isInteger(v) ? v : null;
    if (typeof v === "string" && /^\s*-?\d+\s*$/.test(v)) return parseInt(v, 10);
    return null;
}

/** Finite decimal from a number or numeric string. */
export function floatOrNull(v: unknown): number | null {
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    if (typeof v === "string" && v.trim() !== "") {
        const n = Number(v);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}

export function truthy(v: unknown): boolean {
    if (typeof v === "boolean") return v;
    if (typeof v === "number") return v !== 0;
    if (typeof v === "string") return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
    return false;
}

/** Lowercase and drop everything but a-z / 0-9: "Sea Eagles!" -> "seaeagles". */
export function normalizeNameToken(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Same team across sources when one normalized name contains the other,
 * e.g. "Manly Warringah Sea Eagles" vs "Sea Eagles".
 */
export function teamNamesMatch(a: string, b: string): boolean {
    const ta = normalizeNameToken(a);
    const tb = normalizeNameToken(b);
    if (!ta || !tb) return false;
    return ta.includes(tb) || tb.includes(ta);
}
