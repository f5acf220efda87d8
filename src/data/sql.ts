import { parseUtc } from "../utils/date";

// Build "?, ?, ?" placeholder list
export function placeholders(n: number) {
    return Array.from({ length: n }, () => "?").join(",");
}

// --- Column readers: mysql2 rows are loosely typed, narrow them here.

/** DATETIME column (Date from mysql2, or string) -> ISO-8601 UTC. */
export function isoCol(v: unknown): string | null {
    if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
    if (typeof v === "string") return parseUtc(v)?.toISOString() ?? null;
    return null;
}

export function reqIsoCol(v: unknown, column: string): string {
    const iso = isoCol(v);
    if (iso === null) throw new Error(`Column ${column} is not a valid datetime`);
    return iso;
}

export function intCol(v: unknown): number | null {
    if (typeof v === "number" && Number.isFinite(v)) return Math.trunc(v);
    if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Math.trunc(Number(v));
    return null;
}

export function reqIntCol(v: unknown, column: string): number {
    const n = intCol(v);
    if (n === null) throw new Error(`Column ${column} is not a number`);
    return n;
}

export function floatCol(v: unknown): number | null {
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    if (typeof v === "string" && v.trim() !== "") {
        const n = Number(v);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}

export function strCol(v: unknown): string | null {
    if (typeof v === "string") return v;
    if (typeof v === "number") return String(v);
    return null;
}

/** TINYINT(1) / BOOLEAN */
export function boolCol(v: unknown): boolean {
    return v === 1 || v === true || v === "1";
}
