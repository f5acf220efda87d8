// src/utils/parse.ts
import { RawRecord, isRecord } from "./normalize";

/** Parse a value into number if finite; otherwise undefined. */
export function parseNumber(v: unknown): number | undefined {
    if (v === undefined || v === null || v === "") return undefined;
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
}

/** Whole numbers only (query params, route params, body fields). */
export function parseIntParam(v: unknown): number | undefined {
    const n = parseNumber(v);
    return n !== undefined && Number.isInteger(n) ? n : undefined;
}

export function parseBool(v: unknown, d = false): boolean {
    if (typeof v === "boolean") return v;
    if (typeof v === "string") {
        const s = v.trim().toLowerCase();
        if (["1", "true", "yes", "on"].includes(s)) return true;
        if (["0", "false", "no", "off"].includes(s)) return false;
    }
    return d;
}

/** Request bodies arrive untyped; anything but a JSON object reads as {}. */
export function bodyOf(v: unknown): RawRecord {
    return isRecord(v) ? v : {};
}
