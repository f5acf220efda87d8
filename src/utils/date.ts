// src/utils/date.ts
/**
 * Date/time helpers for the backend.
 *
 * Note:
 * - Everything is stored and compared as UTC.
 * - Source timestamps without an offset are read as UTC, never as server-local time.
 */

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Parse an ISO-ish timestamp (or Date) as UTC; null when unparseable. */
export function parseUtc(input: string | Date | null | undefined): Date | null {
    if (input == null) return null;
    if (input instanceof Date) return Number.isNaN(input.getTime()) ? null : input;

    let s = input.trim();
    if (!s) return null;
    if (/^\d{4}-\d{2}-\d{2} \d{2}:/.test(s)) s = s.replace(" ", "T");
    if (s.includes("T") && !HAS_ZONE.test(s)) s = `${s}Z`;

    const d = new Date(s);
    return Number.isNaN(d.getTime()) ? null : d;
}

export function addMinutes(d: Date, minutes: number): Date {
    return new Date(d.getTime() + minutes * 60_000);
}
