// src/utils/locking.ts
import { addMinutes, parseUtc } from "./date";
import { ValidationError } from "./errors";

export const DEFAULT_LOCK_MINUTES = 5;

function kickoffDate(kickoff: string | Date): Date {
    const d = parseUtc(kickoff);
    if (!d) throw new ValidationError(`Invalid kickoff time: ${String(kickoff)}`);
    return d;
}

/** Instant after which a fixture no longer accepts user tips. */
export function lockDeadline(kickoff: string | Date, lockMinutes = DEFAULT_LOCK_MINUTES): Date {
    return addMinutes(kickoffDate(kickoff), -Math.max(0, Math.trunc(lockMinutes)));
}

/** Inclusive boundary: locked exactly at `kickoff - lockMinutes`. */
export function isLocked(kickoff: string | Date, now: Date, lockMinutes = DEFAULT_LOCK_MINUTES): boolean {
    return now.getTime() >= lockDeadline(kickoff, lockMinutes).getTime();
}

/**
 * Whole-round view: a round counts as locked once its earliest fixture locks.
 * Display only; per-fixture locking decides what can be tipped.
 */
export function isRoundLocked(
    kickoffs: Array<string | Date>,
    now: Date,
    lockMinutes = DEFAULT_LOCK_MINUTES
): boolean {
    if (kickoffs.length === 0) return false;
    const earliest = kickoffs
        .map(kickoffDate)
        .reduce((min, d) => (d.getTime() < min.getTime() ? d : min));
    return isLocked(earliest, now, lockMinutes);
}
