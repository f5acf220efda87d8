// src/utils/timezone.ts
/**
 * Local-time handling for display and for the ladder prediction deadline.
 *
 * The provider is resolved once at startup from APP_TIMEZONE. When the
 * runtime has no tz database entry for the zone we fall back to a fixed
 * UTC offset (APP_TIMEZONE_FALLBACK_OFFSET_MINUTES, default +10:00).
 */

export interface LocalDateTime {
    year: number;
    month: number; // 1-12
    day: number;
    hour: number;
    minute: number;
}

export interface TimezoneProvider {
    /** IANA zone name, or "UTC+hh:mm" for the fixed-offset fallback. */
    readonly zone: string;
    readonly isFallback: boolean;
    offsetMinutesAt(instant: Date): number;
    toLocal(instant: Date): LocalDateTime;
    localToUtc(local: LocalDateTime): Date;
    format(instant: Date): string;
}

export const DEFAULT_TIMEZONE = "Australia/Sydney";
export const DEFAULT_FALLBACK_OFFSET_MINUTES = 600;

const z2 = (n: number) => (n < 10 ? `0${n}` : `${n}`);

function offsetLabel(offsetMinutes: number): string {
    const sign = offsetMinutes < 0 ? "-" : "+";
    const abs = Math.abs(offsetMinutes);
    return `UTC${sign}${z2(Math.floor(abs / 60))}:${z2(abs % 60)}`;
}

function localFromShifted(shifted: Date): LocalDateTime {
    return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
        hour: shifted.getUTCHours(),
        minute: shifted.getUTCMinutes(),
    };
}

function wallClockMs(l: LocalDateTime): number {
    return Date.UTC(l.year, l.month - 1, l.day, l.hour, l.minute);
}

function formatLocal(l: LocalDateTime, label: string): string {
    const h12 = l.hour % 12 === 0 ? 12 : l.hour % 12;
    const ampm = l.hour < 12 ? "AM" : "PM";
    return `${l.year}-${z2(l.month)}-${z2(l.day)} ${z2(h12)}:${z2(l.minute)} ${ampm} ${label}`;
}

class FixedOffsetTimezone implements TimezoneProvider {
    readonly isFallback = true;
    readonly zone: string;

    constructor(private readonly offsetMinutes: number) {
        this.zone = offsetLabel(offsetMinutes);
    }

    offsetMinutesAt(): number {
        return this.offsetMinutes;
    }

    toLocal(instant: Date): LocalDateTime {
        return localFromShifted(new Date(instant.getTime() + this.offsetMinutes * 60_000));
    }

    localToUtc(local: LocalDateTime): Date {
        return new Date(wallClockMs(local) - this.offsetMinutes * 60_000);
    }

    format(instant: Date): string {
        return formatLocal(this.toLocal(instant), this.zone);
    }
}

class IanaTimezone implements TimezoneProvider {
    readonly isFallback = false;
    private readonly parts: Intl.DateTimeFormat;
    private readonly names: Intl.DateTimeFormat;

    constructor(readonly zone: string) {
        this.parts = new Intl.DateTimeFormat("en-US", {
            timeZone: zone,
            hourCycle: "h23",
            year: "numeric",
            month: "2-digit",
            day: "2-digit",
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
        });
        this.names = new Intl.DateTimeFormat("en-AU", { timeZone: zone, timeZoneName: "short" });
    }

    offsetMinutesAt(instant: Date): number {
        const ms = instant.getTime() - (((instant.getTime() % 1000) + 1000) % 1000);
        const p: Record<string, number> = {};
        for (const part of this.parts.formatToParts(new Date(ms))) {
            if (part.type !== "literal") p[part.type] = Number(part.value);
        }
        const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour % 24, p.minute, p.second);
        return Math.round((asUtc - ms) / 60_000);
    }

    toLocal(instant: Date): LocalDateTime {
        return localFromShifted(new Date(instant.getTime() + this.offsetMinutesAt(instant) * 60_000));
    }

    localToUtc(local: LocalDateTime): Date {
        const wall = wallClockMs(local);
        const guess = wall - this.offsetMinutesAt(new Date(wall)) * 60_000;
        return new Date(wall - this.offsetMinutesAt(new Date(guess)) * 60_000);
    }

    format(instant: Date): string {
        const label =
            this.names.formatToParts(instant).find((p) => p.type === "timeZoneName")?.value ??
            offsetLabel(this.offsetMinutesAt(instant));
        return formatLocal(this.toLocal(instant), label);
    }
}

/** Resolve a provider once; unknown zones use the fixed offset. */
export function createTimezoneProvider(
    zone: string = DEFAULT_TIMEZONE,
    fallbackOffsetMinutes: number = DEFAULT_FALLBACK_OFFSET_MINUTES
): TimezoneProvider {
    try {
        return new IanaTimezone(zone);
    } catch {
        // RangeError: no tz data for this zone on this runtime
        return new FixedOffsetTimezone(fallbackOffsetMinutes);
    }
}

/** Ladder predictions close on 12 March at 20:00 local time of the season year. */
export function ladderPredictionDeadline(tz: TimezoneProvider, seasonYear: number): Date {
    return tz.localToUtc({ year: seasonYear, month: 3, day: 12, hour: 20, minute: 0 });
}

/** Season year as seen on the local calendar. */
export function localYear(tz: TimezoneProvider, instant: Date): number {
    return tz.toLocal(instant).year;
}
