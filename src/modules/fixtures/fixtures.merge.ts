// src/modules/fixtures/fixtures.merge.ts
import { FixtureRecord, WINNER_UNKNOWN } from "../../types/domain";
import { parseUtc } from "../../utils/date";

function earliestKickoff(a: string, b: string): string {
    const da = parseUtc(a);
    const db = parseUtc(b);
    if (!da) return b;
    if (!db) return a;
    return db.getTime() < da.getTime() ? db.toISOString() : da.toISOString();
}

/**
 * Field-by-field conflict resolution between the record we hold and a newer
 * candidate for the same identity.
 *
 * | field                    | rule                                  |
 * |--------------------------|---------------------------------------|
 * | kickoff                  | earliest of the two                   |
 * | teams, venue, season     | incoming if non-null                  |
 * | logos, round, prices     | fill only while existing is null      |
 * | status                   | completed never reverts               |
 * | scores                   | incoming if non-null                  |
 * | winner                   | incoming unless null or "unknown"     |
 * | raw payload, source tag  | incoming if non-null                  |
 */
export function mergeFixture(existing: FixtureRecord, incoming: FixtureRecord): FixtureRecord {
    const status =
        existing.status === "completed" || incoming.status === "completed" ? "completed" : "scheduled";

    let winner = existing.winner;
    if (incoming.winner !== null && incoming.winner !== WINNER_UNKNOWN) winner = incoming.winner;
    if (status === "completed" && winner === null) winner = WINNER_UNKNOWN;

    return {
        sourceEventId: existing.sourceEventId,
        source: incoming.source ?? existing.source,
        kickoffUtc: earliestKickoff(existing.kickoffUtc, incoming.kickoffUtc),
        homeTeam: incoming.homeTeam || existing.homeTeam,
        awayTeam: incoming.awayTeam || existing.awayTeam,
        venueName: incoming.venueName ?? existing.venueName,
        venueCity: incoming.venueCity ?? existing.venueCity,
        homeLogoUrl: existing.homeLogoUrl ?? incoming.homeLogoUrl,
        awayLogoUrl: existing.awayLogoUrl ?? incoming.awayLogoUrl,
        seasonYear: incoming.seasonYear ?? existing.seasonYear,
        roundNumber: existing.roundNumber ?? incoming.roundNumber,
        status,
        homeScore: incoming.homeScore ?? existing.homeScore,
        awayScore: incoming.awayScore ?? existing.awayScore,
        winner,
        homePrice: existing.homePrice ?? incoming.homePrice,
        awayPrice: existing.awayPrice ?? incoming.awayPrice,
        rawJson: incoming.rawJson ?? existing.rawJson,
    };
}

const FIELDS: Array<keyof FixtureRecord> = [
    "sourceEventId",
    "source",
    "kickoffUtc",
    "homeTeam",
    "awayTeam",
    "venueName",
    "venueCity",
    "homeLogoUrl",
    "awayLogoUrl",
    "seasonYear",
    "roundNumber",
    "status",
    "homeScore",
    "awayScore",
    "winner",
    "homePrice",
    "awayPrice",
    "rawJson",
];

/** Field-wise equality; kickoffs compare as instants. */
export function recordsEqual(a: FixtureRecord, b: FixtureRecord): boolean {
    return FIELDS.every((k) => {
        if (k === "kickoffUtc") return parseUtc(a.kickoffUtc)?.getTime() === parseUtc(b.kickoffUtc)?.getTime();
        return a[k] === b[k];
    });
}

/** Strip row-only columns so a stored fixture can go through mergeFixture. */
export function toRecord(f: FixtureRecord): FixtureRecord {
    const out: FixtureRecord = {
        sourceEventId: f.sourceEventId,
        source: f.source,
        kickoffUtc: f.kickoffUtc,
        homeTeam: f.homeTeam,
        awayTeam: f.awayTeam,
        venueName: f.venueName,
        venueCity: f.venueCity,
        homeLogoUrl: f.homeLogoUrl,
        awayLogoUrl: f.awayLogoUrl,
        seasonYear: f.seasonYear,
        roundNumber: f.roundNumber,
        status: f.status,
        homeScore: f.homeScore,
        awayScore: f.awayScore,
        winner: f.winner,
        homePrice: f.homePrice,
        awayPrice: f.awayPrice,
        rawJson: f.rawJson,
    };
    return out;
}
