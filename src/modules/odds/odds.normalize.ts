// src/modules/odds/odds.normalize.ts
import { FixtureRecord, SourceTag, WINNER_DRAW, WINNER_UNKNOWN } from "../../types/domain";
import { parseUtc } from "../../utils/date";
import {
    RawRecord,
    floatOrNull,
    intOrNull,
    isRecord,
    recordArray,
    strOrNull,
    truthy,
} from "../../utils/normalize";

/**
 * Odds/results API events arrive either as a bare list or wrapped in
 * `{ data | events | odds: [...] }` (historical snapshots use `data`).
 */
export function extractEvents(payload: unknown): RawRecord[] {
    if (Array.isArray(payload)) return recordArray(payload);
    if (isRecord(payload)) {
        for (const key of ["data", "events", "odds"]) {
            const raw = payload[key];
            if (Array.isArray(raw)) return recordArray(raw);
        }
    }
    return [];
}

/** First bookmaker whose h2h market prices BOTH sides wins. */
export function extractH2hPrices(event: RawRecord): { homePrice: number | null; awayPrice: number | null } {
    const none = { homePrice: null, awayPrice: null };
    const homeTeam = strOrNull(event.home_team);
    const awayTeam = strOrNull(event.away_team);
    if (!homeTeam || !awayTeam) return none;

    for (const bookmaker of recordArray(event.bookmakers)) {
        for (const market of recordArray(bookmaker.markets)) {
            if (market.key !== "h2h") continue;

            const prices = new Map<string, unknown>();
            for (const outcome of recordArray(market.outcomes)) {
                const name = strOrNull(outcome.name);
                if (name) prices.set(name, outcome.price);
            }
            const rawHome = prices.get(homeTeam);
            const rawAway = prices.get(awayTeam);
            if (rawHome == null || rawAway == null) continue;

            const homePrice = floatOrNull(rawHome);
            const awayPrice = floatOrNull(rawAway);
            if (homePrice == null || awayPrice == null) return none;
            return { homePrice, awayPrice };
        }
    }
    return none;
}

/** Scores keyed by team name; winner is a team name or "draw". */
export function extractScores(event: RawRecord): {
    homeScore: number | null;
    awayScore: number | null;
    winner: string | null;
} {
    const none = { homeScore: null, awayScore: null, winner: null };
    const homeTeam = strOrNull(event.home_team);
    const awayTeam = strOrNull(event.away_team);
    if (!Array.isArray(event.scores) || !homeTeam || !awayTeam) return none;

    const byName = new Map<string, number>();
    for (const row of recordArray(event.scores)) {
        const name = strOrNull(row.name);
        const score = intOrNull(row.score);
        if (name == null || score == null) continue;
        byName.set(name, score);
    }

    const homeScore = byName.get(homeTeam);
    const awayScore = byName.get(awayTeam);
    if (homeScore === undefined || awayScore === undefined) return none;

    let winner: string = WINNER_DRAW;
    if (homeScore > awayScore) winner = homeTeam;
    else if (awayScore > homeScore) winner = awayTeam;
    return { homeScore, awayScore, winner };
}

/**
 * Normalize one upstream event into a fixture candidate.
 * Returns null (not an error) when id, either team, or kickoff is missing.
 */
export function normalizeOddsEvent(source: SourceTag, event: RawRecord): FixtureRecord | null {
    const eventId = strOrNull(event.id);
    const homeTeam = strOrNull(event.home_team);
    const awayTeam = strOrNull(event.away_team);
    const kickoff = parseUtc(strOrNull(event.commence_time));
    if (!eventId || !homeTeam || !awayTeam || !kickoff) return null;

    const { homePrice, awayPrice } = extractH2hPrices(event);
    const scores = extractScores(event);

    const completed = truthy(event.completed) || scores.winner !== null;
    // finished but unscorable stays distinguishable from "no data yet"
    const winner = completed && scores.winner === null ? WINNER_UNKNOWN : scores.winner;

    const venueName =
        strOrNull(event.stadium_name) ??
        strOrNull(event.venue_name) ??
        strOrNull(event.venue) ??
        strOrNull(event.stadium);
    const venueCity =
        strOrNull(event.stadium_city) ?? strOrNull(event.venue_city) ?? strOrNull(event.city);

    return {
        sourceEventId: eventId,
        source,
        kickoffUtc: kickoff.toISOString(),
        homeTeam,
        awayTeam,
        venueName,
        venueCity,
        homeLogoUrl: null,
        awayLogoUrl: null,
        seasonYear: kickoff.getUTCFullYear(),
        roundNumber: null,
        status: completed ? "completed" : "scheduled",
        homeScore: scores.homeScore,
        awayScore: scores.awayScore,
        winner,
        homePrice,
        awayPrice,
        rawJson: JSON.stringify(event),
    };
}
