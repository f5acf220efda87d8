// src/modules/sync/draw.fallback.ts
import { FixtureRecord } from "../../types/domain";
import { parseUtc } from "../../utils/date";
import { normalizeNameToken, teamNamesMatch } from "../../utils/normalize";
import { DrawFixture } from "../draw/draw.client";

export interface DrawEnrichment {
    drawFixturesLoaded: number;
    fixturesEnriched: number;
    fixturesFilteredOut: number;
    drawFixturesAdded: number;
    /** Set when the draw could not be loaded; enrichment and filtering were skipped. */
    error?: string;
}

export interface DrawFallbackResult {
    fixtures: Map<string, FixtureRecord>;
    /** Round numbers taken from the draw, keyed by event id; these override stored rounds. */
    authoritativeRounds: Map<string, number>;
    /** Draw-only identity of each matched draw entry -> the candidate it matched. */
    drawLinks: Map<string, string>;
    counts: DrawEnrichment;
}

export interface DrawFallbackOptions {
    matchWindowHours?: number;
    maxRound?: number;
}

const DRAW_ID_PREFIX = "draw:";

/** Stable identity for a draw-only fixture. */
export function drawEventId(seasonYear: number, d: DrawFixture): string {
    const home = normalizeNameToken(d.homeName) || "home";
    const away = normalizeNameToken(d.awayName) || "away";
    const kickoffToken = d.kickoffUtc.replace(/[^0-9TZ:+-]/g, "");
    return `${DRAW_ID_PREFIX}${seasonYear}:r${d.roundNumber}:${home}:vs:${away}:${kickoffToken}`;
}

/** Fixtures stored under a draw-only identity; the scores feed never reports them. */
export function isDrawOnlyId(sourceEventId: string): boolean {
    return sourceEventId.startsWith(DRAW_ID_PREFIX);
}

function drawOnlyFixture(seasonYear: number, d: DrawFixture): FixtureRecord {
    return {
        sourceEventId: drawEventId(seasonYear, d),
        source: "official_draw",
        kickoffUtc: d.kickoffUtc,
        homeTeam: d.homeName,
        awayTeam: d.awayName,
        venueName: d.venueName,
        venueCity: d.venueCity,
        homeLogoUrl: d.homeLogoUrl,
        awayLogoUrl: d.awayLogoUrl,
        seasonYear,
        roundNumber: d.roundNumber,
        status: "scheduled",
        homeScore: null,
        awayScore: null,
        winner: null,
        homePrice: null,
        awayPrice: null,
        rawJson: JSON.stringify({ source: "official_draw", drawFixture: d }),
    };
}

/**
 * Enrich target-season candidates from the official draw.
 *
 * - matched (both names match, kickoff within the window, closest wins):
 *   round, venue and logos come from the draw
 * - unmatched target-season candidates are dropped
 * - draw entries nobody matched become new fixtures
 *
 * An empty draw leaves the candidates untouched.
 */
export function applyDrawFallback(
    candidates: Map<string, FixtureRecord>,
    draw: DrawFixture[],
    seasonYear: number,
    opts: DrawFallbackOptions = {}
): DrawFallbackResult {
    const windowMs = (opts.matchWindowHours ?? 36) * 3_600_000;
    const maxRound = opts.maxRound ?? 27;

    const entries = draw.filter((d) => d.roundNumber >= 1 && d.roundNumber <= maxRound);
    const fixtures = new Map(candidates);
    const authoritativeRounds = new Map<string, number>();
    const drawLinks = new Map<string, string>();
    const counts: DrawEnrichment = {
        drawFixturesLoaded: entries.length,
        fixturesEnriched: 0,
        fixturesFilteredOut: 0,
        drawFixturesAdded: 0,
    };
    if (!entries.length) return { fixtures, authoritativeRounds, drawLinks, counts };

    const matched = new Set<number>();

    for (const [id, f] of candidates) {
        if (f.seasonYear !== seasonYear) continue;
        const kickoff = parseUtc(f.kickoffUtc);

        let bestIdx = -1;
        let bestDelta = Infinity;
        entries.forEach((d, idx) => {
            if (!kickoff) return;
            if (!teamNamesMatch(f.homeTeam, d.homeName) || !teamNamesMatch(f.awayTeam, d.awayName)) return;
            const drawKickoff = parseUtc(d.kickoffUtc);
            if (!drawKickoff) return;
            const delta = Math.abs(kickoff.getTime() - drawKickoff.getTime());
            if (delta <= windowMs && delta < bestDelta) {
                bestIdx = idx;
                bestDelta = delta;
            }
        });

        if (bestIdx < 0) {
            fixtures.delete(id);
            counts.fixturesFilteredOut++;
            continue;
        }

        const d = entries[bestIdx];
        matched.add(bestIdx);
        fixtures.set(id, {
            ...f,
            roundNumber: d.roundNumber,
            venueName: d.venueName ?? f.venueName,
            venueCity: d.venueCity ?? f.venueCity,
            homeLogoUrl: d.homeLogoUrl ?? f.homeLogoUrl,
            awayLogoUrl: d.awayLogoUrl ?? f.awayLogoUrl,
        });
        authoritativeRounds.set(id, d.roundNumber);
        drawLinks.set(drawEventId(seasonYear, d), id);
        counts.fixturesEnriched++;
    }

    entries.forEach((d, idx) => {
        if (matched.has(idx)) return;
        if (!d.homeName.trim() || !d.awayName.trim()) return;
        const added = drawOnlyFixture(seasonYear, d);
        if (fixtures.has(added.sourceEventId)) return;
        fixtures.set(added.sourceEventId, added);
        counts.drawFixturesAdded++;
    });

    return { fixtures, authoritativeRounds, drawLinks, counts };
}
