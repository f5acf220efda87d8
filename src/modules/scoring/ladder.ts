// src/modules/scoring/ladder.ts
import { Fixture, LadderStanding } from "../../types/domain";

type Result = "W" | "L" | "D";

interface Side {
    team: string;
    pf: number;
    pa: number;
    logoUrl: string | null;
}

function resultFor(pf: number, pa: number): Result {
    if (pf > pa) return "W";
    if (pf < pa) return "L";
    return "D";
}

function emptyStanding(team: string, logoUrl: string | null): LadderStanding {
    return {
        team,
        played: 0,
        won: 0,
        lost: 0,
        drawn: 0,
        pointsFor: 0,
        pointsAgainst: 0,
        pointDiff: 0,
        compPoints: 0,
        logoUrl,
    };
}

/** Competition order: comp points, differential, points for (all desc), then name. */
export function compareStandings(a: LadderStanding, b: LadderStanding): number {
    return (
        b.compPoints - a.compPoints ||
        b.pointDiff - a.pointDiff ||
        b.pointsFor - a.pointsFor ||
        (a.team < b.team ? -1 : a.team > b.team ? 1 : 0)
    );
}

/**
 * Season table from completed fixtures with both scores. Each match counts
 * once from the home side and once from the away side; 2 points a win,
 * 1 a draw.
 */
export function computeLadder(fixtures: Fixture[], seasonYear: number): LadderStanding[] {
    const table = new Map<string, LadderStanding>();

    for (const f of fixtures) {
        if (f.seasonYear !== seasonYear || f.status !== "completed") continue;
        if (f.homeScore === null || f.awayScore === null) continue;

        const sides: Side[] = [
            { team: f.homeTeam, pf: f.homeScore, pa: f.awayScore, logoUrl: f.homeLogoUrl },
            { team: f.awayTeam, pf: f.awayScore, pa: f.homeScore, logoUrl: f.awayLogoUrl },
        ];
        for (const s of sides) {
            const row = table.get(s.team) ?? emptyStanding(s.team, s.logoUrl);
            const result = resultFor(s.pf, s.pa);
            row.played++;
            if (result === "W") row.won++;
            else if (result === "L") row.lost++;
            else row.drawn++;
            row.pointsFor += s.pf;
            row.pointsAgainst += s.pa;
            row.pointDiff = row.pointsFor - row.pointsAgainst;
            row.compPoints = row.won * 2 + row.drawn;
            row.logoUrl = row.logoUrl ?? s.logoUrl;
            table.set(s.team, row);
        }
    }

    return Array.from(table.values()).sort(compareStandings);
}
