// src/modules/sync/rounds.ts
import { ID } from "../../types/domain";
import { parseUtc } from "../../utils/date";
import { RoundUpdate } from "../fixtures/fixtures.repo";

export const DEFAULT_ROUND_GAP_HOURS = 60;

export interface RoundRow {
    id: ID;
    kickoffUtc: string;
    seasonYear: number | null;
    roundNumber: number | null;
}

/**
 * Number rounds by kickoff gaps. Per season, in kickoff order, a fixture
 * opens a new round when it starts more than `gapHours` after the previous
 * one. Fixtures that already carry a round keep it and raise the season's
 * running maximum.
 *
 * Only rows whose season or round actually change are returned.
 */
export function assignRoundNumbers(rows: RoundRow[], gapHours = DEFAULT_ROUND_GAP_HOURS): RoundUpdate[] {
    const gapMs = gapHours * 3_600_000;

    const parsed = rows
        .map((r) => ({ row: r, kickoff: parseUtc(r.kickoffUtc) }))
        .filter((p): p is { row: RoundRow; kickoff: Date } => p.kickoff !== null)
        .map((p) => ({ ...p, season: p.row.seasonYear ?? p.kickoff.getUTCFullYear() }))
        .sort((a, b) => a.season - b.season || a.kickoff.getTime() - b.kickoff.getTime() || a.row.id - b.row.id);

    const lastKickoff = new Map<number, number>();
    const currentRound = new Map<number, number>();
    const updates: RoundUpdate[] = [];

    for (const { row, kickoff, season } of parsed) {
        let round: number;
        if (row.roundNumber !== null) {
            round = row.roundNumber;
            currentRound.set(season, Math.max(currentRound.get(season) ?? 1, round));
        } else {
            round = currentRound.get(season) ?? 1;
            const prior = lastKickoff.get(season);
            if (prior !== undefined && kickoff.getTime() - prior > gapMs) round++;
            currentRound.set(season, round);
        }
        lastKickoff.set(season, kickoff.getTime());

        if (row.seasonYear !== season || row.roundNumber !== round) {
            updates.push({ id: row.id, seasonYear: season, roundNumber: round });
        }
    }

    return updates;
}
