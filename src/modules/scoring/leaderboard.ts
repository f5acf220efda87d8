// src/modules/scoring/leaderboard.ts
import { LeaderboardEntry, User } from "../../types/domain";
import { SeasonTipRow } from "../tips/tips.repo";

export function compareLeaderboard(a: LeaderboardEntry, b: LeaderboardEntry): number {
    return (
        b.totalPoints - a.totalPoints ||
        b.correctTips - a.correctTips ||
        b.tipsMade - a.tipsMade ||
        a.displayName.localeCompare(b.displayName)
    );
}

/**
 * One row per user, including users with no tips. Every round in
 * `roundNumbers` appears in `roundPoints` (0 when nothing was scored).
 */
export function computeLeaderboard(
    users: User[],
    tips: SeasonTipRow[],
    roundNumbers: number[]
): LeaderboardEntry[] {
    const entries = new Map<number, LeaderboardEntry>();
    for (const u of users) {
        const roundPoints: Record<number, number> = {};
        for (const r of roundNumbers) roundPoints[r] = 0;
        entries.set(u.id, {
            userId: u.id,
            displayName: u.displayName,
            tipsMade: 0,
            correctTips: 0,
            totalPoints: 0,
            roundPoints,
        });
    }

    for (const t of tips) {
        const e = entries.get(t.userId);
        if (!e) continue;
        const points = t.pointsAwarded ?? 0;
        e.tipsMade++;
        if (t.pointsAwarded === 1) e.correctTips++;
        e.totalPoints += points;
        if (t.roundNumber !== null && t.roundNumber in e.roundPoints) {
            e.roundPoints[t.roundNumber] += points;
        }
    }

    return Array.from(entries.values()).sort(compareLeaderboard);
}
