// src/modules/scoring/scoring.service.ts
import { LadderStanding, LeaderboardEntry } from "../../types/domain";
import { FixtureStore } from "../fixtures/fixtures.repo";
import { PointsUpdate, TipStore } from "../tips/tips.repo";
import { UserStore } from "../users/users.repo";
import { computeLadder } from "./ladder";
import { computeLeaderboard } from "./leaderboard";

export class ScoringService {
    constructor(
        private readonly fixtures: FixtureStore,
        private readonly tips: TipStore,
        private readonly users: UserStore
    ) {}

    /**
     * 1 point when the tip names the winner, else 0, for every tip on a
     * completed fixture with a known winner. Only changed rows are written.
     * Returns the number of tips evaluated.
     */
    async rescoreTips(): Promise<number> {
        const rows = await this.tips.listTipsForScoring();
        const updates: PointsUpdate[] = [];
        for (const r of rows) {
            const points = r.tipTeam === r.winner ? 1 : 0;
            if (r.pointsAwarded !== points) updates.push({ tipId: r.tipId, points });
        }
        await this.tips.updatePoints(updates);
        return rows.length;
    }

    async getLadder(seasonYear: number): Promise<LadderStanding[]> {
        const fixtures = await this.fixtures.listFixtures({ seasonYear });
        return computeLadder(fixtures, seasonYear);
    }

    async getLeaderboard(seasonYear: number): Promise<LeaderboardEntry[]> {
        const [users, tips, rounds] = await Promise.all([
            this.users.listUsers(),
            this.tips.listSeasonTips(seasonYear),
            this.fixtures.listRoundNumbers(seasonYear),
        ]);
        return computeLeaderboard(users, tips, rounds);
    }
}
