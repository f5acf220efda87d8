// src/modules/predictions/predictions.service.ts
import { AdjustDirection, ID, LadderPredictionEntry } from "../../types/domain";
import { ConflictError, NotFoundError, ValidationError } from "../../utils/errors";
import { TimezoneProvider, ladderPredictionDeadline } from "../../utils/timezone";
import { FixturesService } from "../fixtures/fixtures.service";
import { ScoringService } from "../scoring/scoring.service";
import { UserStore } from "../users/users.repo";
import { PredictionStore } from "./predictions.repo";
import { moveTeam, scorePrediction } from "./predictions.scoring";

export interface PredictionView {
    seasonYear: number;
    deadlineUtc: string;
    deadlineLocal: string;
    open: boolean;
    teams: string[];
    adjustableRounds: number[];
}

export class PredictionsService {
    constructor(
        private readonly store: PredictionStore,
        private readonly users: UserStore,
        private readonly fixtures: FixturesService,
        private readonly scoring: ScoringService,
        private readonly tz: TimezoneProvider
    ) {}

    deadline(seasonYear: number): Date {
        return ladderPredictionDeadline(this.tz, seasonYear);
    }

    private async requireUser(userId: ID) {
        const user = await this.users.getById(userId);
        if (!user) throw new NotFoundError(`User ${userId} not found`);
        return user;
    }

    /** Completed rounds the user has not used for an adjustment yet. */
    private async adjustableRounds(userId: ID, seasonYear: number): Promise<number[]> {
        const [completed, used] = await Promise.all([
            this.fixtures.listCompletedRounds(seasonYear),
            this.store.listAdjustments(userId, seasonYear),
        ]);
        const usedRounds = new Set(used.map((a) => a.roundNumber));
        return completed.filter((r) => !usedRounds.has(r));
    }

    async getPrediction(userId: ID, seasonYear: number, now: Date = new Date()): Promise<PredictionView> {
        await this.requireUser(userId);
        const deadline = this.deadline(seasonYear);
        const teams = await this.store.getPrediction(userId, seasonYear);
        return {
            seasonYear,
            deadlineUtc: deadline.toISOString(),
            deadlineLocal: this.tz.format(deadline),
            open: now.getTime() < deadline.getTime(),
            teams,
            adjustableRounds: teams.length ? await this.adjustableRounds(userId, seasonYear) : [],
        };
    }

    async savePrediction(userId: ID, seasonYear: number, teams: string[], now: Date = new Date()): Promise<number> {
        await this.requireUser(userId);
        if (now.getTime() >= this.deadline(seasonYear).getTime()) {
            throw new ConflictError(`Ladder predictions for ${seasonYear} are closed.`);
        }
        const order = teams.map((t) => t.trim());
        if (!order.length || order.some((t) => !t)) {
            throw new ValidationError("Prediction must list at least one team and no blank names.");
        }
        if (new Set(order).size !== order.length) {
            throw new ValidationError("Prediction lists a team more than once.");
        }
        await this.store.replacePrediction(userId, seasonYear, order);
        return order.length;
    }

    /** One single-place move per completed round. */
    async adjustPrediction(
        userId: ID,
        seasonYear: number,
        roundNumber: number,
        team: string,
        direction: AdjustDirection,
        now: Date = new Date()
    ): Promise<string[]> {
        await this.requireUser(userId);
        const current = await this.store.getPrediction(userId, seasonYear);
        if (!current.length) throw new NotFoundError(`No ${seasonYear} prediction to adjust.`);

        const completed = await this.fixtures.listCompletedRounds(seasonYear);
        if (!completed.includes(roundNumber)) {
            throw new ValidationError(`Round ${roundNumber} is not completed.`);
        }
        const used = await this.store.listAdjustments(userId, seasonYear);
        if (used.some((a) => a.roundNumber === roundNumber)) {
            throw new ConflictError(`Round ${roundNumber} adjustment already used.`);
        }

        const next = moveTeam(current, team, direction);
        await this.store.saveAdjustment(
            { userId, seasonYear, roundNumber, team, direction, createdAt: now.toISOString() },
            next
        );
        return next;
    }

    /** Ascending by positional distance from the current ladder, then name. */
    async getLeaderboard(seasonYear: number): Promise<LadderPredictionEntry[]> {
        const [predictions, users, ladder] = await Promise.all([
            this.store.listPredictions(seasonYear),
            this.users.listUsers(),
            this.scoring.getLadder(seasonYear),
        ]);
        const names = new Map(users.map((u) => [u.id, u.displayName]));
        const actual = ladder.map((s) => s.team);

        return predictions
            .map((p) => ({
                userId: p.userId,
                displayName: names.get(p.userId) ?? `User ${p.userId}`,
                score: scorePrediction(p.teams, actual),
                teamsPredicted: p.teams.length,
            }))
            .sort((a, b) => a.score - b.score || a.displayName.localeCompare(b.displayName));
    }
}
