// src/modules/fixtures/fixtures.service.ts
import { Fixture, ID, Tip } from "../../types/domain";
import { parseUtc } from "../../utils/date";
import { DEFAULT_LOCK_MINUTES, isLocked, isRoundLocked, lockDeadline } from "../../utils/locking";
import { TipStore } from "../tips/tips.repo";
import { FixtureStore } from "./fixtures.repo";

export interface RoundFixtureView extends Fixture {
    lockDeadlineUtc: string;
    locked: boolean;
    /** The requesting user's tip, when a user was given. */
    userTip: Tip | null;
}

export interface RoundView {
    seasonYear: number;
    roundNumber: number;
    fixtures: RoundFixtureView[];
    /** Whole-round view: locked once the earliest fixture locks. Display only. */
    roundLocked: boolean;
}

export class FixturesService {
    private readonly lockMinutes: number;

    constructor(
        private readonly fixtures: FixtureStore,
        private readonly tips: TipStore,
        opts: { lockMinutes?: number } = {}
    ) {
        this.lockMinutes = opts.lockMinutes ?? DEFAULT_LOCK_MINUTES;
    }

    listRoundNumbers(seasonYear: number): Promise<number[]> {
        return this.fixtures.listRoundNumbers(seasonYear);
    }

    /** Round of the next fixture at or after `now`; else the season's lowest round; else null. */
    async getCurrentRound(seasonYear: number, now: Date = new Date()): Promise<number | null> {
        const rows = await this.fixtures.listFixtures({ seasonYear });
        const next = rows
            .filter((f) => f.roundNumber !== null)
            .filter((f) => (parseUtc(f.kickoffUtc)?.getTime() ?? -Infinity) >= now.getTime())
            .sort((a, b) => Date.parse(a.kickoffUtc) - Date.parse(b.kickoffUtc))[0];
        if (next && next.roundNumber !== null) return next.roundNumber;

        const rounds = await this.fixtures.listRoundNumbers(seasonYear);
        return rounds.length ? rounds[0] : null;
    }

    async getRoundView(seasonYear: number, roundNumber: number, now: Date = new Date(), userId?: ID): Promise<RoundView> {
        const rows = await this.fixtures.listFixtures({ seasonYear, roundNumber });
        const userTips =
            userId === undefined
                ? []
                : await this.tips.listUserTipsForFixtures(
                      userId,
                      rows.map((f) => f.id)
                  );
        const tipByFixture = new Map(userTips.map((t) => [t.fixtureId, t]));

        return {
            seasonYear,
            roundNumber,
            fixtures: rows.map((f) => ({
                ...f,
                lockDeadlineUtc: lockDeadline(f.kickoffUtc, this.lockMinutes).toISOString(),
                locked: isLocked(f.kickoffUtc, now, this.lockMinutes),
                userTip: tipByFixture.get(f.id) ?? null,
            })),
            roundLocked: isRoundLocked(
                rows.map((f) => f.kickoffUtc),
                now,
                this.lockMinutes
            ),
        };
    }

    /** Rounds in which every fixture is completed, ascending. */
    async listCompletedRounds(seasonYear: number): Promise<number[]> {
        const rows = await this.fixtures.listFixtures({ seasonYear });
        const open = new Set<number>();
        const seen = new Set<number>();
        for (const f of rows) {
            if (f.roundNumber === null) continue;
            seen.add(f.roundNumber);
            if (f.status !== "completed") open.add(f.roundNumber);
        }
        return Array.from(seen)
            .filter((r) => !open.has(r))
            .sort((a, b) => a - b);
    }
}
