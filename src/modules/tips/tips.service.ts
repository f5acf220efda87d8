// src/modules/tips/tips.service.ts
import { Fixture, FixtureRecord, ID } from "../../types/domain";
import { NotFoundError, ValidationError } from "../../utils/errors";
import { DEFAULT_LOCK_MINUTES, isLocked, lockDeadline } from "../../utils/locking";
import { parseUtc } from "../../utils/date";
import { FixtureStore } from "../fixtures/fixtures.repo";
import { UserStore } from "../users/users.repo";
import { TipStore } from "./tips.repo";

export interface AutoTipFilter {
    seasonYear?: number;
    roundNumber?: number;
    userId?: ID;
    includeAdmin?: boolean;
}

export interface TipPick {
    fixtureId: ID;
    team: string;
}

export interface SubmitTipsResult {
    saved: number;
    /** Picks for fixtures that had already locked. */
    blocked: number;
    /** Picks naming a fixture outside the round or a team not playing in it. */
    ignored: number;
    autoFilled: number;
}

/**
 * Higher decimal price = longer odds = underdog. Level prices go home.
 * With one price known, the side that has it; with none, home.
 */
export function pickUnderdog(f: Pick<Fixture, "homeTeam" | "awayTeam" | "homePrice" | "awayPrice">): string {
    const { homePrice, awayPrice } = f;
    if (homePrice !== null && awayPrice !== null) {
        return awayPrice > homePrice ? f.awayTeam : f.homeTeam;
    }
    if (homePrice !== null) return f.homeTeam;
    if (awayPrice !== null) return f.awayTeam;
    return f.homeTeam;
}

export class TipsService {
    private readonly lockMinutes: number;

    constructor(
        private readonly fixtures: FixtureStore,
        private readonly tips: TipStore,
        private readonly users: UserStore,
        opts: { lockMinutes?: number } = {}
    ) {
        this.lockMinutes = opts.lockMinutes ?? DEFAULT_LOCK_MINUTES;
    }

    /**
     * Keep picks valid when a fixture's team names change under it, as when a
     * draw-only fixture is relinked to its odds event.
     */
    async carryOverTeamNames(
        fixtureId: ID,
        before: Pick<FixtureRecord, "homeTeam" | "awayTeam">,
        after: Pick<FixtureRecord, "homeTeam" | "awayTeam">
    ): Promise<number> {
        let changed = 0;
        if (before.homeTeam !== after.homeTeam) {
            changed += await this.tips.renameTipTeam(fixtureId, before.homeTeam, after.homeTeam);
        }
        if (before.awayTeam !== after.awayTeam) {
            changed += await this.tips.renameTipTeam(fixtureId, before.awayTeam, after.awayTeam);
        }
        return changed;
    }

    /**
     * Give every eligible user without a tip on a locked fixture the underdog.
     * Eligible = account created at or before that fixture's lock deadline,
     * not an admin unless `includeAdmin`, and `userId` when given.
     * Repeat calls insert nothing new.
     */
    async applyAutoTips(filter: AutoTipFilter = {}, now: Date = new Date()): Promise<number> {
        const fixtures = await this.fixtures.listFixtures({
            seasonYear: filter.seasonYear,
            roundNumber: filter.roundNumber,
        });
        const users = (await this.users.listUsers()).filter(
            (u) => (filter.includeAdmin || !u.isAdmin) && (filter.userId === undefined || u.id === filter.userId)
        );
        if (!users.length) return 0;

        const at = now.toISOString();
        let inserted = 0;

        for (const f of fixtures) {
            if (!isLocked(f.kickoffUtc, now, this.lockMinutes)) continue;

            const deadline = lockDeadline(f.kickoffUtc, this.lockMinutes).getTime();
            const tipped = new Set(await this.tips.listTipUserIdsForFixture(f.id));
            const underdog = pickUnderdog(f);

            for (const u of users) {
                if (tipped.has(u.id)) continue;
                const created = parseUtc(u.createdAt);
                if (!created || created.getTime() > deadline) continue;
                if (await this.tips.insertIfAbsent({ userId: u.id, fixtureId: f.id, tipTeam: underdog, at })) {
                    inserted++;
                }
            }
        }

        return inserted;
    }

    /**
     * Save a user's picks for one round. Locked fixtures are refused and
     * counted; the user's own missed locked fixtures in the round are then
     * auto-filled.
     */
    async submitTips(
        userId: ID,
        seasonYear: number,
        roundNumber: number,
        picks: TipPick[],
        now: Date = new Date()
    ): Promise<SubmitTipsResult> {
        const user = await this.users.getById(userId);
        if (!user) throw new NotFoundError(`User ${userId} not found`);
        if (!Number.isInteger(roundNumber) || roundNumber < 1) {
            throw new ValidationError(`Invalid round: ${roundNumber}`);
        }

        const roundFixtures = await this.fixtures.listFixtures({ seasonYear, roundNumber });
        const byId = new Map(roundFixtures.map((f) => [f.id, f]));
        const at = now.toISOString();

        let saved = 0;
        let blocked = 0;
        let ignored = 0;
        for (const pick of picks) {
            const f = byId.get(pick.fixtureId);
            if (!f || (pick.team !== f.homeTeam && pick.team !== f.awayTeam)) {
                ignored++;
                continue;
            }
            if (isLocked(f.kickoffUtc, now, this.lockMinutes)) {
                blocked++;
                continue;
            }
            await this.tips.upsertUserTip({ userId, fixtureId: f.id, tipTeam: pick.team, at });
            saved++;
        }

        const autoFilled = await this.applyAutoTips({ seasonYear, roundNumber, userId }, now);
        return { saved, blocked, ignored, autoFilled };
    }
}
