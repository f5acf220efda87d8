// src/modules/tips/tips.repo.ts
import { Pool, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import { ID, NewTip, Tip, TipPoints } from "../../types/domain";
import { intCol, placeholders, reqIntCol, reqIsoCol, strCol } from "../../data/sql";

/** A tip joined to its fixture's final result. */
export interface ScorableTip {
    tipId: ID;
    tipTeam: string;
    pointsAwarded: TipPoints;
    winner: string;
}

export interface SeasonTipRow {
    userId: ID;
    roundNumber: number | null;
    pointsAwarded: TipPoints;
}

export interface PointsUpdate {
    tipId: ID;
    points: 0 | 1;
}

export interface TipStore {
    listTipUserIdsForFixture(fixtureId: ID): Promise<ID[]>;
    /** No-op when the (user, fixture) pair already has a tip; true when a row was added. */
    insertIfAbsent(tip: NewTip): Promise<boolean>;
    /** Insert, or change the picked team of an existing tip. */
    upsertUserTip(tip: NewTip): Promise<void>;
    /** Tips on completed fixtures with a known winner ("unknown" excluded). */
    listTipsForScoring(): Promise<ScorableTip[]>;
    updatePoints(updates: PointsUpdate[]): Promise<void>;
    listSeasonTips(seasonYear: number): Promise<SeasonTipRow[]>;
    listUserTipsForFixtures(userId: ID, fixtureIds: ID[]): Promise<Tip[]>;
    /** Rewrite the picked team on one fixture's tips; returns rows changed. */
    renameTipTeam(fixtureId: ID, from: string, to: string): Promise<number>;
}

export function toPoints(v: unknown): TipPoints {
    const n = intCol(v);
    if (n === 1) return 1;
    if (n === 0) return 0;
    return null;
}

function mapTip(r: RowDataPacket): Tip {
    return {
        id: reqIntCol(r.id, "tips.id"),
        userId: reqIntCol(r.user_id, "tips.user_id"),
        fixtureId: reqIntCol(r.fixture_id, "tips.fixture_id"),
        tipTeam: strCol(r.tip_team) ?? "",
        pointsAwarded: toPoints(r.points_awarded),
        createdAt: reqIsoCol(r.created_at, "tips.created_at"),
        updatedAt: reqIsoCol(r.updated_at, "tips.updated_at"),
    };
}

export class TipsRepo implements TipStore {
    constructor(public readonly pool: Pool) {}

    async listTipUserIdsForFixture(fixtureId: ID): Promise<ID[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `SELECT user_id FROM tips WHERE fixture_id = ?`,
            [fixtureId]
        );
        return rows.map((r) => reqIntCol(r.user_id, "tips.user_id"));
    }

    async insertIfAbsent(tip: NewTip): Promise<boolean> {
        const at = new Date(tip.at);
        const [res] = await this.pool.execute<ResultSetHeader>(
            `
                INSERT IGNORE INTO tips (user_id, fixture_id, tip_team, points_awarded, created_at, updated_at)
                VALUES (?, ?, ?, NULL, ?, ?)
            `,
            [tip.userId, tip.fixtureId, tip.tipTeam, at, at]
        );
        return res.affectedRows > 0;
    }

    async upsertUserTip(tip: NewTip): Promise<void> {
        const at = new Date(tip.at);
        await this.pool.execute(
            `
                INSERT INTO tips (user_id, fixture_id, tip_team, points_awarded, created_at, updated_at)
                VALUES (?, ?, ?, NULL, ?, ?)
                ON DUPLICATE KEY UPDATE tip_team = VALUES(tip_team), updated_at = VALUES(updated_at)
            `,
            [tip.userId, tip.fixtureId, tip.tipTeam, at, at]
        );
    }

    async listTipsForScoring(): Promise<ScorableTip[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT t.id AS tip_id, t.tip_team, t.points_awarded, f.winner
                FROM tips t
                JOIN fixtures f ON f.id = t.fixture_id
                WHERE f.status = 'completed'
                  AND f.winner IS NOT NULL
                  AND f.winner <> 'unknown'
            `
        );
        return rows.map((r) => ({
            tipId: reqIntCol(r.tip_id, "tips.id"),
            tipTeam: strCol(r.tip_team) ?? "",
            pointsAwarded: toPoints(r.points_awarded),
            winner: strCol(r.winner) ?? "",
        }));
    }

    async updatePoints(updates: PointsUpdate[]): Promise<void> {
        if (!updates.length) return;
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            for (const u of updates) {
                await conn.execute(`UPDATE tips SET points_awarded = ? WHERE id = ?`, [u.points, u.tipId]);
            }
            await conn.commit();
        } catch (err) {
            await conn.rollback();
            throw err;
        } finally {
            conn.release();
        }
    }

    async listSeasonTips(seasonYear: number): Promise<SeasonTipRow[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT t.user_id, f.round_number, t.points_awarded
                FROM tips t
                JOIN fixtures f ON f.id = t.fixture_id
                WHERE f.season_year = ?
            `,
            [seasonYear]
        );
        return rows.map((r) => ({
            userId: reqIntCol(r.user_id, "tips.user_id"),
            roundNumber: intCol(r.round_number),
            pointsAwarded: toPoints(r.points_awarded),
        }));
    }

    async listUserTipsForFixtures(userId: ID, fixtureIds: ID[]): Promise<Tip[]> {
        if (!fixtureIds.length) return [];
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT id, user_id, fixture_id, tip_team, points_awarded, created_at, updated_at
                FROM tips
                WHERE user_id = ? AND fixture_id IN (${placeholders(fixtureIds.length)})
            `,
            [userId, ...fixtureIds]
        );
        return rows.map(mapTip);
    }

    async renameTipTeam(fixtureId: ID, from: string, to: string): Promise<number> {
        const [res] = await this.pool.execute<ResultSetHeader>(
            `UPDATE tips SET tip_team = ? WHERE fixture_id = ? AND tip_team = ?`,
            [to, fixtureId, from]
        );
        return res.affectedRows;
    }
}
