// src/modules/predictions/predictions.repo.ts
import { Pool, PoolConnection, RowDataPacket } from "mysql2/promise";
import { AdjustDirection, ID, LadderAdjustment } from "../../types/domain";
import { reqIntCol, reqIsoCol, strCol } from "../../data/sql";
import { ConflictError, isDuplicateKeyError } from "../../utils/errors";

export interface StoredPrediction {
    userId: ID;
    /** Team names, index 0 = predicted first place. */
    teams: string[];
}

export interface PredictionStore {
    getPrediction(userId: ID, seasonYear: number): Promise<string[]>;
    /** Replace the user's whole order for the season in one unit of work. */
    replacePrediction(userId: ID, seasonYear: number, teams: string[]): Promise<void>;
    listPredictions(seasonYear: number): Promise<StoredPrediction[]>;
    listAdjustments(userId: ID, seasonYear: number): Promise<LadderAdjustment[]>;
    /** Record the adjustment and store the adjusted order together. */
    saveAdjustment(adj: LadderAdjustment, teams: string[]): Promise<void>;
}

function toDirection(v: unknown): AdjustDirection {
    return v === "down" ? "down" : "up";
}

export class PredictionsRepo implements PredictionStore {
    constructor(public readonly pool: Pool) {}

    async getPrediction(userId: ID, seasonYear: number): Promise<string[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT team
                FROM ladder_predictions
                WHERE user_id = ? AND season_year = ?
                ORDER BY position
            `,
            [userId, seasonYear]
        );
        return rows.map((r) => strCol(r.team) ?? "");
    }

    async replacePrediction(userId: ID, seasonYear: number, teams: string[]): Promise<void> {
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            await this.writeOrder(conn, userId, seasonYear, teams);
            await conn.commit();
        } catch (err) {
            await conn.rollback();
            throw err;
        } finally {
            conn.release();
        }
    }

    private async writeOrder(
        conn: PoolConnection,
        userId: ID,
        seasonYear: number,
        teams: string[]
    ): Promise<void> {
        await conn.execute(`DELETE FROM ladder_predictions WHERE user_id = ? AND season_year = ?`, [
            userId,
            seasonYear,
        ]);
        for (const [i, team] of teams.entries()) {
            await conn.execute(
                `INSERT INTO ladder_predictions (user_id, season_year, team, position) VALUES (?, ?, ?, ?)`,
                [userId, seasonYear, team, i + 1]
            );
        }
    }

    async listPredictions(seasonYear: number): Promise<StoredPrediction[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT user_id, team
                FROM ladder_predictions
                WHERE season_year = ?
                ORDER BY user_id, position
            `,
            [seasonYear]
        );
        const byUser = new Map<ID, string[]>();
        for (const r of rows) {
            const uid = reqIntCol(r.user_id, "ladder_predictions.user_id");
            const list = byUser.get(uid) ?? [];
            list.push(strCol(r.team) ?? "");
            byUser.set(uid, list);
        }
        return Array.from(byUser, ([userId, teams]) => ({ userId, teams }));
    }

    async listAdjustments(userId: ID, seasonYear: number): Promise<LadderAdjustment[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT user_id, season_year, round_number, team, direction, created_at
                FROM ladder_adjustments
                WHERE user_id = ? AND season_year = ?
                ORDER BY round_number
            `,
            [userId, seasonYear]
        );
        return rows.map((r) => ({
            userId: reqIntCol(r.user_id, "ladder_adjustments.user_id"),
            seasonYear: reqIntCol(r.season_year, "ladder_adjustments.season_year"),
            roundNumber: reqIntCol(r.round_number, "ladder_adjustments.round_number"),
            team: strCol(r.team) ?? "",
            direction: toDirection(r.direction),
            createdAt: reqIsoCol(r.created_at, "ladder_adjustments.created_at"),
        }));
    }

    async saveAdjustment(adj: LadderAdjustment, teams: string[]): Promise<void> {
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            await conn.execute(
                `
                    INSERT INTO ladder_adjustments (user_id, season_year, round_number, team, direction, created_at)
                    VALUES (?, ?, ?, ?, ?, ?)
                `,
                [adj.userId, adj.seasonYear, adj.roundNumber, adj.team, adj.direction, new Date(adj.createdAt)]
            );
            await this.writeOrder(conn, adj.userId, adj.seasonYear, teams);
            await conn.commit();
        } catch (err) {
            await conn.rollback();
            // a concurrent request took this round first
            if (isDuplicateKeyError(err)) throw new ConflictError(`Round ${adj.roundNumber} adjustment already used.`);
            throw err;
        } finally {
            conn.release();
        }
    }
}
