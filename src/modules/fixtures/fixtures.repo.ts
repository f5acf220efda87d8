// src/modules/fixtures/fixtures.repo.ts
import { Pool, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import { Fixture, FixtureRecord, FixtureStatus, ID } from "../../types/domain";
import {
    floatCol,
    intCol,
    isoCol,
    placeholders,
    reqIntCol,
    reqIsoCol,
    strCol,
} from "../../data/sql";

export interface FixtureFilter {
    seasonYear?: number;
    roundNumber?: number;
}

export interface RoundUpdate {
    id: ID;
    seasonYear: number;
    roundNumber: number;
}

export interface ResultUpdate {
    homeScore: number | null;
    awayScore: number | null;
    winner: string;
}

/** Persistence seam for fixtures; MySQL in production, in-memory in tests. */
export interface FixtureStore {
    getBySourceEventIds(ids: string[]): Promise<Fixture[]>;
    /** Insert or update by sourceEventId; one statement per fixture. */
    upsert(record: FixtureRecord, at: Date): Promise<void>;
    /** Delete fixtures whose season is set and differs; returns the count. */
    deleteOtherSeasons(seasonYear: number): Promise<number>;
    /** Ordered by season, kickoff, id. */
    listFixtures(filter?: FixtureFilter): Promise<Fixture[]>;
    getById(id: ID): Promise<Fixture | null>;
    setSeasonAndRound(updates: RoundUpdate[]): Promise<void>;
    /** Kicked off at or before `cutoff` and still lacking a usable final score. */
    listPendingResults(seasonYear: number, cutoff: Date): Promise<Fixture[]>;
    applyResult(id: ID, result: ResultUpdate, at: Date): Promise<void>;
    listRoundNumbers(seasonYear: number): Promise<number[]>;
    /** Re-key a row; its tips stay attached through the row id. */
    renameSourceEventId(id: ID, sourceEventId: string): Promise<void>;
    /**
     * Move tips from `fromId` onto `intoId` and delete `fromId`. A user who
     * already tipped `intoId` keeps that tip. Returns the number of tips moved.
     */
    absorbFixture(fromId: ID, intoId: ID): Promise<number>;
}

const COLUMNS = `
    id, source_event_id, source, kickoff_utc, home_team, away_team,
    venue_name, venue_city, home_logo_url, away_logo_url,
    season_year, round_number, status, home_score, away_score, winner,
    home_price, away_price, raw_json, updated_at
`;

function toStatus(v: unknown): FixtureStatus {
    return v === "completed" ? "completed" : "scheduled";
}

function mapFixture(r: RowDataPacket): Fixture {
    return {
        id: reqIntCol(r.id, "fixtures.id"),
        sourceEventId: strCol(r.source_event_id) ?? "",
        source: strCol(r.source),
        kickoffUtc: reqIsoCol(r.kickoff_utc, "fixtures.kickoff_utc"),
        homeTeam: strCol(r.home_team) ?? "",
        awayTeam: strCol(r.away_team) ?? "",
        venueName: strCol(r.venue_name),
        venueCity: strCol(r.venue_city),
        homeLogoUrl: strCol(r.home_logo_url),
        awayLogoUrl: strCol(r.away_logo_url),
        seasonYear: intCol(r.season_year),
        roundNumber: intCol(r.round_number),
        status: toStatus(r.status),
        homeScore: intCol(r.home_score),
        awayScore: intCol(r.away_score),
        winner: strCol(r.winner),
        homePrice: floatCol(r.home_price),
        awayPrice: floatCol(r.away_price),
        rawJson: strCol(r.raw_json),
        updatedAt: isoCol(r.updated_at) ?? "",
    };
}

export class FixturesRepo implements FixtureStore {
    constructor(public readonly pool: Pool) {}

    async getBySourceEventIds(ids: string[]): Promise<Fixture[]> {
        if (!ids.length) return [];
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `SELECT ${COLUMNS} FROM fixtures WHERE source_event_id IN (${placeholders(ids.length)})`,
            ids
        );
        return rows.map(mapFixture);
    }

    async upsert(f: FixtureRecord, at: Date): Promise<void> {
        await this.pool.execute(
            `
                INSERT INTO fixtures (
                    source_event_id, source, kickoff_utc, home_team, away_team,
                    venue_name, venue_city, home_logo_url, away_logo_url,
                    season_year, round_number, status, home_score, away_score, winner,
                    home_price, away_price, raw_json, updated_at
                )
                VALUES (${placeholders(19)})
                ON DUPLICATE KEY UPDATE
                    source = VALUES(source),
                    kickoff_utc = VALUES(kickoff_utc),
                    home_team = VALUES(home_team),
                    away_team = VALUES(away_team),
                    venue_name = VALUES(venue_name),
                    venue_city = VALUES(venue_city),
                    home_logo_url = VALUES(home_logo_url),
                    away_logo_url = VALUES(away_logo_url),
                    season_year = VALUES(season_year),
                    round_number = VALUES(round_number),
                    status = VALUES(status),
                    home_score = VALUES(home_score),
                    away_score = VALUES(away_score),
                    winner = VALUES(winner),
                    home_price = VALUES(home_price),
                    away_price = VALUES(away_price),
                    raw_json = VALUES(raw_json),
                    updated_at = VALUES(updated_at)
            `,
            [
                f.sourceEventId,
                f.source,
                new Date(f.kickoffUtc),
                f.homeTeam,
                f.awayTeam,
                f.venueName,
                f.venueCity,
                f.homeLogoUrl,
                f.awayLogoUrl,
                f.seasonYear,
                f.roundNumber,
                f.status,
                f.homeScore,
                f.awayScore,
                f.winner,
                f.homePrice,
                f.awayPrice,
                f.rawJson,
                at,
            ]
        );
    }

    async deleteOtherSeasons(seasonYear: number): Promise<number> {
        const [res] = await this.pool.execute<ResultSetHeader>(
            `DELETE FROM fixtures WHERE season_year IS NOT NULL AND season_year <> ?`,
            [seasonYear]
        );
        return res.affectedRows;
    }

    async listFixtures(filter: FixtureFilter = {}): Promise<Fixture[]> {
        const where: string[] = [];
        const params: number[] = [];
        if (filter.seasonYear !== undefined) {
            where.push("season_year = ?");
            params.push(filter.seasonYear);
        }
        if (filter.roundNumber !== undefined) {
            where.push("round_number = ?");
            params.push(filter.roundNumber);
        }
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT ${COLUMNS}
                FROM fixtures
                ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
                ORDER BY season_year, kickoff_utc, id
            `,
            params
        );
        return rows.map(mapFixture);
    }

    async getById(id: ID): Promise<Fixture | null> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `SELECT ${COLUMNS} FROM fixtures WHERE id = ? LIMIT 1`,
            [id]
        );
        return rows.length ? mapFixture(rows[0]) : null;
    }

    async setSeasonAndRound(updates: RoundUpdate[]): Promise<void> {
        if (!updates.length) return;
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            for (const u of updates) {
                await conn.execute(`UPDATE fixtures SET season_year = ?, round_number = ? WHERE id = ?`, [
                    u.seasonYear,
                    u.roundNumber,
                    u.id,
                ]);
            }
            await conn.commit();
        } catch (err) {
            await conn.rollback();
            throw err;
        } finally {
            conn.release();
        }
    }

    async listPendingResults(seasonYear: number, cutoff: Date): Promise<Fixture[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT ${COLUMNS}
                FROM fixtures
                WHERE season_year = ?
                  AND kickoff_utc <= ?
                  AND (
                      status <> 'completed'
                      OR home_score IS NULL
                      OR away_score IS NULL
                      OR winner IS NULL
                      OR winner = 'unknown'
                  )
                ORDER BY kickoff_utc ASC
            `,
            [seasonYear, cutoff]
        );
        return rows.map(mapFixture);
    }

    async applyResult(id: ID, result: ResultUpdate, at: Date): Promise<void> {
        await this.pool.execute(
            `
                UPDATE fixtures
                SET status = 'completed', home_score = ?, away_score = ?, winner = ?, updated_at = ?
                WHERE id = ?
            `,
            [result.homeScore, result.awayScore, result.winner, at, id]
        );
    }

    async listRoundNumbers(seasonYear: number): Promise<number[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `
                SELECT DISTINCT round_number
                FROM fixtures
                WHERE season_year = ? AND round_number IS NOT NULL
                ORDER BY round_number
            `,
            [seasonYear]
        );
        return rows.map((r) => intCol(r.round_number)).filter((n): n is number => n !== null);
    }

    async renameSourceEventId(id: ID, sourceEventId: string): Promise<void> {
        await this.pool.execute(`UPDATE fixtures SET source_event_id = ? WHERE id = ?`, [sourceEventId, id]);
    }

    async absorbFixture(fromId: ID, intoId: ID): Promise<number> {
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            const [moved] = await conn.execute<ResultSetHeader>(
                `UPDATE IGNORE tips SET fixture_id = ? WHERE fixture_id = ?`,
                [intoId, fromId]
            );
            // leftover duplicates go with the row (ON DELETE CASCADE)
            await conn.execute(`DELETE FROM fixtures WHERE id = ?`, [fromId]);
            await conn.commit();
            return moved.affectedRows;
        } catch (err) {
            await conn.rollback();
            throw err;
        } finally {
            conn.release();
        }
    }
}
