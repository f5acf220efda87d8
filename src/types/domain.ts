// src/types/domain.ts
// === Core domain models (camelCase mirrors of the DB tables) ===

export type ID = number;

export type FixtureStatus = "scheduled" | "completed";

/** Winner marker for a finished match that ended level. */
export const WINNER_DRAW = "draw";
/** Winner marker for a finished match whose score could not be read. */
export const WINNER_UNKNOWN = "unknown";

export type SourceTag = "upcoming_odds" | "scores" | "historical_odds" | "official_draw";

/**
 * Everything we persist about one real-world match, minus the row id.
 * Kickoff is always an ISO-8601 UTC string (`toISOString()` shape).
 */
export interface FixtureRecord {
    sourceEventId: string;
    source: string | null;
    kickoffUtc: string;
    homeTeam: string;
    awayTeam: string;
    venueName: string | null;
    venueCity: string | null;
    homeLogoUrl: string | null;
    awayLogoUrl: string | null;
    seasonYear: number | null;
    roundNumber: number | null;
    status: FixtureStatus;
    homeScore: number | null;
    awayScore: number | null;
    /** team name | "draw" | "unknown" | null */
    winner: string | null;
    homePrice: number | null;
    awayPrice: number | null;
    rawJson: string | null;
}

export interface Fixture extends FixtureRecord {
    id: ID;
    updatedAt: string;
}

export type TipPoints = 0 | 1 | null;

export interface Tip {
    id: ID;
    userId: ID;
    fixtureId: ID;
    tipTeam: string;
    pointsAwarded: TipPoints;
    createdAt: string;
    updatedAt: string;
}

export interface NewTip {
    userId: ID;
    fixtureId: ID;
    tipTeam: string;
    at: string;
}

/** The slice of a user account the engine needs. */
export interface User {
    id: ID;
    displayName: string;
    isAdmin: boolean;
    createdAt: string;
}

export interface LadderStanding {
    team: string;
    played: number;
    won: number;
    lost: number;
    drawn: number;
    pointsFor: number;
    pointsAgainst: number;
    pointDiff: number;
    compPoints: number;
    logoUrl: string | null;
}

export interface LeaderboardEntry {
    userId: ID;
    displayName: string;
    tipsMade: number;
    correctTips: number;
    totalPoints: number;
    /** round number -> points; every known round is present */
    roundPoints: Record<number, number>;
}

export type AdjustDirection = "up" | "down";

export interface LadderAdjustment {
    userId: ID;
    seasonYear: number;
    roundNumber: number;
    team: string;
    direction: AdjustDirection;
    createdAt: string;
}

export interface LadderPredictionEntry {
    userId: ID;
    displayName: string;
    score: number;
    teamsPredicted: number;
}
