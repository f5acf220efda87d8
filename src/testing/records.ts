// src/testing/records.ts
import { FixtureRecord, User } from "../types/domain";

export function makeRecord(over: Partial<FixtureRecord> = {}): FixtureRecord {
    return {
        sourceEventId: "evt-1",
        source: "upcoming_odds",
        kickoffUtc: "2026-03-06T09:00:00.000Z",
        homeTeam: "Brisbane Broncos",
        awayTeam: "Melbourne Storm",
        venueName: null,
        venueCity: null,
        homeLogoUrl: null,
        awayLogoUrl: null,
        seasonYear: 2026,
        roundNumber: null,
        status: "scheduled",
        homeScore: null,
        awayScore: null,
        winner: null,
        homePrice: null,
        awayPrice: null,
        rawJson: null,
        ...over,
    };
}

export function makeUser(id: number, over: Partial<User> = {}): User {
    return {
        id,
        displayName: `Player ${id}`,
        isAdmin: false,
        createdAt: "2026-01-01T00:00:00.000Z",
        ...over,
    };
}
