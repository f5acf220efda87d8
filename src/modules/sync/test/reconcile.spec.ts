// src/modules/sync/test/reconcile.spec.ts
import { mergeCandidates } from "../reconcile";

const ev = (id: string, over: Record<string, unknown> = {}) => ({
    id,
    home_team: "Cronulla Sharks",
    away_team: "Gold Coast Titans",
    commence_time: "2026-03-07T06:00:00Z",
    ...over,
});

describe("mergeCandidates", () => {
    test("one candidate per event id across pulls", () => {
        const { fixtures, bySourceCounts } = mergeCandidates([
            {
                source: "upcoming_odds",
                events: [
                    ev("a", {
                        bookmakers: [
                            {
                                markets: [
                                    {
                                        key: "h2h",
                                        outcomes: [
                                            { name: "Cronulla Sharks", price: 1.4 },
                                            { name: "Gold Coast Titans", price: 3.0 },
                                        ],
                                    },
                                ],
                            },
                        ],
                    }),
                    ev("b"),
                    { id: "broken" },
                ],
                details: {},
            },
            {
                source: "scores",
                events: [
                    ev("a", {
                        completed: true,
                        scores: [
                            { name: "Cronulla Sharks", score: "30" },
                            { name: "Gold Coast Titans", score: "6" },
                        ],
                    }),
                ],
                details: {},
            },
        ]);

        expect(bySourceCounts).toEqual({ upcoming_odds: 3, scores: 1 });
        expect(Array.from(fixtures.keys())).toEqual(["a", "b"]);
        expect(fixtures.get("a")).toMatchObject({
            source: "scores",
            status: "completed",
            homeScore: 30,
            awayScore: 6,
            winner: "Cronulla Sharks",
            homePrice: 1.4,
            awayPrice: 3.0,
        });
    });
});
