// src/modules/sync/test/sync.service.spec.ts
import { buildServices } from "../../../services";
import { AppError, ConfigError, ConflictError } from "../../../utils/errors";
import { createTimezoneProvider } from "../../../utils/timezone";
import { DrawFixture } from "../../draw/draw.client";
import { SourcePull } from "../../odds/odds.client";
import { drawEventId } from "../draw.fallback";
import { LAST_SYNC_SUMMARY_KEY } from "../sync.service";
import {
    FakeDrawSource,
    FakeOddsSource,
    MemoryRawWriter,
    MemoryStores,
    createMemoryStores,
} from "../../../testing/memoryStore";
import { makeRecord, makeUser } from "../../../testing/records";

const NOW = new Date("2026-03-20T00:00:00.000Z");

const upcomingEvent = {
    id: "e1",
    home_team: "Brisbane Broncos",
    away_team: "Melbourne Storm",
    commence_time: "2026-03-26T09:00:00Z",
    bookmakers: [
        {
            markets: [
                {
                    key: "h2h",
                    outcomes: [
                        { name: "Brisbane Broncos", price: 1.5 },
                        { name: "Melbourne Storm", price: 3.2 },
                    ],
                },
            ],
        },
    ],
};
const playedEvent = {
    id: "e2",
    home_team: "Cronulla Sharks",
    away_team: "Gold Coast Titans",
    commence_time: "2026-03-06T08:00:00Z",
};
const playedScores = {
    ...playedEvent,
    completed: true,
    scores: [
        { name: "Cronulla Sharks", score: "30" },
        { name: "Gold Coast Titans", score: "6" },
    ],
};

const broncosStorm: DrawFixture = {
    roundNumber: 3,
    homeName: "Broncos",
    awayName: "Storm",
    kickoffUtc: "2026-03-26T09:00:00.000Z",
    venueName: "Suncorp Stadium",
    venueCity: "Brisbane",
    homeLogoUrl: null,
    awayLogoUrl: null,
    matchCentreUrl: "/draw/nrl-premiership/2026/round-3/broncos-v-storm/",
};

const pull = (source: SourcePull["source"], events: Record<string, unknown>[]): SourcePull => ({
    source,
    events,
    details: {},
});

function setup(stores: MemoryStores = createMemoryStores([makeUser(1)])) {
    const odds = new FakeOddsSource(
        pull("upcoming_odds", [upcomingEvent]),
        pull("scores", [playedScores]),
        pull("historical_odds", [playedEvent])
    );
    const draw = new FakeDrawSource([]);
    const raw = new MemoryRawWriter();
    const tz = createTimezoneProvider("Not/AZone", 600);
    const services = buildServices(stores, { odds, draw, raw }, tz, {
        lockMinutes: 5,
        roundGapHours: 60,
        drawMatchWindowHours: 36,
        maxRound: 27,
        sportKey: "rugbyleague_nrl",
    });
    return { stores, odds, draw, raw, sync: services.sync };
}

beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

describe("SyncService.runFullSync", () => {
    test("first run inserts, numbers rounds, auto-tips and scores", async () => {
        const stores = createMemoryStores([makeUser(1)]);
        stores.fixtures.seed([makeRecord({ sourceEventId: "old", seasonYear: 2025, kickoffUtc: "2025-08-01T09:00:00.000Z" })]);
        const { sync, raw } = setup(stores);

        const summary = await sync.runFullSync({ now: NOW });

        expect(summary).toMatchObject({
            seasonYear: 2026,
            inserted: 2,
            updated: 0,
            unchanged: 0,
            totalMerged: 2,
            prunedOtherSeasonFixtures: 1,
            roundsAssigned: 2,
            autoUnderdogTipsAdded: 1,
            tipsRescored: 1,
            rawDownloadFile: "memory://season_2026.json",
            bySourceCounts: { upcoming_odds: 1, scores: 1, historical_odds: 1 },
            warnings: [],
        });

        const rows = await stores.fixtures.listFixtures();
        expect(rows.map((f) => [f.sourceEventId, f.roundNumber, f.status, f.winner])).toEqual([
            ["e2", 1, "completed", "Cronulla Sharks"],
            ["e1", 2, "scheduled", null],
        ]);
        // no prices on e2, so the home side is the auto pick, and it won
        expect(stores.tips.rows.map((t) => [t.userId, t.tipTeam, t.pointsAwarded])).toEqual([[1, "Cronulla Sharks", 1]]);
        expect(raw.written.map((w) => w.seasonYear)).toEqual([2026]);
        expect(stores.settings.values.get("last_sync_utc")).toBe(NOW.toISOString());
    });

    test("rerun with unchanged sources writes nothing", async () => {
        const { sync, stores } = setup();
        await sync.runFullSync({ now: NOW });
        const writes = stores.fixtures.upserts;

        const second = await sync.runFullSync({ now: NOW });

        expect(second).toMatchObject({
            inserted: 0,
            updated: 0,
            unchanged: 2,
            prunedOtherSeasonFixtures: 0,
            roundsAssigned: 0,
            autoUnderdogTipsAdded: 0,
        });
        expect(stores.fixtures.upserts).toBe(writes);
        expect(stores.tips.rows).toHaveLength(1);
    });

    test("keep-other-seasons skips pruning", async () => {
        const stores = createMemoryStores();
        stores.fixtures.seed([makeRecord({ sourceEventId: "old", seasonYear: 2025, kickoffUtc: "2025-08-01T09:00:00.000Z" })]);
        const { sync } = setup(stores);

        const summary = await sync.runFullSync({ now: NOW, pruneOtherSeasons: false });
        expect(summary.prunedOtherSeasonFixtures).toBe(0);
        expect(stores.fixtures.rows.map((f) => f.sourceEventId)).toContain("old");
    });

    test("one failed source is a warning", async () => {
        const { sync, odds } = setup();
        odds.scores = new Error("scores down");

        const summary = await sync.runFullSync({ now: NOW });
        expect(summary.warnings).toEqual(["scores: scores down"]);
        expect(summary.inserted).toBe(2);
        expect(summary.bySourceCounts).toEqual({ upcoming_odds: 1, historical_odds: 1 });
    });

    test("upcoming and history both failing aborts the sync", async () => {
        const { sync, odds, stores } = setup();
        odds.upcoming = new Error("timeout");
        odds.history = new Error("404");

        const err = await sync.runFullSync({ now: NOW }).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(AppError);
        expect(err).toMatchObject({ status: 502, code: "SYNC_SOURCES_FAILED" });
        expect(stores.fixtures.rows).toHaveLength(0);
    });

    test("draw enrichment overrides stored rounds and adds draw-only fixtures", async () => {
        const stores = createMemoryStores();
        stores.fixtures.seed([
            makeRecord({
                sourceEventId: "e1",
                kickoffUtc: "2026-03-26T09:00:00.000Z",
                roundNumber: 2,
                rawJson: JSON.stringify(upcomingEvent),
            }),
        ]);
        const { sync, draw } = setup(stores);
        draw.result = [
            {
                roundNumber: 3,
                homeName: "Broncos",
                awayName: "Storm",
                kickoffUtc: "2026-03-26T09:00:00.000Z",
                venueName: "Suncorp Stadium",
                venueCity: "Brisbane",
                homeLogoUrl: null,
                awayLogoUrl: null,
                matchCentreUrl: "/draw/nrl-premiership/2026/round-3/broncos-v-storm/",
            },
            {
                roundNumber: 3,
                homeName: "Eels",
                awayName: "Tigers",
                kickoffUtc: "2026-03-27T09:00:00.000Z",
                venueName: null,
                venueCity: null,
                homeLogoUrl: null,
                awayLogoUrl: null,
                matchCentreUrl: "/draw/nrl-premiership/2026/round-3/eels-v-tigers/",
            },
        ];

        const summary = await sync.runFullSync({ now: NOW });

        expect(summary.drawEnrichment).toEqual({
            drawFixturesLoaded: 2,
            fixturesEnriched: 1,
            fixturesFilteredOut: 1,
            drawFixturesAdded: 1,
        });
        const rows = await stores.fixtures.listFixtures({ seasonYear: 2026 });
        expect(rows.map((f) => [f.sourceEventId, f.roundNumber, f.venueName])).toEqual([
            ["e1", 3, "Suncorp Stadium"],
            ["draw:2026:r3:eels:vs:tigers:2026-03-27T09:00:00000Z", 3, null],
        ]);
    });

    test("a draw-only fixture is re-keyed once odds arrive, tips and all", async () => {
        const { sync, odds, draw, stores } = setup();
        odds.upcoming = pull("upcoming_odds", []);
        odds.scores = pull("scores", []);
        odds.history = pull("historical_odds", []);
        draw.result = [broncosStorm];

        const first = await sync.runFullSync({ now: NOW });
        expect(first.drawEnrichment.drawFixturesAdded).toBe(1);
        expect(stores.fixtures.rows.map((f) => f.sourceEventId)).toEqual([drawEventId(2026, broncosStorm)]);
        const fixtureId = stores.fixtures.rows[0].id;
        await stores.tips.upsertUserTip({ userId: 1, fixtureId, tipTeam: "Broncos", at: NOW.toISOString() });

        odds.upcoming = pull("upcoming_odds", [upcomingEvent]);
        const second = await sync.runFullSync({ now: NOW });

        expect(second).toMatchObject({ drawOnlyRelinked: 1, inserted: 0, updated: 1, totalMerged: 1 });
        expect(stores.fixtures.rows.map((f) => [f.id, f.sourceEventId, f.homeTeam])).toEqual([
            [fixtureId, "e1", "Brisbane Broncos"],
        ]);
        expect(stores.tips.rows.map((t) => [t.userId, t.fixtureId, t.tipTeam])).toEqual([
            [1, fixtureId, "Brisbane Broncos"],
        ]);

        odds.scores = pull("scores", [
            {
                ...upcomingEvent,
                completed: true,
                scores: [
                    { name: "Brisbane Broncos", score: "20" },
                    { name: "Melbourne Storm", score: "10" },
                ],
            },
        ]);
        const catchUp = await sync.runScoreCatchUp({ now: new Date("2026-03-27T00:00:00.000Z") });
        expect(catchUp.fixturesUpdated).toBe(1);
        expect(stores.tips.rows[0].pointsAwarded).toBe(1);
    });

    test("a draw-only row is folded into an existing odds row", async () => {
        const stores = createMemoryStores([makeUser(1), makeUser(2)]);
        const [drawOnly, oddsRow] = stores.fixtures.seed([
            makeRecord({
                sourceEventId: drawEventId(2026, broncosStorm),
                source: "official_draw",
                homeTeam: "Broncos",
                awayTeam: "Storm",
                kickoffUtc: "2026-03-26T09:00:00.000Z",
                roundNumber: 3,
            }),
            makeRecord({ sourceEventId: "e1", kickoffUtc: "2026-03-26T09:00:00.000Z" }),
        ]);
        const at = NOW.toISOString();
        await stores.tips.insertIfAbsent({ userId: 1, fixtureId: drawOnly.id, tipTeam: "Storm", at });
        await stores.tips.insertIfAbsent({ userId: 2, fixtureId: drawOnly.id, tipTeam: "Broncos", at });
        await stores.tips.insertIfAbsent({ userId: 2, fixtureId: oddsRow.id, tipTeam: "Melbourne Storm", at });
        const { sync, draw } = setup(stores);
        draw.result = [broncosStorm];

        const summary = await sync.runFullSync({ now: NOW });

        expect(summary.drawOnlyRelinked).toBe(1);
        expect(summary.inserted).toBe(0);
        expect(stores.fixtures.rows.map((f) => [f.id, f.sourceEventId])).toEqual([[oddsRow.id, "e1"]]);
        // user 2 already tipped the odds row; that tip wins
        expect(stores.tips.rows.map((t) => [t.userId, t.fixtureId, t.tipTeam])).toEqual([
            [1, oddsRow.id, "Melbourne Storm"],
            [2, oddsRow.id, "Melbourne Storm"],
        ]);
    });

    test("draw failure is recorded and enrichment skipped", async () => {
        const { sync, draw } = setup();
        draw.result = new Error("Draw page HTTP 503: maintenance");

        const summary = await sync.runFullSync({ now: NOW });
        expect(summary.drawEnrichment.error).toBe("Draw page HTTP 503: maintenance");
        expect(summary.warnings).toEqual(["official_draw: Draw page HTTP 503: maintenance"]);
        expect(summary.inserted).toBe(2);
    });

    test("missing API key", async () => {
        const { sync, odds } = setup();
        odds.configured = false;
        expect(sync.configured).toBe(false);
        await expect(sync.runFullSync({ now: NOW })).rejects.toBeInstanceOf(ConfigError);
    });

    test("a second run while one is in flight is refused", async () => {
        const { sync } = setup();
        const first = sync.runFullSync({ now: NOW });
        await expect(sync.runScoreCatchUp({ now: NOW })).rejects.toBeInstanceOf(ConflictError);
        await first;
        expect((await sync.getStatus()).running).toBeNull();
    });

    test("status reads back the stored summary", async () => {
        const { sync, stores } = setup();
        await sync.runFullSync({ now: NOW });

        const status = await sync.getStatus();
        expect(status.lastSyncUtc).toBe("2026-03-20T00:00:00.000Z");
        expect(status.lastSyncSummary).toMatchObject({ seasonYear: 2026, inserted: 2 });

        await stores.settings.set(LAST_SYNC_SUMMARY_KEY, "{oops");
        expect((await sync.getStatus()).lastSyncSummary).toBeNull();
    });
});

describe("SyncService.runScoreCatchUp", () => {
    function seeded() {
        const stores = createMemoryStores([makeUser(1)]);
        stores.fixtures.seed([
            makeRecord({ sourceEventId: "due", kickoffUtc: "2026-03-18T09:00:00.000Z", roundNumber: 1 }),
            makeRecord({ sourceEventId: "recent", kickoffUtc: "2026-03-19T23:00:00.000Z", roundNumber: 1 }),
            makeRecord({
                sourceEventId: "done",
                kickoffUtc: "2026-03-17T09:00:00.000Z",
                roundNumber: 1,
                status: "completed",
                homeScore: 10,
                awayScore: 12,
                winner: "Melbourne Storm",
            }),
        ]);
        return setup(stores);
    }

    test("applies results to due fixtures and rescores", async () => {
        const { sync, odds, stores } = seeded();
        odds.scores = pull("scores", [
            {
                id: "due",
                home_team: "Brisbane Broncos",
                away_team: "Melbourne Storm",
                commence_time: "2026-03-18T09:00:00Z",
                completed: true,
                scores: [
                    { name: "Brisbane Broncos", score: 14 },
                    { name: "Melbourne Storm", score: 22 },
                ],
            },
            { id: "nope", home_team: "A", away_team: "B", commence_time: "2025-09-01T09:00:00Z", completed: true, scores: [] },
            { id: "blank", home_team: "C", away_team: "D", commence_time: "2026-03-19T09:00:00Z", completed: true },
        ]);

        const summary = await sync.runScoreCatchUp({ now: NOW });

        // oldest due fixture is 1d15h old: floor(1) + 2
        expect(odds.scoresCalls).toEqual([3]);
        expect(summary).toEqual({
            seasonYear: 2026,
            pendingDueFixtures: 1,
            apiCompletedEvents: 1,
            fixturesUpdated: 1,
            autoUnderdogTipsAdded: 3,
            tipsRescored: 2,
            daysBackRequested: 3,
            sourceDetails: {},
        });
        const due = stores.fixtures.rows.find((f) => f.sourceEventId === "due");
        expect(due).toMatchObject({ status: "completed", homeScore: 14, awayScore: 22, winner: "Melbourne Storm" });
    });

    test("a larger requested window wins over the inferred one", async () => {
        const { sync, odds } = seeded();
        await sync.runScoreCatchUp({ now: NOW, daysBack: 10 });
        expect(odds.scoresCalls).toEqual([10]);
    });

    test("draw-only rows do not widen the scores window", async () => {
        const stores = createMemoryStores();
        const earlier = { ...broncosStorm, kickoffUtc: "2026-03-01T09:00:00.000Z" };
        stores.fixtures.seed([
            makeRecord({ sourceEventId: "due", kickoffUtc: "2026-03-18T09:00:00.000Z" }),
            makeRecord({
                sourceEventId: drawEventId(2026, earlier),
                source: "official_draw",
                kickoffUtc: earlier.kickoffUtc,
            }),
        ]);
        const { sync, odds } = setup(stores);

        const summary = await sync.runScoreCatchUp({ now: NOW });

        expect(odds.scoresCalls).toEqual([3]);
        expect(summary.pendingDueFixtures).toBe(1);
    });

    test("nothing due -> no upstream call", async () => {
        const { sync, odds } = setup(createMemoryStores());
        const summary = await sync.runScoreCatchUp({ now: NOW });
        expect(summary.pendingDueFixtures).toBe(0);
        expect(odds.scoresCalls).toEqual([]);
    });
});
