// src/modules/sync/test/draw.fallback.spec.ts
import { FixtureRecord } from "../../../types/domain";
import { DrawFixture } from "../../draw/draw.client";
import { applyDrawFallback, drawEventId, isDrawOnlyId } from "../draw.fallback";
import { makeRecord } from "../../../testing/records";

const drawEntry = (over: Partial<DrawFixture> = {}): DrawFixture => ({
    roundNumber: 1,
    homeName: "Broncos",
    awayName: "Storm",
    kickoffUtc: "2026-03-06T09:00:00.000Z",
    venueName: "Suncorp Stadium",
    venueCity: "Brisbane",
    homeLogoUrl: "https://logo.test/broncos.svg",
    awayLogoUrl: null,
    matchCentreUrl: "/draw/nrl-premiership/2026/round-1/broncos-v-storm/",
    ...over,
});

const candidates = (...records: FixtureRecord[]) => new Map(records.map((r) => [r.sourceEventId, r]));

describe("applyDrawFallback", () => {
    test("matched fixture takes round, venue and logos but keeps its kickoff", () => {
        const rec = makeRecord({ kickoffUtc: "2026-03-06T10:00:00.000Z" });
        const res = applyDrawFallback(candidates(rec), [drawEntry()], 2026);

        expect(res.fixtures.get("evt-1")).toMatchObject({
            roundNumber: 1,
            venueName: "Suncorp Stadium",
            venueCity: "Brisbane",
            homeLogoUrl: "https://logo.test/broncos.svg",
            awayLogoUrl: null,
            kickoffUtc: "2026-03-06T10:00:00.000Z",
        });
        expect(res.authoritativeRounds.get("evt-1")).toBe(1);
        expect(Array.from(res.drawLinks)).toEqual([[drawEventId(2026, drawEntry()), "evt-1"]]);
        expect(res.counts).toEqual({
            drawFixturesLoaded: 1,
            fixturesEnriched: 1,
            fixturesFilteredOut: 0,
            drawFixturesAdded: 0,
        });
    });

    test("closest kickoff wins between two candidate entries", () => {
        const rec = makeRecord({ kickoffUtc: "2026-05-01T09:00:00.000Z" });
        const res = applyDrawFallback(
            candidates(rec),
            [
                drawEntry({ roundNumber: 8, kickoffUtc: "2026-04-30T08:00:00.000Z" }),
                drawEntry({ roundNumber: 9, kickoffUtc: "2026-05-01T11:00:00.000Z" }),
            ],
            2026
        );
        expect(res.fixtures.get("evt-1")?.roundNumber).toBe(9);
        // round 8 entry was not matched, so it is added as its own fixture
        expect(res.counts.drawFixturesAdded).toBe(1);
    });

    test("unmatched target-season candidates are dropped; other seasons pass through", () => {
        const outside = makeRecord({ sourceEventId: "old", seasonYear: 2025, kickoffUtc: "2025-08-01T09:00:00.000Z" });
        const stray = makeRecord({ sourceEventId: "stray", homeTeam: "Canberra Raiders", awayTeam: "Penrith Panthers" });
        const far = makeRecord({ sourceEventId: "far", kickoffUtc: "2026-03-09T09:00:00.000Z" });
        const res = applyDrawFallback(candidates(outside, stray, far), [drawEntry()], 2026, { matchWindowHours: 36 });

        expect(res.fixtures.has("old")).toBe(true);
        expect(res.fixtures.has("stray")).toBe(false);
        expect(res.fixtures.has("far")).toBe(false);
        expect(res.counts.fixturesFilteredOut).toBe(2);
    });

    test("draw-only entries become official_draw fixtures", () => {
        const entry = drawEntry({ homeName: "Sea Eagles", awayName: "Rabbitohs" });
        const res = applyDrawFallback(new Map(), [entry, drawEntry({ homeName: " ", awayName: "Eels" })], 2026);

        const id = drawEventId(2026, entry);
        expect(id).toBe("draw:2026:r1:seaeagles:vs:rabbitohs:2026-03-06T09:00:00000Z");
        expect(res.fixtures.get(id)).toMatchObject({
            source: "official_draw",
            seasonYear: 2026,
            roundNumber: 1,
            status: "scheduled",
            homeTeam: "Sea Eagles",
            awayTeam: "Rabbitohs",
        });
        expect(res.counts.drawFixturesAdded).toBe(1);
    });

    test("rounds outside 1..max are ignored; empty draw leaves candidates alone", () => {
        const rec = makeRecord();
        const res = applyDrawFallback(candidates(rec), [drawEntry({ roundNumber: 30 })], 2026, { maxRound: 27 });
        expect(res.counts.drawFixturesLoaded).toBe(0);
        expect(res.fixtures.get("evt-1")).toEqual(rec);
        expect(res.authoritativeRounds.size).toBe(0);
    });
});

describe("isDrawOnlyId", () => {
    test("recognises draw-only identities", () => {
        expect(isDrawOnlyId(drawEventId(2026, drawEntry()))).toBe(true);
        expect(isDrawOnlyId("evt-1")).toBe(false);
    });
});
