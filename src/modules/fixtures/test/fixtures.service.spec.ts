// src/modules/fixtures/test/fixtures.service.spec.ts
import { FixturesService } from "../fixtures.service";
import { createMemoryStores } from "../../../testing/memoryStore";
import { makeRecord } from "../../../testing/records";

function setup() {
    const stores = createMemoryStores();
    const rows = stores.fixtures.seed([
        makeRecord({ sourceEventId: "r1a", kickoffUtc: "2026-03-05T09:00:00.000Z", roundNumber: 1, status: "completed", winner: "draw" }),
        makeRecord({ sourceEventId: "r1b", kickoffUtc: "2026-03-06T09:00:00.000Z", roundNumber: 1, status: "completed", winner: "draw" }),
        makeRecord({ sourceEventId: "r2a", kickoffUtc: "2026-03-12T09:00:00.000Z", roundNumber: 2 }),
        makeRecord({ sourceEventId: "r2b", kickoffUtc: "2026-03-13T09:00:00.000Z", roundNumber: 2 }),
        makeRecord({ sourceEventId: "r3a", kickoffUtc: "2026-03-19T09:00:00.000Z", roundNumber: 3 }),
        makeRecord({ sourceEventId: "old", kickoffUtc: "2025-09-01T09:00:00.000Z", seasonYear: 2025, roundNumber: 27 }),
    ]);
    return { stores, rows, svc: new FixturesService(stores.fixtures, stores.tips, { lockMinutes: 5 }) };
}

describe("FixturesService", () => {
    test("current round is the round of the next kickoff", async () => {
        const { svc } = setup();
        expect(await svc.getCurrentRound(2026, new Date("2026-03-07T00:00:00.000Z"))).toBe(2);
        expect(await svc.getCurrentRound(2026, new Date("2026-03-12T09:00:00.000Z"))).toBe(2);
        expect(await svc.getCurrentRound(2026, new Date("2026-03-12T09:00:01.000Z"))).toBe(2);
        expect(await svc.getCurrentRound(2026, new Date("2026-03-14T00:00:00.000Z"))).toBe(3);
    });

    test("after the last kickoff the lowest round; empty season null", async () => {
        const { svc } = setup();
        expect(await svc.getCurrentRound(2026, new Date("2026-12-01T00:00:00.000Z"))).toBe(1);
        expect(await svc.getCurrentRound(2030, new Date("2026-12-01T00:00:00.000Z"))).toBeNull();
    });

    test("round view carries lock state and the user's tip", async () => {
        const { stores, rows, svc } = setup();
        await stores.tips.insertIfAbsent({ userId: 7, fixtureId: rows[3].id, tipTeam: "Melbourne Storm", at: "x" });

        const view = await svc.getRoundView(2026, 2, new Date("2026-03-12T08:56:00.000Z"), 7);
        expect(view.roundLocked).toBe(true);
        expect(view.fixtures.map((f) => [f.sourceEventId, f.locked, f.lockDeadlineUtc, f.userTip?.tipTeam ?? null])).toEqual([
            ["r2a", true, "2026-03-12T08:55:00.000Z", null],
            ["r2b", false, "2026-03-13T08:55:00.000Z", "Melbourne Storm"],
        ]);
    });

    test("completed rounds need every fixture completed", async () => {
        const { stores, svc } = setup();
        expect(await svc.listCompletedRounds(2026)).toEqual([1]);
        await stores.fixtures.applyResult(3, { homeScore: 10, awayScore: 4, winner: "Brisbane Broncos" }, new Date());
        expect(await svc.listCompletedRounds(2026)).toEqual([1]);
        await stores.fixtures.applyResult(4, { homeScore: 10, awayScore: 4, winner: "Brisbane Broncos" }, new Date());
        expect(await svc.listCompletedRounds(2026)).toEqual([1, 2]);
        expect(await svc.listRoundNumbers(2026)).toEqual([1, 2, 3]);
    });
});
