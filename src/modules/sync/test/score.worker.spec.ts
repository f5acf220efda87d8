// src/modules/sync/test/score.worker.spec.ts
import { ScoreWorker } from "../score.worker";
import { ScoreCatchUpSummary } from "../sync.service";

const summary = (over: Partial<ScoreCatchUpSummary> = {}): ScoreCatchUpSummary => ({
    seasonYear: 2026,
    pendingDueFixtures: 0,
    apiCompletedEvents: 0,
    fixturesUpdated: 0,
    autoUnderdogTipsAdded: 0,
    tipsRescored: 0,
    daysBackRequested: 0,
    sourceDetails: {},
    ...over,
});

describe("ScoreWorker", () => {
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, "log").mockImplementation(() => undefined);
        error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("interval never drops below a minute", () => {
        const worker = new ScoreWorker(async () => summary(), { intervalSeconds: 5 });
        worker.start();
        expect(log).toHaveBeenCalledWith("[score-worker] started", { intervalSeconds: 60 });
        return worker.stop();
    });

    test("runs once on start and stops between iterations", async () => {
        const run = jest.fn(async () => summary());
        const worker = new ScoreWorker(run, { intervalSeconds: 900, runOnStart: true });

        worker.start();
        expect(worker.running).toBe(true);
        await worker.stop();

        expect(worker.running).toBe(false);
        expect(run).toHaveBeenCalledTimes(1);
    });

    test("without runOnStart nothing runs before the first interval", async () => {
        const run = jest.fn(async () => summary());
        const worker = new ScoreWorker(run, { intervalSeconds: 900 });
        worker.start();
        await worker.stop();
        expect(run).not.toHaveBeenCalled();
    });

    test("a failing pass is logged, not thrown", async () => {
        const worker = new ScoreWorker(async () => {
            throw new Error("boom");
        }, { intervalSeconds: 900 });

        await worker.tick();
        expect(error).toHaveBeenCalledWith("[score-worker] pass failed", { error: "boom" });
    });

    test("logs only when something changed", async () => {
        const results = [summary(), summary({ fixturesUpdated: 2, tipsRescored: 5 })];
        const worker = new ScoreWorker(async () => results.shift() ?? summary(), { intervalSeconds: 900 });

        await worker.tick();
        expect(log).not.toHaveBeenCalled();
        await worker.tick();
        expect(log).toHaveBeenCalledWith("[score-worker] scores updated", {
            seasonYear: 2026,
            fixturesUpdated: 2,
            autoTips: 0,
            tipsRescored: 5,
        });
    });
});
