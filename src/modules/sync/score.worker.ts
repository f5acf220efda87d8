// src/modules/sync/score.worker.ts
import { errorMessage } from "../../utils/errors";
import { ScoreCatchUpSummary } from "./sync.service";

export interface ScoreWorkerOptions {
    intervalSeconds: number;
    /** Run once immediately on start instead of waiting a full interval. */
    runOnStart?: boolean;
}

export const MIN_INTERVAL_SECONDS = 60;

/**
 * Periodic driver for the score catch-up pass. Owns its own abort signal;
 * `stop()` is honoured between iterations, a pass already running finishes.
 */
export class ScoreWorker {
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;
    private readonly intervalMs: number;

    constructor(
        private readonly run: () => Promise<ScoreCatchUpSummary>,
        private readonly opts: ScoreWorkerOptions
    ) {
        this.intervalMs = Math.max(MIN_INTERVAL_SECONDS, opts.intervalSeconds) * 1000;
    }

    get running(): boolean {
        return this.controller !== null;
    }

    start(): void {
        if (this.controller) return;
        const controller = new AbortController();
        this.controller = controller;
        console.log("[score-worker] started", { intervalSeconds: this.intervalMs / 1000 });
        this.loop = this.runLoop(controller.signal);
    }

    /** Resolves once the loop has exited. */
    async stop(): Promise<void> {
        if (!this.controller) return;
        this.controller.abort();
        this.controller = null;
        const loop = this.loop;
        this.loop = null;
        if (loop) await loop;
        console.log("[score-worker] stopped");
    }

    /** One pass; failures are logged and left for the next cycle. */
    async tick(): Promise<void> {
        try {
            const s = await this.run();
            if (s.fixturesUpdated || s.autoUnderdogTipsAdded) {
                console.log("[score-worker] scores updated", {
                    seasonYear: s.seasonYear,
                    fixturesUpdated: s.fixturesUpdated,
                    autoTips: s.autoUnderdogTipsAdded,
                    tipsRescored: s.tipsRescored,
                });
            }
        } catch (err) {
            console.error("[score-worker] pass failed", { error: errorMessage(err) });
        }
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        if (this.opts.runOnStart && !signal.aborted) await this.tick();
        while (!signal.aborted) {
            await sleep(this.intervalMs, signal);
            if (signal.aborted) break;
            await this.tick();
        }
    }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal.addEventListener("abort", onAbort, { once: true });
    });
}
