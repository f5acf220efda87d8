// src/modules/sync/sync.service.ts
import { FixtureRecord, WINNER_UNKNOWN } from "../../types/domain";
import { AppError, ConfigError, ConflictError, errorMessage } from "../../utils/errors";
import { TimezoneProvider, localYear } from "../../utils/timezone";
import { DrawFixture, DrawSource } from "../draw/draw.client";
import { FixtureStore } from "../fixtures/fixtures.repo";
import { mergeFixture, recordsEqual, toRecord } from "../fixtures/fixtures.merge";
import { OddsSource, SourcePull } from "../odds/odds.client";
import { normalizeOddsEvent } from "../odds/odds.normalize";
import { ScoringService } from "../scoring/scoring.service";
import { SettingsStore } from "../settings/settings.repo";
import { TipsService } from "../tips/tips.service";
import { DrawEnrichment, applyDrawFallback, isDrawOnlyId } from "./draw.fallback";
import { RawPayloadWriter } from "./raw.writer";
import { mergeCandidates } from "./reconcile";
import { DEFAULT_ROUND_GAP_HOURS, assignRoundNumbers } from "./rounds";

export const LAST_SYNC_UTC_KEY = "last_sync_utc";
export const LAST_SYNC_SUMMARY_KEY = "last_sync_summary";

export interface SyncDeps {
    odds: OddsSource;
    draw: DrawSource;
    fixtures: FixtureStore;
    settings: SettingsStore;
    tips: TipsService;
    scoring: ScoringService;
    raw: RawPayloadWriter;
    tz: TimezoneProvider;
}

export interface SyncOptions {
    sportKey?: string;
    roundGapHours?: number;
    drawMatchWindowHours?: number;
    maxRound?: number;
}

export interface FullSyncParams {
    seasonYear?: number;
    daysBack?: number;
    pruneOtherSeasons?: boolean;
    now?: Date;
}

export interface SyncSummary {
    seasonYear: number;
    inserted: number;
    updated: number;
    unchanged: number;
    totalMerged: number;
    prunedOtherSeasonFixtures: number;
    /** Stored draw-only rows re-keyed onto (or folded into) their odds fixture. */
    drawOnlyRelinked: number;
    roundsAssigned: number;
    autoUnderdogTipsAdded: number;
    tipsRescored: number;
    rawDownloadFile: string;
    bySourceCounts: Record<string, number>;
    sourceDetails: Record<string, Record<string, unknown>>;
    drawEnrichment: DrawEnrichment;
    warnings: string[];
}

export interface ScoreCatchUpParams {
    seasonYear?: number;
    minAgeHours?: number;
    daysBack?: number;
    now?: Date;
}

export interface ScoreCatchUpSummary {
    seasonYear: number;
    pendingDueFixtures: number;
    apiCompletedEvents: number;
    fixturesUpdated: number;
    autoUnderdogTipsAdded: number;
    tipsRescored: number;
    daysBackRequested: number;
    sourceDetails: Record<string, unknown>;
}

export interface SyncStatus {
    lastSyncUtc: string | null;
    lastSyncSummary: unknown;
    running: string | null;
}

const DAY_MS = 86_400_000;

/**
 * Drives the full reconciliation and the lighter score catch-up pass.
 * At most one run is in flight per instance; a second caller gets a
 * ConflictError instead of interleaving writes.
 */
export class SyncService {
    private running: string | null = null;

    constructor(
        private readonly deps: SyncDeps,
        private readonly opts: SyncOptions = {}
    ) {}

    private async exclusive<T>(label: string, work: () => Promise<T>): Promise<T> {
        if (this.running) throw new ConflictError(`A ${this.running} is already running.`);
        this.running = label;
        try {
            return await work();
        } finally {
            this.running = null;
        }
    }

    get configured(): boolean {
        return this.deps.odds.configured;
    }

    private requireApiKey(): void {
        if (!this.deps.odds.configured) {
            throw new ConfigError("ODDS_API_KEY not set; cannot sync fixtures.");
        }
    }

    async runFullSync(params: FullSyncParams = {}): Promise<SyncSummary> {
        this.requireApiKey();
        return this.exclusive("full sync", () => this.fullSync(params));
    }

    async runScoreCatchUp(params: ScoreCatchUpParams = {}): Promise<ScoreCatchUpSummary> {
        this.requireApiKey();
        return this.exclusive("score catch-up", () => this.scoreCatchUp(params));
    }

    async getStatus(): Promise<SyncStatus> {
        const [lastSyncUtc, rawSummary] = await Promise.all([
            this.deps.settings.get(LAST_SYNC_UTC_KEY),
            this.deps.settings.get(LAST_SYNC_SUMMARY_KEY),
        ]);
        let lastSyncSummary: unknown = null;
        if (rawSummary) {
            try {
                lastSyncSummary = JSON.parse(rawSummary);
            } catch (err) {
                console.warn("[sync] stored summary is not valid JSON", { error: errorMessage(err) });
            }
        }
        return { lastSyncUtc, lastSyncSummary, running: this.running };
    }

    private async fullSync(params: FullSyncParams): Promise<SyncSummary> {
        const { odds, draw, fixtures, settings, tips, scoring, raw, tz } = this.deps;
        const now = params.now ?? new Date();
        const seasonYear = params.seasonYear ?? localYear(tz, now);
        const daysBack = params.daysBack ?? 30;
        const warnings: string[] = [];

        console.log("[sync] full sync started", { seasonYear, daysBack });

        const [upcoming, scores, history, drawResult] = await Promise.allSettled([
            odds.fetchUpcoming(),
            odds.fetchScores(daysBack),
            odds.fetchHistorySnapshots(seasonYear),
            draw.fetchSeason(seasonYear),
        ]);

        if (upcoming.status === "rejected" && history.status === "rejected") {
            throw new AppError(
                `All odds sources failed. upcoming: ${errorMessage(upcoming.reason)}; ` +
                    `history: ${errorMessage(history.reason)}`,
                502,
                "SYNC_SOURCES_FAILED"
            );
        }

        const pulls: SourcePull[] = [];
        const settled: Array<[string, PromiseSettledResult<SourcePull>]> = [
            ["upcoming_odds", upcoming],
            ["scores", scores],
            ["historical_odds", history],
        ];
        for (const [source, result] of settled) {
            if (result.status === "fulfilled") {
                pulls.push(result.value);
                const warning = result.value.details.warning;
                if (typeof warning === "string") warnings.push(`${source}: ${warning}`);
            } else {
                const msg = `${source}: ${errorMessage(result.reason)}`;
                warnings.push(msg);
                console.warn("[sync] source failed", { source, error: errorMessage(result.reason) });
            }
        }

        const { fixtures: candidates, bySourceCounts } = mergeCandidates(pulls);

        let drawEntries: DrawFixture[] = [];
        let drawError: string | undefined;
        if (drawResult.status === "fulfilled") {
            drawEntries = drawResult.value;
        } else {
            drawError = errorMessage(drawResult.reason);
            warnings.push(`official_draw: ${drawError}`);
            console.warn("[sync] draw page unavailable, skipping enrichment", { error: drawError });
        }
        const enriched = applyDrawFallback(candidates, drawEntries, seasonYear, {
            matchWindowHours: this.opts.drawMatchWindowHours,
            maxRound: this.opts.maxRound,
        });
        const drawEnrichment: DrawEnrichment = drawError
            ? { ...enriched.counts, error: drawError }
            : enriched.counts;

        const drawOnlyRelinked = await this.relinkDrawOnlyRows(enriched.drawLinks, enriched.fixtures);

        // merge with what is stored, write only what changed
        const ids = Array.from(enriched.fixtures.keys());
        const stored = new Map(
            (await fixtures.getBySourceEventIds(ids)).map((f) => [f.sourceEventId, toRecord(f)])
        );
        let inserted = 0;
        let updated = 0;
        let unchanged = 0;
        for (const [id, candidate] of enriched.fixtures) {
            const prior = stored.get(id);
            let next: FixtureRecord = prior ? mergeFixture(prior, candidate) : candidate;
            const drawRound = enriched.authoritativeRounds.get(id);
            if (drawRound !== undefined) next = { ...next, roundNumber: drawRound };

            if (prior && recordsEqual(prior, next)) {
                unchanged++;
                continue;
            }
            await fixtures.upsert(next, now);
            if (prior) updated++;
            else inserted++;
        }

        const pruned = params.pruneOtherSeasons === false ? 0 : await fixtures.deleteOtherSeasons(seasonYear);

        const all = await fixtures.listFixtures();
        const roundUpdates = assignRoundNumbers(all, this.opts.roundGapHours ?? DEFAULT_ROUND_GAP_HOURS);
        await fixtures.setSeasonAndRound(roundUpdates);

        const autoTips = await tips.applyAutoTips({ seasonYear }, now);
        const rescored = await scoring.rescoreTips();

        const rawDownloadFile = await raw.write(seasonYear, {
            downloadedAtUtc: now.toISOString(),
            seasonYear,
            sportKey: this.opts.sportKey ?? null,
            sources: pulls.map((p) => ({ source: p.source, details: p.details, events: p.events })),
            draw: drawEntries,
            mergedFixtureCount: enriched.fixtures.size,
        });

        const summary: SyncSummary = {
            seasonYear,
            inserted,
            updated,
            unchanged,
            totalMerged: enriched.fixtures.size,
            prunedOtherSeasonFixtures: pruned,
            drawOnlyRelinked,
            roundsAssigned: roundUpdates.length,
            autoUnderdogTipsAdded: autoTips,
            tipsRescored: rescored,
            rawDownloadFile,
            bySourceCounts,
            sourceDetails: Object.fromEntries(pulls.map((p) => [p.source, p.details])),
            drawEnrichment,
            warnings,
        };

        await settings.set(LAST_SYNC_UTC_KEY, now.toISOString());
        await settings.set(LAST_SYNC_SUMMARY_KEY, JSON.stringify(summary));

        console.log("[sync] full sync done", {
            seasonYear,
            inserted,
            updated,
            unchanged,
            pruned,
            roundsAssigned: roundUpdates.length,
            autoTips,
            warnings: warnings.length,
        });
        return summary;
    }

    /**
     * A match first stored from the draw alone keeps its draw-only identity
     * until an odds event matches it. Re-key that row to the odds id, or fold
     * it (tips included) into the odds row when both already exist.
     */
    private async relinkDrawOnlyRows(
        links: Map<string, string>,
        candidates: Map<string, FixtureRecord>
    ): Promise<number> {
        if (!links.size) return 0;
        const { fixtures, tips } = this.deps;
        const drawRows = await fixtures.getBySourceEventIds(Array.from(links.keys()));

        let relinked = 0;
        for (const row of drawRows) {
            const oddsId = links.get(row.sourceEventId);
            const candidate = oddsId === undefined ? undefined : candidates.get(oddsId);
            if (oddsId === undefined || !candidate) continue;
            await tips.carryOverTeamNames(row.id, row, candidate);
            const [target] = await fixtures.getBySourceEventIds([oddsId]);
            if (target) {
                const tipsMoved = await fixtures.absorbFixture(row.id, target.id);
                console.log("[sync] draw-only fixture folded into odds fixture", {
                    from: row.sourceEventId,
                    into: oddsId,
                    tipsMoved,
                });
            } else {
                await fixtures.renameSourceEventId(row.id, oddsId);
                console.log("[sync] draw-only fixture re-keyed", { from: row.sourceEventId, to: oddsId });
            }
            relinked++;
        }
        return relinked;
    }

    /**
     * Fill in final scores for fixtures that kicked off at least
     * `minAgeHours` ago and still lack one. The scores window reaches back
     * to the oldest such fixture (plus two days). Draw-only rows are left
     * out: the scores feed cannot resolve them.
     */
    private async scoreCatchUp(params: ScoreCatchUpParams): Promise<ScoreCatchUpSummary> {
        const { odds, fixtures, tips, scoring, tz } = this.deps;
        const now = params.now ?? new Date();
        const seasonYear = params.seasonYear ?? localYear(tz, now);
        const minAgeHours = Math.max(0, params.minAgeHours ?? 2);
        const cutoff = new Date(now.getTime() - minAgeHours * 3_600_000);

        const due = (await fixtures.listPendingResults(seasonYear, cutoff)).filter(
            (f) => !isDrawOnlyId(f.sourceEventId)
        );
        if (!due.length) {
            return {
                seasonYear,
                pendingDueFixtures: 0,
                apiCompletedEvents: 0,
                fixturesUpdated: 0,
                autoUnderdogTipsAdded: 0,
                tipsRescored: 0,
                daysBackRequested: 0,
                sourceDetails: {},
            };
        }

        const oldest = Math.min(...due.map((f) => Date.parse(f.kickoffUtc)));
        const inferred = Number.isFinite(oldest) ? Math.max(1, Math.floor((now.getTime() - oldest) / DAY_MS) + 2) : 14;
        const daysBackRequested = Math.max(inferred, params.daysBack ?? 1);

        const pull = await odds.fetchScores(daysBackRequested);
        const completed = new Map<string, FixtureRecord>();
        for (const event of pull.events) {
            const f = normalizeOddsEvent("scores", event);
            if (!f || f.seasonYear !== seasonYear || f.status !== "completed") continue;
            if (f.winner === null || f.winner === WINNER_UNKNOWN) continue;
            const prior = completed.get(f.sourceEventId);
            completed.set(f.sourceEventId, prior ? mergeFixture(prior, f) : f);
        }

        let fixturesUpdated = 0;
        for (const row of due) {
            const result = completed.get(row.sourceEventId);
            if (!result || result.winner === null) continue;
            await fixtures.applyResult(
                row.id,
                { homeScore: result.homeScore, awayScore: result.awayScore, winner: result.winner },
                now
            );
            fixturesUpdated++;
        }

        const autoTips = await tips.applyAutoTips({ seasonYear }, now);
        const rescored = fixturesUpdated || autoTips ? await scoring.rescoreTips() : 0;

        return {
            seasonYear,
            pendingDueFixtures: due.length,
            apiCompletedEvents: completed.size,
            fixturesUpdated,
            autoUnderdogTipsAdded: autoTips,
            tipsRescored: rescored,
            daysBackRequested,
            sourceDetails: pull.details,
        };
    }
}
