// src/services.ts
import type { Pool } from "mysql2/promise";
import type { Env } from "./config/env";
import { DrawClient, DrawSource } from "./modules/draw/draw.client";
import { FixturesRepo, FixtureStore } from "./modules/fixtures/fixtures.repo";
import { FixturesService } from "./modules/fixtures/fixtures.service";
import { OddsClient, OddsSource } from "./modules/odds/odds.client";
import { PredictionStore, PredictionsRepo } from "./modules/predictions/predictions.repo";
import { PredictionsService } from "./modules/predictions/predictions.service";
import { ScoringService } from "./modules/scoring/scoring.service";
import { SettingsRepo, SettingsStore } from "./modules/settings/settings.repo";
import { FileRawPayloadWriter, RawPayloadWriter } from "./modules/sync/raw.writer";
import { SyncService } from "./modules/sync/sync.service";
import { TipStore, TipsRepo } from "./modules/tips/tips.repo";
import { TipsService } from "./modules/tips/tips.service";
import { UserStore, UsersRepo } from "./modules/users/users.repo";
import { TimezoneProvider, createTimezoneProvider } from "./utils/timezone";

export interface Stores {
    fixtures: FixtureStore;
    tips: TipStore;
    users: UserStore;
    settings: SettingsStore;
    predictions: PredictionStore;
}

export interface Adapters {
    odds: OddsSource;
    draw: DrawSource;
    raw: RawPayloadWriter;
}

export interface EngineSettings {
    lockMinutes: number;
    roundGapHours: number;
    drawMatchWindowHours: number;
    maxRound: number;
    sportKey: string;
}

export interface Services {
    tz: TimezoneProvider;
    fixtures: FixturesService;
    tips: TipsService;
    scoring: ScoringService;
    predictions: PredictionsService;
    sync: SyncService;
    adminSecret: string;
}

/** Wire services from stores and adapters; tests pass in-memory stores and fakes. */
export function buildServices(
    stores: Stores,
    adapters: Adapters,
    tz: TimezoneProvider,
    settings: EngineSettings,
    adminSecret = ""
): Services {
    const fixtures = new FixturesService(stores.fixtures, stores.tips, { lockMinutes: settings.lockMinutes });
    const tips = new TipsService(stores.fixtures, stores.tips, stores.users, { lockMinutes: settings.lockMinutes });
    const scoring = new ScoringService(stores.fixtures, stores.tips, stores.users);
    const predictions = new PredictionsService(stores.predictions, stores.users, fixtures, scoring, tz);
    const sync = new SyncService(
        {
            odds: adapters.odds,
            draw: adapters.draw,
            fixtures: stores.fixtures,
            settings: stores.settings,
            tips,
            scoring,
            raw: adapters.raw,
            tz,
        },
        {
            sportKey: settings.sportKey,
            roundGapHours: settings.roundGapHours,
            drawMatchWindowHours: settings.drawMatchWindowHours,
            maxRound: settings.maxRound,
        }
    );
    return { tz, fixtures, tips, scoring, predictions, sync, adminSecret };
}

/** Production wiring: MySQL repositories and the real HTTP adapters. */
export function createServices(pool: Pool, env: Env): Services {
    const tz = createTimezoneProvider(env.timezone.zone, env.timezone.fallbackOffsetMinutes);
    if (tz.isFallback) {
        console.warn("[config] timezone data unavailable, using fixed offset", {
            requested: env.timezone.zone,
            using: tz.zone,
        });
    }

    const stores: Stores = {
        fixtures: new FixturesRepo(pool),
        tips: new TipsRepo(pool),
        users: new UsersRepo(pool),
        settings: new SettingsRepo(pool),
        predictions: new PredictionsRepo(pool),
    };
    const adapters: Adapters = {
        odds: new OddsClient({
            apiKey: env.odds.apiKey,
            baseUrl: env.odds.baseUrl,
            sportKey: env.odds.sportKey,
            region: env.odds.region,
            timeoutMs: env.httpTimeoutMs,
        }),
        draw: new DrawClient({
            baseUrl: env.draw.baseUrl,
            competitionId: env.draw.competitionId,
            maxRound: env.draw.maxRound,
            timeoutMs: env.httpTimeoutMs,
        }),
        raw: new FileRawPayloadWriter(env.dataDir),
    };

    return buildServices(
        stores,
        adapters,
        tz,
        {
            lockMinutes: env.tipping.lockMinutes,
            roundGapHours: env.tipping.roundGapHours,
            drawMatchWindowHours: env.tipping.drawMatchWindowHours,
            maxRound: env.draw.maxRound,
            sportKey: env.odds.sportKey,
        },
        env.apiSecret
    );
}
