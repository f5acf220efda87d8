// src/config/env.ts
import * as dotenv from "dotenv";
dotenv.config();

function req(name: string, fallback?: string) {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

function num(name: string, fallback: number) {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${name} must be a number, got "${raw}"`);
  return n;
}

function flag(name: string, fallback = false) {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: Number(process.env.PORT ?? 3000),

  db: {
    host: req("DB_HOST"),
    port: Number(req("DB_PORT", "3306")),
    user: req("DB_USER"),
    password: req("DB_PASSWORD"),
    name: req("DB_NAME"),
    connLimit: Number(req("DB_CONN_LIMIT", "10")),
  },

  /** Odds/results API. The key is checked when a sync runs, not at boot. */
  odds: {
    apiKey: (process.env.ODDS_API_KEY || "").trim() || undefined,
    baseUrl: (process.env.ODDS_API_BASE_URL || "https://api.the-odds-api.com/v4").replace(/\/+$/, ""),
    sportKey: process.env.ODDS_SPORT_KEY || "rugbyleague_nrl",
    region: process.env.ODDS_REGION || "au",
  },

  /** Official league draw page */
  draw: {
    baseUrl: process.env.DRAW_BASE_URL || "https://www.nrl.com/draw/",
    competitionId: num("DRAW_COMPETITION_ID", 111),
    maxRound: num("DRAW_MAX_ROUND", 27),
  },

  httpTimeoutMs: num("HTTP_TIMEOUT_MS", 45_000),

  tipping: {
    lockMinutes: num("TIP_LOCK_MINUTES", 5),
    roundGapHours: num("ROUND_GAP_HOURS", 60),
    drawMatchWindowHours: num("DRAW_MATCH_WINDOW_HOURS", 36),
  },

  timezone: {
    zone: process.env.APP_TIMEZONE || "Australia/Sydney",
    fallbackOffsetMinutes: num("APP_TIMEZONE_FALLBACK_OFFSET_MINUTES", 600),
  },

  /** Background catch-up pass for completed scores */
  scoreWorker: {
    enabled: flag("AUTO_SCORE_UPDATER_ENABLED", true),
    intervalSeconds: Math.max(60, num("AUTO_SCORE_CHECK_INTERVAL_SECONDS", 900)),
    minAgeHours: num("AUTO_SCORE_MIN_AGE_HOURS", 2),
  },

  /** Raw merged payloads are written here for audit */
  dataDir: process.env.DATA_DIR || "./data",

  /** Shared admin secret for the sync routes */
  apiSecret: process.env.API_SECRET || "",

  /** Comma-separated CORS origins */
  corsOrigin: (process.env.CORS_ORIGIN ?? "").split(",").filter(Boolean),
};

export type Env = typeof env;
