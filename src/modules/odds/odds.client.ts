// src/modules/odds/odds.client.ts
import { SourceTag } from "../../types/domain";
import { ConfigError, UpstreamHttpError, errorMessage } from "../../utils/errors";
import { RawRecord } from "../../utils/normalize";
import { extractEvents } from "./odds.normalize";

/** The slice of the fetch Response the adapters read. */
export interface HttpResponse {
    ok: boolean;
    status: number;
    headers: { get(name: string): string | null };
    text(): Promise<string>;
    json(): Promise<unknown>;
}

export interface FetchInit {
    headers?: Record<string, string>;
    signal?: AbortSignal;
}

export type FetchLike = (input: string | URL, init?: FetchInit) => Promise<HttpResponse>;

/** Raw events from one adapter call plus details for the sync summary. */
export interface SourcePull {
    source: SourceTag;
    events: RawRecord[];
    details: Record<string, unknown>;
}

/** What the sync engine needs from the odds/results API. */
export interface OddsSource {
    readonly configured: boolean;
    fetchUpcoming(): Promise<SourcePull>;
    fetchScores(daysBack: number): Promise<SourcePull>;
    fetchHistorySnapshots(seasonYear: number): Promise<SourcePull>;
}

export interface OddsClientOptions {
    apiKey?: string;
    baseUrl: string;
    sportKey: string;
    region: string;
    timeoutMs: number;
    fetch?: FetchLike;
}

const USER_AGENT = "Tipping-Sync/1.0";

/** Upstream rejects unsupported `daysFrom` values with HTTP 422. */
export const SCORES_FALLBACK_DAYS = [30, 14, 7, 3, 1];

function isRejectedDaysFrom(err: unknown): boolean {
    if (!(err instanceof UpstreamHttpError)) return false;
    return err.upstreamStatus === 422 || err.bodySnippet.includes("INVALID_SCORES_DAYS_FROM");
}

export class OddsClient implements OddsSource {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly opts: OddsClientOptions) {
        this.fetchImpl = opts.fetch ?? fetch;
    }

    get configured(): boolean {
        return !!this.opts.apiKey;
    }

    private apiKey(): string {
        if (!this.opts.apiKey) {
            throw new ConfigError("ODDS_API_KEY not set; cannot reach the odds/results API.");
        }
        return this.opts.apiKey;
    }

    private async getJson(
        path: string,
        params: Record<string, string | number>
    ): Promise<{ body: unknown; headers: HttpResponse["headers"] }> {
        const url = new URL(`${this.opts.baseUrl}${path}`);
        url.searchParams.set("apiKey", this.apiKey());
        for (const [k, v] of Object.entries(params)) url.searchParams.set(k, String(v));

        let res: HttpResponse;
        try {
            res = await this.fetchImpl(url, {
                headers: { "User-Agent": USER_AGENT },
                signal: AbortSignal.timeout(this.opts.timeoutMs),
            });
        } catch (err) {
            throw new UpstreamHttpError(`Odds API connection error: ${errorMessage(err)}`, null, "");
        }

        if (!res.ok) {
            const snippet = (await res.text()).slice(0, 300);
            throw new UpstreamHttpError(`Odds API HTTP ${res.status}: ${snippet}`, res.status, snippet);
        }

        const body: unknown = await res.json();
        return { body, headers: res.headers };
    }

    /** Current head-to-head market. */
    async fetchUpcoming(): Promise<SourcePull> {
        const { body, headers } = await this.getJson(`/sports/${this.opts.sportKey}/odds/`, {
            regions: this.opts.region,
            markets: "h2h",
            oddsFormat: "decimal",
            dateFormat: "iso",
        });
        return {
            source: "upcoming_odds",
            events: extractEvents(body),
            details: {
                remaining_credits: headers.get("x-requests-remaining"),
                source_endpoint: "odds",
            },
        };
    }

    /**
     * Recently completed events. When the upstream rejects the window we walk
     * down SCORES_FALLBACK_DAYS; if every value is rejected we return an empty
     * pull with a warning instead of failing the sync.
     */
    async fetchScores(daysBack: number): Promise<SourcePull> {
        const requested = Math.max(1, Math.trunc(daysBack));
        const candidates = Array.from(new Set([requested, ...SCORES_FALLBACK_DAYS]));

        let lastError: unknown = null;
        for (const candidate of candidates) {
            try {
                const { body, headers } = await this.getJson(`/sports/${this.opts.sportKey}/scores/`, {
                    daysFrom: candidate,
                    dateFormat: "iso",
                });
                return {
                    source: "scores",
                    events: extractEvents(body),
                    details: {
                        remaining_credits: headers.get("x-requests-remaining"),
                        days_back_requested: requested,
                        days_back_used: candidate,
                        source_endpoint: "scores",
                    },
                };
            } catch (err) {
                if (!isRejectedDaysFrom(err)) throw err;
                lastError = err;
            }
        }

        return {
            source: "scores",
            events: [],
            details: {
                source_endpoint: "scores",
                days_back_requested: requested,
                days_back_used: null,
                warning:
                    "Scores endpoint unavailable for requested daysFrom values. " +
                    `Tried ${JSON.stringify(candidates)}. Last error: ${errorMessage(lastError)}`,
            },
        };
    }

    /**
     * Weekly odds snapshots across the season (March through October).
     * Two endpoint shapes exist depending on the account plan; a 404 on the
     * first falls through to the second. A failed snapshot is skipped and
     * reported in `details.warning`; auth failures stop the walk. Only a
     * walk with no successful snapshot throws.
     */
    async fetchHistorySnapshots(
        seasonYear: number,
        window: { startMonth?: number; endMonth?: number; stepDays?: number } = {}
    ): Promise<SourcePull> {
        const startMonth = window.startMonth ?? 3;
        const endMonth = window.endMonth ?? 11;
        const stepDays = window.stepDays ?? 7;

        const paths = [
            `/sports/${this.opts.sportKey}/odds-history/`,
            `/historical/sports/${this.opts.sportKey}/odds/`,
        ];
        const end = Date.UTC(seasonYear, endMonth - 1, 1, 12);
        const events: RawRecord[] = [];
        const triedEndpoints: string[] = [];
        const failedDates: string[] = [];
        let lastError: UpstreamHttpError | null = null;
        let attempted = 0;
        let successful = 0;
        let halted = false;

        for (
            let cursor = Date.UTC(seasonYear, startMonth - 1, 1, 12);
            cursor < end && !halted;
            cursor += stepDays * 86_400_000
        ) {
            attempted++;
            const date = new Date(cursor).toISOString().replace(/\.\d{3}Z$/, "Z");

            for (const path of paths) {
                if (!triedEndpoints.includes(path)) triedEndpoints.push(path);
                try {
                    const { body } = await this.getJson(path, {
                        regions: this.opts.region,
                        markets: "h2h",
                        oddsFormat: "decimal",
                        dateFormat: "iso",
                        date,
                    });
                    events.push(...extractEvents(body));
                    successful++;
                    break;
                } catch (err) {
                    if (!(err instanceof UpstreamHttpError)) throw err;
                    if (err.upstreamStatus === 404) continue;
                    failedDates.push(date);
                    lastError = err;
                    halted = err.upstreamStatus === 401 || err.upstreamStatus === 403;
                    break;
                }
            }
        }

        if (lastError && successful === 0) throw lastError;

        const details: Record<string, unknown> = {
            attempted_snapshots: attempted,
            successful_snapshots: successful,
            candidate_endpoints: triedEndpoints,
            step_days: stepDays,
            season_year: seasonYear,
        };
        if (lastError) {
            details.failed_snapshots = failedDates;
            details.warning =
                `${failedDates.length} of ${attempted} history snapshots failed. ` +
                `Last error: ${lastError.message}`;
        }
        return { source: "historical_odds", events, details };
    }
}
