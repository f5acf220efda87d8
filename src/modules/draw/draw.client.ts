// src/modules/draw/draw.client.ts
import pLimit from "p-limit";
import { parseUtc } from "../../utils/date";
import { UpstreamHttpError, errorMessage } from "../../utils/errors";
import { RawRecord, isRecord, recordArray, strOrNull } from "../../utils/normalize";
import { FetchLike, HttpResponse } from "../odds/odds.client";

/** One official fixture as published on the league draw page. */
export interface DrawFixture {
    roundNumber: number;
    homeName: string;
    awayName: string;
    kickoffUtc: string;
    venueName: string | null;
    venueCity: string | null;
    homeLogoUrl: string | null;
    awayLogoUrl: string | null;
    matchCentreUrl: string;
}

export interface DrawSource {
    fetchSeason(seasonYear: number): Promise<DrawFixture[]>;
}

export interface DrawClientOptions {
    baseUrl: string;
    competitionId: number;
    maxRound: number;
    timeoutMs: number;
    concurrency?: number;
    fetch?: FetchLike;
}

const THEME_BASE = "https://www.nrl.com/.theme";
const BADGE_FILES = ["badge.svg", "badge-light.svg", "badge.png", "badge-light.png"];
const PREMIERSHIP_PATH = "/draw/nrl-premiership/";

const ENTITIES: Record<string, string> = {
    amp: "&",
    quot: '"',
    apos: "'",
    lt: "<",
    gt: ">",
    nbsp: " ",
};

export function decodeHtmlEntities(s: string): string {
    return s.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (whole, ent: string) => {
        if (ent.startsWith("#x") || ent.startsWith("#X")) return String.fromCodePoint(parseInt(ent.slice(2), 16));
        if (ent.startsWith("#")) return String.fromCodePoint(parseInt(ent.slice(1), 10));
        return ENTITIES[ent] ?? whole;
    });
}

/**
 * The draw page embeds its state as an HTML-escaped JSON attribute on the
 * `#vue-draw` element. Missing or malformed -> {}.
 */
export function extractDrawData(html: string): RawRecord {
    const m = /id="vue-draw"[^>]*\bq-data="([\s\S]*?)"/.exec(html);
    if (!m) return {};
    try {
        const parsed: unknown = JSON.parse(decodeHtmlEntities(m[1]));
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

export function buildThemeLogoUrl(theme: unknown): string | null {
    if (!isRecord(theme)) return null;
    const key = strOrNull(theme.key);
    const logos = theme.logos;
    if (!key || !isRecord(logos)) return null;
    for (const file of BADGE_FILES) {
        const bust = strOrNull(logos[file]);
        if (bust) return `${THEME_BASE}/${key}/${file}?bust=${bust}`;
    }
    return null;
}

/** Round numbers listed in the page's round selector, bounded to [1, maxRound]. */
export function discoverRounds(firstPage: RawRecord, maxRound: number): number[] {
    const filter = firstPage.filterRounds;
    if (!Array.isArray(filter)) return [1];

    const values = recordArray(filter)
        .map((r) => r.value)
        .filter((v): v is number => typeof v === "number" && Number.isInteger(v));
    if (!values.length) return [1];

    const bounded = Array.from(new Set(values.filter((v) => v >= 1 && v <= maxRound))).sort((a, b) => a - b);
    if (bounded.length) return bounded;
    return Array.from({ length: maxRound }, (_, i) => i + 1);
}

/** Premiership matches from one round's page data; byes and other comps are skipped. */
export function parseDrawFixtures(data: RawRecord, roundNumber: number): DrawFixture[] {
    const out: DrawFixture[] = [];
    for (const f of recordArray(data.fixtures)) {
        if (f.type !== "Match") continue;
        const matchCentreUrl = strOrNull(f.matchCentreUrl) ?? "";
        if (!matchCentreUrl.includes(PREMIERSHIP_PATH)) continue;

        const home = isRecord(f.homeTeam) ? f.homeTeam : {};
        const away = isRecord(f.awayTeam) ? f.awayTeam : {};
        const clock = isRecord(f.clock) ? f.clock : {};
        const kickoff = parseUtc(strOrNull(clock.kickOffTimeLong));
        if (!kickoff) continue;

        out.push({
            roundNumber,
            homeName: strOrNull(home.nickName) ?? "",
            awayName: strOrNull(away.nickName) ?? "",
            kickoffUtc: kickoff.toISOString(),
            venueName: strOrNull(f.venue),
            venueCity: strOrNull(f.venueCity),
            homeLogoUrl: buildThemeLogoUrl(home.theme),
            awayLogoUrl: buildThemeLogoUrl(away.theme),
            matchCentreUrl,
        });
    }
    return out;
}

export class DrawClient implements DrawSource {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly opts: DrawClientOptions) {
        this.fetchImpl = opts.fetch ?? fetch;
    }

    private roundUrl(seasonYear: number, roundNumber: number): URL {
        const url = new URL(this.opts.baseUrl);
        url.searchParams.set("competition", String(this.opts.competitionId));
        url.searchParams.set("round", String(roundNumber));
        url.searchParams.set("season", String(seasonYear));
        return url;
    }

    private async fetchRound(seasonYear: number, roundNumber: number): Promise<RawRecord> {
        let res: HttpResponse;
        try {
            res = await this.fetchImpl(this.roundUrl(seasonYear, roundNumber), {
                headers: { "User-Agent": "Tipping-Sync/1.0" },
                signal: AbortSignal.timeout(this.opts.timeoutMs),
            });
        } catch (err) {
            throw new UpstreamHttpError(`Draw page connection error: ${errorMessage(err)}`, null, "");
        }
        const text = await res.text();
        if (!res.ok) {
            const snippet = text.slice(0, 300);
            throw new UpstreamHttpError(`Draw page HTTP ${res.status}: ${snippet}`, res.status, snippet);
        }
        return extractDrawData(text);
    }

    async fetchSeason(seasonYear: number): Promise<DrawFixture[]> {
        const first = await this.fetchRound(seasonYear, 1);
        const rounds = discoverRounds(first, this.opts.maxRound);

        const limit = pLimit(this.opts.concurrency ?? 4);
        const pages = await Promise.all(
            rounds.map((r) =>
                r === 1 ? Promise.resolve(first) : limit(() => this.fetchRound(seasonYear, r))
            )
        );

        return rounds.flatMap((r, i) => parseDrawFixtures(pages[i], r));
    }
}
