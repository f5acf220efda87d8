// src/modules/sync/reconcile.ts
import { FixtureRecord } from "../../types/domain";
import { mergeFixture } from "../fixtures/fixtures.merge";
import { SourcePull } from "../odds/odds.client";
import { normalizeOddsEvent } from "../odds/odds.normalize";

export interface MergedCandidates {
    fixtures: Map<string, FixtureRecord>;
    bySourceCounts: Record<string, number>;
}

/**
 * Fold every pull into one candidate per event id. Pull order matters:
 * later pulls win the "later call wins" fields of mergeFixture.
 */
export function mergeCandidates(pulls: SourcePull[]): MergedCandidates {
    const fixtures = new Map<string, FixtureRecord>();
    const bySourceCounts: Record<string, number> = {};

    for (const pull of pulls) {
        bySourceCounts[pull.source] = pull.events.length;
        for (const event of pull.events) {
            const candidate = normalizeOddsEvent(pull.source, event);
            if (!candidate) continue;
            const prior = fixtures.get(candidate.sourceEventId);
            fixtures.set(candidate.sourceEventId, prior ? mergeFixture(prior, candidate) : candidate);
        }
    }

    return { fixtures, bySourceCounts };
}
