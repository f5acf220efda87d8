// src/modules/predictions/predictions.scoring.ts
import { AdjustDirection } from "../../types/domain";
import { ValidationError } from "../../utils/errors";

/**
 * Sum of |predicted position - actual position| over the predicted teams.
 * Teams not on the actual ladder yet contribute nothing. 0 is perfect.
 */
export function scorePrediction(predicted: string[], actual: string[]): number {
    const actualPos = new Map(actual.map((team, i) => [team, i]));
    let score = 0;
    predicted.forEach((team, i) => {
        const pos = actualPos.get(team);
        if (pos !== undefined) score += Math.abs(i - pos);
    });
    return score;
}

/** Move one team a single place, swapping with its neighbour. */
export function moveTeam(order: string[], team: string, direction: AdjustDirection): string[] {
    const idx = order.indexOf(team);
    if (idx < 0) throw new ValidationError(`Team not in prediction: ${team}`);
    const target = direction === "up" ? idx - 1 : idx + 1;
    if (target < 0 || target >= order.length) {
        throw new ValidationError(`Cannot move ${team} ${direction} from position ${idx + 1}`);
    }
    const next = [...order];
    next[idx] = order[target];
    next[target] = team;
    return next;
}
