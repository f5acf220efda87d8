// src/routes/tips.ts
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import type { Services } from "../services";
import type { TipPick } from "../modules/tips/tips.service";
import { ValidationError } from "../utils/errors";
import { recordArray, strOrNull } from "../utils/normalize";
import { bodyOf, parseIntParam } from "../utils/parse";
import { localYear } from "../utils/timezone";

/**
 * POST /api/v1/tips
 *
 * Body (JSON):
 *   {
 *     "userId": 7,
 *     "seasonYear": 2026,          // optional, defaults to the local year
 *     "roundNumber": 3,
 *     "picks": [{ "fixtureId": 12, "team": "Storm" }]
 *   }
 */
export function tipsRoutes(svc: Services): Router {
    const router = Router();

    router.post("/", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const now = new Date();
            const body = bodyOf(req.body);
            const userId = parseIntParam(body.userId);
            const roundNumber = parseIntParam(body.roundNumber);
            if (userId === undefined) throw new ValidationError("userId is required");
            if (roundNumber === undefined) throw new ValidationError("roundNumber is required");

            const picks: TipPick[] = [];
            for (const p of recordArray(body.picks)) {
                const fixtureId = parseIntParam(p.fixtureId);
                const team = strOrNull(p.team);
                if (fixtureId !== undefined && team) picks.push({ fixtureId, team });
            }

            const seasonYear = parseIntParam(body.seasonYear) ?? localYear(svc.tz, now);
            res.json(await svc.tips.submitTips(userId, seasonYear, roundNumber, picks, now));
        } catch (err) {
            next(err);
        }
    });

    return router;
}
