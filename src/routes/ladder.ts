// src/routes/ladder.ts
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import type { Services } from "../services";
import { parseIntParam } from "../utils/parse";
import { localYear } from "../utils/timezone";

/**
 * GET /api/v1/ladder?season=2026              competition table
 * GET /api/v1/ladder/leaderboard?season=2026  tipping leaderboard with per-round points
 */
export function ladderRoutes(svc: Services): Router {
    const router = Router();

    router.get("/", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const season = parseIntParam(req.query.season) ?? localYear(svc.tz, new Date());
            res.json({ seasonYear: season, standings: await svc.scoring.getLadder(season) });
        } catch (err) {
            next(err);
        }
    });

    router.get("/leaderboard", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const season = parseIntParam(req.query.season) ?? localYear(svc.tz, new Date());
            res.json({ seasonYear: season, entries: await svc.scoring.getLeaderboard(season) });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
