// src/routes/rounds.ts
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import type { Services } from "../services";
import { ValidationError } from "../utils/errors";
import { parseIntParam } from "../utils/parse";
import { localYear } from "../utils/timezone";

export function roundsRoutes(svc: Services): Router {
    const router = Router();

    // GET /api/v1/rounds?season=2026
    router.get("/", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const now = new Date();
            const season = parseIntParam(req.query.season) ?? localYear(svc.tz, now);
            const [rounds, currentRound] = await Promise.all([
                svc.fixtures.listRoundNumbers(season),
                svc.fixtures.getCurrentRound(season, now),
            ]);
            res.json({ seasonYear: season, rounds, currentRound });
        } catch (err) {
            next(err);
        }
    });

    // GET /api/v1/rounds/:round?season=2026&userId=7
    router.get("/:round", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const now = new Date();
            const round = parseIntParam(req.params.round);
            if (round === undefined) throw new ValidationError(`Invalid round: ${req.params.round}`);
            const season = parseIntParam(req.query.season) ?? localYear(svc.tz, now);
            const view = await svc.fixtures.getRoundView(season, round, now, parseIntParam(req.query.userId));
            res.json({
                ...view,
                fixtures: view.fixtures.map((f) => ({
                    ...f,
                    kickoffLocal: svc.tz.format(new Date(f.kickoffUtc)),
                })),
            });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
