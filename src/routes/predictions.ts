// src/routes/predictions.ts
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import type { Services } from "../services";
import { ValidationError } from "../utils/errors";
import { bodyOf, parseIntParam } from "../utils/parse";
import { localYear } from "../utils/timezone";

function requireInt(v: unknown, name: string): number {
    const n = parseIntParam(v);
    if (n === undefined) throw new ValidationError(`${name} is required`);
    return n;
}

/** Ladder prediction game. */
export function predictionsRoutes(svc: Services): Router {
    const router = Router();
    const season = (v: unknown) => parseIntParam(v) ?? localYear(svc.tz, new Date());

    // GET /api/v1/predictions/leaderboard?season=2026
    router.get("/leaderboard", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const seasonYear = season(req.query.season);
            res.json({ seasonYear, entries: await svc.predictions.getLeaderboard(seasonYear) });
        } catch (err) {
            next(err);
        }
    });

    // GET /api/v1/predictions?userId=7&season=2026
    router.get("/", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const userId = requireInt(req.query.userId, "userId");
            res.json(await svc.predictions.getPrediction(userId, season(req.query.season)));
        } catch (err) {
            next(err);
        }
    });

    // PUT /api/v1/predictions { userId, seasonYear?, teams: string[] }
    router.put("/", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = bodyOf(req.body);
            const userId = requireInt(body.userId, "userId");
            if (!Array.isArray(body.teams) || !body.teams.every((t): t is string => typeof t === "string")) {
                throw new ValidationError("teams must be an array of team names");
            }
            const saved = await svc.predictions.savePrediction(userId, season(body.seasonYear), body.teams);
            res.json({ saved });
        } catch (err) {
            next(err);
        }
    });

    // POST /api/v1/predictions/adjust { userId, seasonYear?, roundNumber, team, direction: "up" | "down" }
    router.post("/adjust", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = bodyOf(req.body);
            const userId = requireInt(body.userId, "userId");
            const roundNumber = requireInt(body.roundNumber, "roundNumber");
            if (typeof body.team !== "string" || !body.team.trim()) throw new ValidationError("team is required");
            if (body.direction !== "up" && body.direction !== "down") {
                throw new ValidationError('direction must be "up" or "down"');
            }
            const teams = await svc.predictions.adjustPrediction(
                userId,
                season(body.seasonYear),
                roundNumber,
                body.team.trim(),
                body.direction
            );
            res.json({ teams });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
