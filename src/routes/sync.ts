// src/routes/sync.ts
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import type { Services } from "../services";
import { requireAdminSecret } from "../middleware/requireAdminSecret";
import { bodyOf, parseBool, parseIntParam, parseNumber } from "../utils/parse";

/**
 * Admin triggers. All routes need `X-Admin-Secret: <API_SECRET>`.
 *
 *   POST /api/v1/sync/run        { seasonYear?, daysBack?, pruneOtherSeasons? }
 *   POST /api/v1/sync/scores     { seasonYear?, minAgeHours?, daysBack? }
 *   POST /api/v1/sync/auto-tips  { seasonYear?, roundNumber?, userId?, includeAdmin? }
 *   GET  /api/v1/sync/status
 */
export function syncRoutes(svc: Services): Router {
    const router = Router();
    router.use(requireAdminSecret(svc.adminSecret));

    router.post("/run", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = bodyOf(req.body);
            const summary = await svc.sync.runFullSync({
                seasonYear: parseIntParam(body.seasonYear),
                daysBack: parseIntParam(body.daysBack),
                pruneOtherSeasons: parseBool(body.pruneOtherSeasons, true),
            });
            res.json(summary);
        } catch (err) {
            next(err);
        }
    });

    router.post("/scores", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = bodyOf(req.body);
            const summary = await svc.sync.runScoreCatchUp({
                seasonYear: parseIntParam(body.seasonYear),
                minAgeHours: parseNumber(body.minAgeHours),
                daysBack: parseIntParam(body.daysBack),
            });
            res.json(summary);
        } catch (err) {
            next(err);
        }
    });

    router.post("/auto-tips", async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = bodyOf(req.body);
            const inserted = await svc.tips.applyAutoTips({
                seasonYear: parseIntParam(body.seasonYear),
                roundNumber: parseIntParam(body.roundNumber),
                userId: parseIntParam(body.userId),
                includeAdmin: parseBool(body.includeAdmin),
            });
            res.json({ inserted });
        } catch (err) {
            next(err);
        }
    });

    router.get("/status", async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await svc.sync.getStatus());
        } catch (err) {
            next(err);
        }
    });

    return router;
}
