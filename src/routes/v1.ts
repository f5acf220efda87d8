// src/routes/v1.ts
import { Router } from "express";
import type { Services } from "../services";

import { syncRoutes } from "./sync";
import { ladderRoutes } from "./ladder";
import { roundsRoutes } from "./rounds";
import { tipsRoutes } from "./tips";
import { predictionsRoutes } from "./predictions";

export function v1Routes(svc: Services): Router {
    const v1 = Router();

    v1.get("/health", (_req, res) => res.json({ ok: true }));

    v1.use("/sync", syncRoutes(svc));
    v1.use("/ladder", ladderRoutes(svc));
    v1.use("/rounds", roundsRoutes(svc));
    v1.use("/tips", tipsRoutes(svc));
    v1.use("/predictions", predictionsRoutes(svc));

    return v1;
}
