// src/middleware/requireAdminSecret.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Guard for admin trigger routes: `X-Admin-Secret` must equal the
 * configured secret. An unset secret locks the routes entirely.
 */
export function requireAdminSecret(secret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const given = req.header("X-Admin-Secret");
        if (!secret || given !== secret) {
            res.status(401).json({ error: "Unauthorized", code: "UNAUTHORIZED" });
            return;
        }
        next();
    };
}
