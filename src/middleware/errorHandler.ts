// src/middleware/errorHandler.ts
import type { NextFunction, Request, Response } from "express";
import { AppError, errorMessage } from "../utils/errors";

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
    if (err instanceof AppError) {
        if (err.status >= 500) console.error(`[api] ${req.method} ${req.path} failed`, { error: err.message });
        res.status(err.status).json({ error: err.message, code: err.code });
        return;
    }
    console.error(`[api] ${req.method} ${req.path} unhandled`, err);
    res.status(500).json({ error: errorMessage(err), code: "INTERNAL" });
}
