// src/middleware/notFound.ts
import type { Request, Response } from "express";

export function notFound(req: Request, res: Response) {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}`, code: "NOT_FOUND" });
}
