// src/index.ts
import express from "express";
import helmet from "helmet";
import cors from "cors";
import type { Services } from "./services";
import { v1Routes } from "./routes/v1";
import { requestLogger } from "./middleware/requestLogger";
import { notFound } from "./middleware/notFound";
import { errorHandler } from "./middleware/errorHandler";

export function createApp(svc: Services, opts: { corsOrigin?: string[] } = {}) {
  const app = express();
  const origins = opts.corsOrigin ?? [];

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  app.use(cors({ origin: origins.length ? origins : true }));
  app.use(requestLogger);

  app.get("/api/health", (_req, res) => res.json({ ok: true }));
  app.use("/api/v1", v1Routes(svc));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
