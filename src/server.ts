//src/server.ts
import { createApp } from "./index";
import { env } from "./config/env";
import { pool } from "./db";
import { createServices } from "./services";
import { ScoreWorker } from "./modules/sync/score.worker";
import { errorMessage } from "./utils/errors";

const services = createServices(pool, env);
const app = createApp(services, { corsOrigin: env.corsOrigin });

const worker = new ScoreWorker(
  () => services.sync.runScoreCatchUp({ minAgeHours: env.scoreWorker.minAgeHours }),
  { intervalSeconds: env.scoreWorker.intervalSeconds }
);

const server = app.listen(env.port, () => {
  pool
    .query("SELECT 1")
    .then(() => {
      console.log(`API listening on http://localhost:${env.port}`);
      if (env.scoreWorker.enabled && services.sync.configured) worker.start();
      else console.log("[score-worker] disabled", { enabled: env.scoreWorker.enabled, apiKey: services.sync.configured });
    })
    .catch((err: unknown) => {
      console.error("[db] connection check failed", { error: errorMessage(err) });
      process.exitCode = 1;
      server.close();
    });
});

async function shutdown() {
  console.log("Shutting down...");
  await worker.stop();
  try {
    await pool.end();
  } catch (err) {
    console.error("[db] pool close failed", { error: errorMessage(err) });
  }
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
