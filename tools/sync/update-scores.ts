// tools/sync/update-scores.ts
// Usage: update-scores [--season 2026] [--min-age-hours 2] [--days-back N] [--loop] [--interval-seconds 900]
import { env } from '../../src/config/env';
import { pool } from '../../src/db';
import { createServices } from '../../src/services';
import { ScoreWorker } from '../../src/modules/sync/score.worker';
import { flagArg, numArg, parseArgs } from './args';

async function main() {
    const args = parseArgs();
    const services = createServices(pool, env);

    const run = () =>
        services.sync.runScoreCatchUp({
            seasonYear: numArg(args, 'season'),
            minAgeHours: numArg(args, 'min-age-hours') ?? env.scoreWorker.minAgeHours,
            daysBack: numArg(args, 'days-back'),
        });

    if (!flagArg(args, 'loop')) {
        try {
            console.log(JSON.stringify(await run(), null, 2));
        } finally {
            await pool.end();
        }
        return;
    }

    const worker = new ScoreWorker(run, {
        intervalSeconds: numArg(args, 'interval-seconds') ?? env.scoreWorker.intervalSeconds,
        runOnStart: true,
    });
    worker.start();

    const stop = async () => {
        await worker.stop();
        await pool.end();
    };
    process.on('SIGINT', () => { stop().catch(e => { console.error(e); process.exit(1); }); });
    process.on('SIGTERM', () => { stop().catch(e => { console.error(e); process.exit(1); }); });
}

main().catch(e => { console.error(e); process.exit(1); });
