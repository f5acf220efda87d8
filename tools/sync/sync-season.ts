// tools/sync/sync-season.ts
// Usage: sync-season [--season 2026] [--days-back 30] [--keep-other-seasons] [--summary-file out.json]
import fs from 'node:fs';
import path from 'node:path';
import { env } from '../../src/config/env';
import { pool } from '../../src/db';
import { createServices } from '../../src/services';
import { flagArg, numArg, parseArgs } from './args';

async function main() {
    const args = parseArgs();
    const services = createServices(pool, env);

    try {
        const summary = await services.sync.runFullSync({
            seasonYear: numArg(args, 'season'),
            daysBack: numArg(args, 'days-back'),
            pruneOtherSeasons: !flagArg(args, 'keep-other-seasons'),
        });

        const out = JSON.stringify(summary, null, 2);
        const summaryFile = args.get('summary-file');
        if (summaryFile) {
            const target = path.resolve(summaryFile);
            fs.mkdirSync(path.dirname(target), { recursive: true });
            fs.writeFileSync(target, out, 'utf8');
            console.log(`[sync-season] summary written to ${target}`);
        }
        console.log(out);
    } finally {
        await pool.end();
    }
}

main().catch(e => { console.error(e); process.exit(1); });
