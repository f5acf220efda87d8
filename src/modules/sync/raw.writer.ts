// src/modules/sync/raw.writer.ts
import fs from "fs/promises";
import path from "path";

/** Where a full sync leaves its raw downloads for audit. */
export interface RawPayloadWriter {
    /** Returns a handle (file path) for the stored payload. */
    write(seasonYear: number, payload: unknown): Promise<string>;
}

export class FileRawPayloadWriter implements RawPayloadWriter {
    constructor(private readonly dataDir: string) {}

    async write(seasonYear: number, payload: unknown): Promise<string> {
        const dir = path.resolve(this.dataDir);
        await fs.mkdir(dir, { recursive: true });
        const target = path.join(dir, `season_${seasonYear}.json`);
        await fs.writeFile(target, JSON.stringify(payload, null, 2), "utf8");
        return target;
    }
}
