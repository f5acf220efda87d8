// src/modules/settings/settings.repo.ts
import { Pool, RowDataPacket } from "mysql2/promise";
import { strCol } from "../../data/sql";

export interface SettingsStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<void>;
}

export class SettingsRepo implements SettingsStore {
    constructor(public readonly pool: Pool) {}

    async get(key: string): Promise<string | null> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `SELECT setting_value FROM settings WHERE setting_key = ? LIMIT 1`,
            [key]
        );
        return rows.length ? strCol(rows[0].setting_value) : null;
    }

    async set(key: string, value: string): Promise<void> {
        await this.pool.execute(
            `
                INSERT INTO settings (setting_key, setting_value) VALUES (?, ?)
                ON DUPLICATE KEY UPDATE setting_value = VALUES(setting_value)
            `,
            [key, value]
        );
    }
}
