// src/modules/users/users.repo.ts
import { Pool, RowDataPacket } from "mysql2/promise";
import { ID, User } from "../../types/domain";
import { boolCol, reqIntCol, reqIsoCol, strCol } from "../../data/sql";

/** Accounts are owned elsewhere; the engine only reads them. */
export interface UserStore {
    listUsers(): Promise<User[]>;
    getById(id: ID): Promise<User | null>;
}

function mapUser(r: RowDataPacket): User {
    return {
        id: reqIntCol(r.id, "users.id"),
        displayName: strCol(r.display_name) ?? "",
        isAdmin: boolCol(r.is_admin),
        createdAt: reqIsoCol(r.created_at, "users.created_at"),
    };
}

export class UsersRepo implements UserStore {
    constructor(public readonly pool: Pool) {}

    async listUsers(): Promise<User[]> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `SELECT id, display_name, is_admin, created_at FROM users ORDER BY id`
        );
        return rows.map(mapUser);
    }

    async getById(id: ID): Promise<User | null> {
        const [rows] = await this.pool.execute<RowDataPacket[]>(
            `SELECT id, display_name, is_admin, created_at FROM users WHERE id = ? LIMIT 1`,
            [id]
        );
        return rows.length ? mapUser(rows[0]) : null;
    }
}
