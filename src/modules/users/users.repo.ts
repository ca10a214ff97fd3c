// src/modules/users/users.repo.ts
import type { RowDataPacket } from "mysql2";
import type { Pool } from "mysql2/promise";
import { parseUserType, type BotUser } from "../../types/domain";

function mapUserRow(r: RowDataPacket): BotUser {
    return {
        id: Number(r.id),
        telegramId: Number(r.telegram_id),
        username: r.username ?? null,
        firstName: String(r.first_name ?? ""),
        lastName: r.last_name ?? null,
        userType: parseUserType(r.user_type),
        isActive: Number(r.is_active ?? 1) === 1,
    };
}

export class UsersRepo {
    constructor(public readonly pool: Pool) {}

    async getByTelegramId(telegramId: number): Promise<BotUser | null> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
      SELECT u.id, u.telegram_id, u.username, u.first_name, u.last_name, u.user_type, u.is_active
      FROM users u
      WHERE u.telegram_id = ?
      LIMIT 1
      `,
            [telegramId]
        );
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }
}
