// src/modules/contacts/contacts.repo.ts
import type { RowDataPacket } from "mysql2";
import type { Pool } from "mysql2/promise";
import type { ContactSetting } from "../../types/domain";

export class ContactsRepo {
    constructor(public readonly pool: Pool) {}

    /** True when the table exists in the connected schema. */
    async tableExists(table: string): Promise<boolean> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT 1
                FROM information_schema.tables
                WHERE table_schema = DATABASE() AND table_name = ?
                LIMIT 1
            `,
            [table]
        );
        return rows.length > 0;
    }

    async listSettings(): Promise<ContactSetting[]> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `SELECT setting_key, setting_value FROM contact_settings ORDER BY setting_key`
        );
        return rows.map(r => ({
            key: String(r.setting_key),
            value: r.setting_value == null ? null : String(r.setting_value),
        }));
    }
}
