// src/modules/schema/schema.repo.ts
import type { RowDataPacket } from "mysql2";
import type { Pool } from "mysql2/promise";

export interface ColumnInfo {
    table: string;
    name: string;
    type: string;
    nullable: boolean;
    key: string;
}

export interface ForeignKeyInfo {
    table: string;
    column: string;
    refTable: string;
    refColumn: string;
}

/** Reads the connected schema from information_schema. */
export class SchemaRepo {
    constructor(public readonly pool: Pool) {}

    async listColumns(): Promise<ColumnInfo[]> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT table_name AS t, column_name AS c, column_type AS ty, is_nullable AS n, column_key AS k
                FROM information_schema.columns
                WHERE table_schema = DATABASE()
                ORDER BY table_name, ordinal_position
            `
        );
        return rows.map(r => ({
            table: String(r.t),
            name: String(r.c),
            type: String(r.ty),
            nullable: r.n === "YES",
            key: String(r.k ?? ""),
        }));
    }

    async listForeignKeys(): Promise<ForeignKeyInfo[]> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT table_name AS t, column_name AS c,
                       referenced_table_name AS rt, referenced_column_name AS rc
                FROM information_schema.key_column_usage
                WHERE table_schema = DATABASE() AND referenced_table_name IS NOT NULL
                ORDER BY table_name, column_name
            `
        );
        return rows.map(r => ({
            table: String(r.t),
            column: String(r.c),
            refTable: String(r.rt),
            refColumn: String(r.rc),
        }));
    }
}
