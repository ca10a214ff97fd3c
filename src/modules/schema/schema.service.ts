// src/modules/schema/schema.service.ts
import type { ColumnInfo, ForeignKeyInfo, SchemaRepo } from "./schema.repo";

export type SchemaReader = Pick<SchemaRepo, "listColumns" | "listForeignKeys">;

export interface SchemaReport {
    tables: Array<{ name: string; columns: ColumnInfo[] }>;
    foreignKeys: ForeignKeyInfo[];
}

/** One line per column: name, type, NULL / NOT NULL, PK marker. */
export function formatSchema(report: SchemaReport): string {
    const lines: string[] = ["=== CURRENT DATABASE SCHEMA ==="];
    for (const t of report.tables) {
        lines.push("", `--- Table: ${t.name} ---`);
        for (const c of t.columns) {
            const pk = c.key === "PRI" ? "PK" : "";
            lines.push(`${c.name.padEnd(20)} ${c.type.padEnd(15)} ${(c.nullable ? "NULL" : "NOT NULL").padEnd(8)} ${pk}`.trimEnd());
        }
    }

    lines.push("", "=== FOREIGN KEYS ===");
    let current = "";
    for (const fk of report.foreignKeys) {
        if (fk.table !== current) {
            lines.push(`${fk.table}:`);
            current = fk.table;
        }
        lines.push(`  ${fk.column} -> ${fk.refTable}.${fk.refColumn}`);
    }
    return lines.join("\n");
}

export class SchemaService {
    constructor(private repo: SchemaReader) {}

    async describe(): Promise<SchemaReport> {
        const [columns, foreignKeys] = await Promise.all([this.repo.listColumns(), this.repo.listForeignKeys()]);

        const byTable = new Map<string, ColumnInfo[]>();
        for (const c of columns) {
            const list = byTable.get(c.table);
            if (list) list.push(c);
            else byTable.set(c.table, [c]);
        }
        const tables = [...byTable].map(([name, cols]) => ({ name, columns: cols }));
        return { tables, foreignKeys };
    }
}
