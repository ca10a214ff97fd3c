// src/modules/schema/test/schema.service.spec.ts
import { SchemaService, formatSchema, type SchemaReader } from "../schema.service";

const fake: SchemaReader = {
    async listColumns() {
        return [
            { table: "order_items", name: "id", type: "int", nullable: false, key: "PRI" },
            { table: "order_items", name: "order_id", type: "int", nullable: false, key: "MUL" },
            { table: "orders", name: "id", type: "int", nullable: false, key: "PRI" },
            { table: "orders", name: "notes", type: "text", nullable: true, key: "" },
        ];
    },
    async listForeignKeys() {
        return [{ table: "order_items", column: "order_id", refTable: "orders", refColumn: "id" }];
    },
};

describe("SchemaService", () => {
    test("groups columns by table in query order", async () => {
        const report = await new SchemaService(fake).describe();
        expect(report.tables.map(t => [t.name, t.columns.map(c => c.name)])).toEqual([
            ["order_items", ["id", "order_id"]],
            ["orders", ["id", "notes"]],
        ]);
        expect(report.foreignKeys).toHaveLength(1);
    });

    test("formats columns and foreign keys", async () => {
        const text = formatSchema(await new SchemaService(fake).describe());
        const lines = text.split("\n");
        expect(lines).toContain(`${"id".padEnd(20)} ${"int".padEnd(15)} NOT NULL PK`);
        expect(lines).toContain(`${"notes".padEnd(20)} ${"text".padEnd(15)} NULL`);
        expect(lines.slice(-2)).toEqual(["order_items:", "  order_id -> orders.id"]);
    });
});
