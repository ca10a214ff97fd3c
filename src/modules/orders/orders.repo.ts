// src/modules/orders/orders.repo.ts
import type { RowDataPacket } from "mysql2";
import type { Pool } from "mysql2/promise";
import { qid, tableList } from "../../data/sql";

export const ORDER_TABLES = ["order_items", "orders"] as const;

export class OrdersRepo {
    constructor(public readonly pool: Pool) {}

    async countRows(table: string): Promise<number> {
        const [rows] = await this.pool.query<RowDataPacket[]>(`SELECT COUNT(*) AS n FROM ${qid(table)}`);
        return Number(rows[0]?.n ?? 0);
    }

    async countOrders() { return this.countRows("orders"); }
    async countOrderItems() { return this.countRows("order_items"); }
    async countUsers() { return this.countRows("users"); }
    async countMedicines() { return this.countRows("medicines"); }

    /**
     * Delete all order items, then all orders, in one transaction.
     * Items go first because of the order_id foreign key.
     */
    async deleteAllOrders(): Promise<void> {
        const conn = await this.pool.getConnection();
        try {
            await conn.beginTransaction();
            await conn.query(`DELETE FROM order_items`);
            await conn.query(`DELETE FROM orders`);
            await conn.commit();
        } catch (err) {
            await conn.rollback();
            throw err;
        } finally {
            conn.release();
        }
    }

    /** Reclaim space after bulk deletes. */
    async optimizeOrderTables(): Promise<void> {
        await this.pool.query(`OPTIMIZE TABLE ${tableList(ORDER_TABLES)}`);
    }
}
