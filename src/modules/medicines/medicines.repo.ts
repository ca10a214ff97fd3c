// src/modules/medicines/medicines.repo.ts
import type { RowDataPacket } from "mysql2";
import type { Pool } from "mysql2/promise";
import type { Medicine } from "../../types/domain";

function mapMedicineRow(r: RowDataPacket): Medicine {
    return {
        id: Number(r.id),
        name: String(r.name ?? ""),
        therapeuticCategory: r.therapeutic_category ?? null,
        dosageForm: r.dosage_form ?? null,
        manufacturingDate: r.manufacturing_date ?? null,
        expiringDate: r.expiring_date ?? null,
        price: Number(r.price ?? 0),
        stockQuantity: Number(r.stock_quantity ?? 0),
    };
}

export class MedicinesRepo {
    constructor(public readonly pool: Pool) {}

    /** Active medicines, by category then name (NULL category first). */
    async listActive(): Promise<Medicine[]> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT id, name, therapeutic_category, dosage_form,
                       manufacturing_date, expiring_date, price, stock_quantity
                FROM medicines
                WHERE is_active = 1
                ORDER BY therapeutic_category, name
            `
        );
        return rows.map(mapMedicineRow);
    }

    async listCategories(): Promise<string[]> {
        const [rows] = await this.pool.query<RowDataPacket[]>(
            `
                SELECT DISTINCT therapeutic_category
                FROM medicines
                WHERE is_active = 1 AND therapeutic_category IS NOT NULL
                ORDER BY therapeutic_category
            `
        );
        return rows.map(r => String(r.therapeutic_category));
    }

    async countAll(): Promise<number> {
        const [rows] = await this.pool.query<RowDataPacket[]>(`SELECT COUNT(*) AS n FROM medicines`);
        return Number(rows[0]?.n ?? 0);
    }
}
