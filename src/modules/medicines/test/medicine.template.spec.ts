// src/modules/medicines/test/medicine.template.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import { buildMedicineTemplate, writeMedicineTemplate, TEMPLATE_COLUMNS, TEMPLATE_SHEET } from "../medicine.template";

describe("medicine upload template", () => {
    test("header row lists the upload columns in order", () => {
        const sheet = buildMedicineTemplate().getWorksheet(TEMPLATE_SHEET);
        expect(sheet).toBeDefined();
        const header = TEMPLATE_COLUMNS.map((_c, i) => sheet?.getRow(1).getCell(i + 1).value);
        expect(header).toEqual([
            "name",
            "therapeutic_category",
            "manufacturing_date",
            "expiring_date",
            "dosage_form",
            "price",
            "stock_quantity",
        ]);
    });

    test("contains the five sample medicines", () => {
        const sheet = buildMedicineTemplate().getWorksheet(TEMPLATE_SHEET);
        expect(sheet?.rowCount).toBe(6);
        expect(sheet?.getRow(2).getCell(1).value).toBe("Paracetamol 500mg");
        expect(sheet?.getRow(2).getCell(6).value).toBe(5.5);
        expect(sheet?.getRow(6).getCell(1).value).toBe("Vitamin C 1000mg");
        expect(sheet?.getRow(6).getCell(7).value).toBe(200);
    });

    test("writes an xlsx file that reads back", async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "med-template-"));
        const file = path.join(dir, "template.xlsx");
        try {
            await writeMedicineTemplate(file);
            const wb = new ExcelJS.Workbook();
            await wb.xlsx.readFile(file);
            expect(wb.getWorksheet(TEMPLATE_SHEET)?.getRow(4).getCell(1).value).toBe("Ibuprofen 400mg");
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
