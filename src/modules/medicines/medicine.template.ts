// src/modules/medicines/medicine.template.ts
import ExcelJS from "exceljs";

export const TEMPLATE_FILENAME = "Medicine_Upload_Template.xlsx";
export const TEMPLATE_SHEET = "Medicines";

export interface TemplateRow {
    name: string;
    therapeutic_category: string;
    manufacturing_date: string;
    expiring_date: string;
    dosage_form: string;
    price: number;
    stock_quantity: number;
}

/** Upload columns, in sheet order, with what the importer expects in each. */
export const TEMPLATE_COLUMNS: ReadonlyArray<{ key: keyof TemplateRow; description: string; width: number }> = [
    { key: "name", description: "Medicine name (required)", width: 24 },
    { key: "therapeutic_category", description: "Category like 'Analgesic', 'Antibiotic', etc.", width: 22 },
    { key: "manufacturing_date", description: "Format: YYYY-MM-DD", width: 20 },
    { key: "expiring_date", description: "Format: YYYY-MM-DD", width: 16 },
    { key: "dosage_form", description: "Form like 'Tablet', 'Capsule', 'Syrup', etc.", width: 14 },
    { key: "price", description: "Price as a plain number (no currency symbol)", width: 10 },
    { key: "stock_quantity", description: "Number of units in stock", width: 16 },
];

export const TEMPLATE_SAMPLES: readonly TemplateRow[] = [
    { name: "Paracetamol 500mg", therapeutic_category: "Analgesic", manufacturing_date: "2024-01-15", expiring_date: "2026-01-15", dosage_form: "Tablet", price: 5.5, stock_quantity: 100 },
    { name: "Amoxicillin 250mg", therapeutic_category: "Antibiotic", manufacturing_date: "2024-02-10", expiring_date: "2027-02-10", dosage_form: "Capsule", price: 8.75, stock_quantity: 75 },
    { name: "Ibuprofen 400mg", therapeutic_category: "Anti-inflammatory", manufacturing_date: "2024-03-05", expiring_date: "2026-03-05", dosage_form: "Tablet", price: 6.25, stock_quantity: 150 },
    { name: "Cough Syrup 100ml", therapeutic_category: "Respiratory", manufacturing_date: "2024-01-20", expiring_date: "2025-01-20", dosage_form: "Syrup", price: 12, stock_quantity: 50 },
    { name: "Vitamin C 1000mg", therapeutic_category: "Supplement", manufacturing_date: "2024-04-01", expiring_date: "2026-04-01", dosage_form: "Tablet", price: 15.3, stock_quantity: 200 },
];

export const UPLOAD_TIPS: readonly string[] = [
    "Make sure all required columns are present",
    "Use proper date format (YYYY-MM-DD)",
    "Price should be a number (no currency symbols)",
    "Stock quantity should be a whole number",
    "Save as .xlsx format",
];

/** Header row + sample rows on a single sheet. */
export function buildMedicineTemplate(rows: readonly TemplateRow[] = TEMPLATE_SAMPLES): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(TEMPLATE_SHEET);
    sheet.columns = TEMPLATE_COLUMNS.map(c => ({ header: c.key, key: c.key, width: c.width }));
    sheet.getRow(1).font = { bold: true };
    for (const row of rows) sheet.addRow({ ...row });
    return workbook;
}

export async function writeMedicineTemplate(file: string = TEMPLATE_FILENAME): Promise<string> {
    await buildMedicineTemplate().xlsx.writeFile(file);
    return file;
}
