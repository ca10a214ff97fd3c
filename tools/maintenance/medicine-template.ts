// tools/maintenance/medicine-template.ts
// Usage: medicine-template [--out Medicine_Upload_Template.xlsx]
import path from 'node:path';
import { getConfig, flagString } from './config';
import { ensureDir } from './util';
import {
    TEMPLATE_COLUMNS,
    TEMPLATE_FILENAME,
    UPLOAD_TIPS,
    writeMedicineTemplate,
} from '../../src/modules/medicines/medicine.template';

async function main() {
    const cfg = getConfig();
    const out = path.resolve(flagString(cfg.flags, 'out') ?? TEMPLATE_FILENAME);
    ensureDir(path.dirname(out));

    await writeMedicineTemplate(out);
    console.log(`Excel template created: ${out}`);

    console.log('\nColumn Requirements:');
    TEMPLATE_COLUMNS.forEach((c, i) => console.log(`${i + 1}. ${c.key} - ${c.description}`));

    console.log('\nTips for successful upload:');
    for (const tip of UPLOAD_TIPS) console.log(`- ${tip}`);
}

main().catch(e => { console.error(e); process.exit(1); });
