// tools/maintenance/check-medicines.ts
import { getConfig } from './config';
import { withPool } from './pools';
import { MedicinesRepo } from '../../src/modules/medicines/medicines.repo';
import { MedicinesService } from '../../src/modules/medicines/medicines.service';

async function main() {
    const cfg = getConfig();
    const { cat, rows } = await withPool(cfg.db, async pool => {
        const repo = new MedicinesRepo(pool);
        const [cat, rows] = await Promise.all([new MedicinesService(repo).catalogue(), repo.countAll()]);
        return { cat, rows };
    });

    console.log('=== CURRENT MEDICINES IN DATABASE ===');
    for (const g of cat.groups) {
        console.log(`\n${g.category}:`);
        for (const m of g.medicines) {
            console.log(`  • ${m.name} - ${m.price} (Stock: ${m.stockQuantity})`);
        }
    }
    console.log(`\nTotal medicines: ${cat.total} active (${rows} rows incl. inactive)`);

    console.log('\n=== CATEGORIES ===');
    for (const c of cat.categories) console.log(`  • ${c}`);
    console.log(`\nTotal categories: ${cat.categories.length}`);
}

main().catch(e => { console.error(e); process.exit(1); });
