// tools/maintenance/check-contacts.ts
import { getConfig } from './config';
import { withPool } from './pools';
import { ContactsRepo } from '../../src/modules/contacts/contacts.repo';
import { ContactsService } from '../../src/modules/contacts/contacts.service';

async function main() {
    const cfg = getConfig();
    console.log(`Checking database: ${cfg.db.name}`);

    const res = await withPool(cfg.db, pool => new ContactsService(new ContactsRepo(pool)).inspect());
    if (!res.tableFound) {
        console.log('Contact settings table not found');
        return;
    }
    console.log('Contact settings table found!');
    for (const s of res.settings) console.log(`${s.key}: ${s.value ?? ''}`);
}

main().catch(e => { console.error(e); process.exit(1); });
