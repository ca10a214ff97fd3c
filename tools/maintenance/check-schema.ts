// tools/maintenance/check-schema.ts
// Usage: check-schema [--report ./reports]
import { getConfig, flagString } from './config';
import { withPool } from './pools';
import { writeTextReport } from './util';
import { SchemaRepo } from '../../src/modules/schema/schema.repo';
import { SchemaService, formatSchema } from '../../src/modules/schema/schema.service';

async function main() {
    const cfg = getConfig();
    const report = await withPool(cfg.db, pool => new SchemaService(new SchemaRepo(pool)).describe());
    const text = formatSchema(report);
    console.log(text);

    const dir = flagString(cfg.flags, 'report');
    if (dir) console.log(`\n[check-schema] Report: ${writeTextReport(dir, 'schema', text)}`);
}

main().catch(e => { console.error(e); process.exit(1); });
