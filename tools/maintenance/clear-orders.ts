// tools/maintenance/clear-orders.ts
// Usage: clear-orders [--dry] [--no-optimize]
import { getConfig, flagBool } from './config';
import { withPool } from './pools';
import { RULE } from './util';
import { OrdersRepo } from '../../src/modules/orders/orders.repo';
import { OrdersService } from '../../src/modules/orders/orders.service';

async function main() {
    const cfg = getConfig();
    console.log(`[clear-orders] db=${cfg.db.name} dry=${cfg.dryRun}`);
    console.log('Clearing order history only (orders + order items)...');
    console.log(RULE);

    await withPool(cfg.db, async pool => {
        const svc = new OrdersService(new OrdersRepo(pool));
        const res = await svc.clearHistory({ dryRun: cfg.dryRun, optimize: !flagBool(cfg.flags, 'no-optimize') });

        if (res.skipped) {
            console.log('No orders found - database is already clean of order history');
        } else if (res.dryRun) {
            console.log(`[Dry Run] Would remove ${res.foundOrders} orders and ${res.foundItems} order items`);
        } else {
            console.log('\n' + RULE);
            console.log('ORDER HISTORY CLEARED');
            console.log(RULE);
            console.log(`Removed ${res.foundOrders} orders`);
            console.log(`Removed ${res.foundItems} order items`);
            console.log(`Remaining orders: ${res.remainingOrders}, remaining order items: ${res.remainingItems}`);
        }

        const kept = await svc.verifyOtherData();
        console.log('\nDATA VERIFICATION:');
        console.log(`   Users: ${kept.users} (preserved)`);
        console.log(`   Medicines: ${kept.medicines} (preserved)`);
        console.log(`   Orders: ${res.remainingOrders}`);
    });
    console.log('[clear-orders] Done.');
}

main().catch(e => { console.error(e); process.exit(1); });
