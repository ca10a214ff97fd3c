// tools/maintenance/check-admin.ts
import { getConfig } from './config';
import { withPool } from './pools';
import { RULE } from './util';
import { UsersRepo } from '../../src/modules/users/users.repo';
import { UsersService } from '../../src/modules/users/users.service';

async function main() {
    const cfg = getConfig();
    console.log('Checking admin status');
    console.log(RULE);
    console.log(`Admin Telegram ID in config: ${cfg.bot.adminTelegramId ?? '(none)'}`);

    const status = await withPool(cfg.db, pool => new UsersService(new UsersRepo(pool)).adminStatus(cfg.bot.adminTelegramId));
    if (!status.configured) {
        console.log('No admin ID configured! Run setup-admin first.');
        process.exitCode = 1;
        return;
    }
    if (!status.user) {
        console.log('User not found in database (the admin must /start the bot once)');
        process.exitCode = 1;
        return;
    }

    console.log(`User found: ${status.user.firstName}${status.user.username ? ` (@${status.user.username})` : ''}`);
    console.log(`Current role: ${status.user.userType}`);
    console.log(`Is Admin: ${status.isAdmin}`);
    console.log(`Is Staff: ${status.isStaff}`);
    console.log(status.isAdmin ? 'ADMIN STATUS CONFIRMED!' : 'Admin status not confirmed');

    console.log('\nBot Configuration:');
    console.log(`   Business: ${cfg.business.name}`);
    console.log(`   Contact: ${cfg.business.phone}`);
    console.log(`   Email: ${cfg.business.email}`);
    console.log(`   Bot Token: ${cfg.bot.tokenSet ? 'configured' : 'MISSING'}`);
}

main().catch(e => { console.error(e); process.exit(1); });
