// tools/maintenance/setup-admin.ts
// Usage: setup-admin [--id 123456789] [--env-file .env]
import readline from 'node:readline/promises';
import { getConfig, flagString } from './config';
import { updateEnvFile, type UpdateEnvFailure } from '../../src/modules/settings/envFile';

async function ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
}

async function main() {
    const cfg = getConfig();
    console.log('Setting up Admin Telegram ID');
    console.log(`   env file: ${cfg.envFile}\n`);

    let id = flagString(cfg.flags, 'id');
    if (id === undefined) {
        console.log('How to get your Telegram ID:');
        console.log('1. Open Telegram');
        console.log('2. Message @userinfobot');
        console.log('3. Copy the number it gives you\n');
        id = await ask('Enter your Telegram ID: ');
    }

    const res = updateEnvFile(cfg.envFile, id);
    if (res.ok) {
        console.log(`Admin Telegram ID set to: ${res.telegramId}`);
        return;
    }

    const messages: Record<UpdateEnvFailure, string> = {
        'missing-file': `${cfg.envFile} not found!`,
        'invalid-id': 'Please enter a valid number',
        'missing-key': 'Could not find ADMIN_TELEGRAM_ID line in the env file',
    };
    console.error(`[setup-admin] ${messages[res.reason]}`);
    process.exitCode = 1;
}

main().catch(e => { console.error(e); process.exit(1); });
