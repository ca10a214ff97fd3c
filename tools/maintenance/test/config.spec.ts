// tools/maintenance/test/config.spec.ts
import path from 'node:path';
import { flagBool, flagNumber, flagString, getConfig, parseArgs } from '../config';
import { formatScore, nowStamp } from '../util';

describe('parseArgs', () => {
    test('reads --key value, --key=value and bare flags', () => {
        const { flags, args } = parseArgs(['med 99', '--limit', '3', '--threshold=0.5', '--names', 'list.txt']);
        expect(args).toEqual(['med 99']);
        expect(flagNumber(flags, 'limit')).toBe(3);
        expect(flagNumber(flags, 'threshold')).toBe(0.5);
        expect(flagString(flags, 'names')).toBe('list.txt');
    });

    test('switches never consume the following positional argument', () => {
        const { flags, args } = parseArgs(['--verbose', 'med 99', '--dry', 'mad_99', '--no-optimize', 'x']);
        expect(args).toEqual(['med 99', 'mad_99', 'x']);
        expect(flagBool(flags, 'verbose')).toBe(true);
        expect(flagBool(flags, 'dry')).toBe(true);
        expect(flagBool(flags, 'no-optimize')).toBe(true);
        expect(flagString(flags, 'dry')).toBeUndefined();
    });

    test('custom switch set', () => {
        const { flags, args } = parseArgs(['--verbose', 'med 99'], new Set());
        expect(args).toEqual([]);
        expect(flagString(flags, 'verbose')).toBe('med 99');
    });

    test('bare flag before another flag stays boolean', () => {
        const { flags } = parseArgs(['--dry', '--limit', 'x']);
        expect(flags.get('dry')).toBe(true);
        expect(flagNumber(flags, 'limit')).toBeUndefined();
        expect(flagString(flags, 'missing')).toBeUndefined();
    });
});

describe('getConfig', () => {
    test('falls back to local defaults and reads the admin id', () => {
        const envFile = path.join(__dirname, 'does-not-exist.env');
        const cfg = getConfig(['--dry', '--env-file', envFile], {
            DB_NAME: 'pharmacy_test',
            ADMIN_TELEGRAM_ID: ' 42 ',
            BOT_TOKEN: 'test-token',
        });
        expect(cfg.dryRun).toBe(true);
        expect(cfg.envFile).toBe(envFile);
        expect(cfg.db).toEqual({
            host: '127.0.0.1',
            port: 3306,
            user: 'root',
            pass: '',
            name: 'pharmacy_test',
            connLimit: 4,
        });
        expect(cfg.bot).toEqual({ adminTelegramId: 42, tokenSet: true });
        expect(cfg.business.name).toBe('Pharmacy');
    });

    test('non-numeric admin id is treated as unset', () => {
        const cfg = getConfig(['--env-file', path.join(__dirname, 'none.env')], { ADMIN_TELEGRAM_ID: 'abc' });
        expect(cfg.bot.adminTelegramId).toBeNull();
        expect(cfg.dryRun).toBe(false);
    });
});

describe('util', () => {
    test('formatScore shows three decimals and a floored percentage', () => {
        expect(formatScore(5 / 6)).toBe('0.833 (83%)');
        expect(formatScore(1)).toBe('1.000 (100%)');
    });

    test('nowStamp is filename-safe', () => {
        expect(nowStamp(new Date('2024-01-15T10:20:30.456Z'))).toBe('2024-01-15T10-20-30-456Z');
    });
});
