// tools/maintenance/config.ts
import path from 'node:path';
import * as dotenv from 'dotenv';

export interface DbCfg {
    host: string;
    port: number;
    user: string;
    pass: string;
    name: string;
    connLimit: number;
}

export type Flags = Map<string, string | true>;

export interface ToolConfig {
    flags: Flags;
    /** Positional arguments (anything not consumed by a flag). */
    args: string[];
    dryRun: boolean;
    envFile: string;
    db: DbCfg;
    bot: {
        adminTelegramId: number | null;
        tokenSet: boolean;
    };
    business: {
        name: string;
        phone: string;
        email: string;
    };
}

/** Switches that never take a value: `--verbose "med 99"` keeps the query positional. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['dry', 'verbose', 'no-optimize']);

/**
 * `--key value`, `--key=value` and bare `--key` (→ true).
 * A bare flag followed by another flag, or listed in `booleans`, does not swallow the next argument.
 */
export function parseArgs(
    argv: readonly string[],
    booleans: ReadonlySet<string> = BOOLEAN_FLAGS
): { flags: Flags; args: string[] } {
    const flags: Flags = new Map();
    const args: string[] = [];
    for (let i = 0; i < argv.length; i++) {
        const a = argv[i];
        if (!a.startsWith('--')) {
            args.push(a);
            continue;
        }
        const eq = a.indexOf('=');
        if (eq > 0) {
            flags.set(a.slice(2, eq), a.slice(eq + 1));
            continue;
        }
        const key = a.slice(2);
        const next = argv[i + 1];
        if (booleans.has(key) || next === undefined || next.startsWith('--')) flags.set(key, true);
        else flags.set(key, argv[++i]);
    }
    return { flags, args };
}

export function flagString(flags: Flags, key: string): string | undefined {
    const v = flags.get(key);
    return typeof v === 'string' ? v : undefined;
}

export function flagBool(flags: Flags, key: string): boolean {
    const v = flags.get(key);
    return v === true || v === 'true' || v === '1';
}

export function flagNumber(flags: Flags, key: string): number | undefined {
    const v = flagString(flags, key);
    if (v === undefined) return undefined;
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
}

export function getConfig(argv = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): ToolConfig {
    const { flags, args } = parseArgs(argv);
    const envFile = path.resolve(process.cwd(), flagString(flags, 'env-file') ?? '.env');
    // populates process.env only; an explicit `env` (tests) is read as given
    dotenv.config({ path: envFile });

    return {
        flags,
        args,
        dryRun: flagBool(flags, 'dry'),
        envFile,
        db: {
            host: env.DB_HOST || '127.0.0.1',
            port: Number(env.DB_PORT || 3306),
            user: env.DB_USER || 'root',
            pass: env.DB_PASSWORD || '',
            name: env.DB_NAME || 'pharmacy',
            connLimit: Number(env.DB_CONN_LIMIT || 4),
        },
        bot: {
            adminTelegramId: /^[0-9]+$/.test((env.ADMIN_TELEGRAM_ID ?? '').trim())
                ? Number((env.ADMIN_TELEGRAM_ID ?? '').trim())
                : null,
            tokenSet: Boolean(env.BOT_TOKEN),
        },
        business: {
            name: env.BUSINESS_NAME || 'Pharmacy',
            phone: env.CONTACT_PHONE || '',
            email: env.CONTACT_EMAIL || '',
        },
    };
}
