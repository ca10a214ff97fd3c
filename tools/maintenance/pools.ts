import { createPool, type Pool } from 'mysql2/promise';
import type { DbCfg } from './config';

export function makePool(db: DbCfg): Pool {
    return createPool({
        host: db.host,
        port: db.port,
        user: db.user,
        password: db.pass,
        database: db.name,
        waitForConnections: true,
        connectionLimit: db.connLimit,
        dateStrings: true,
    });
}

/** Open a pool, run `fn`, and always close the pool. */
export async function withPool<T>(db: DbCfg, fn: (pool: Pool) => Promise<T>): Promise<T> {
    const pool = makePool(db);
    try {
        return await fn(pool);
    } finally {
        await Promise.allSettled([pool.end()]);
    }
}
