import Database from 'better-sqlite3';
import { existsSync, unlinkSync } from 'fs';
import { z } from 'zod';

export interface DatabaseIntegrityResult {
    ok: boolean;
    errors: string[];
}

const IntegrityRowsSchema = z.array(z.object({ integrity_check: z.string() }));

const messageOf = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Check database integrity using SQLite's integrity_check pragma.
 */
export function checkDatabaseIntegrity(db: Database.Database): DatabaseIntegrityResult {
    try {
        const errors = IntegrityRowsSchema.parse(db.pragma('integrity_check'))
            .map(row => row.integrity_check)
            .filter(msg => msg !== 'ok');
        return { ok: errors.length === 0, errors };
    } catch (e) {
        return { ok: false, errors: [messageOf(e)] };
    }
}

/**
 * The audit log holds nothing the server needs to run, so a corrupted file
 * is removed (with its WAL and SHM companions) and recreated empty.
 */
function discardCorruptedDatabase(path: string, reason: string): void {
    console.error(`[Database] Audit database at ${path} is corrupted: ${reason}`);
    for (const file of [path, `${path}-wal`, `${path}-shm`]) {
        try {
            if (existsSync(file)) {
                unlinkSync(file);
                console.error(`[Database] Removed ${file}`);
            }
        } catch (e) {
            throw new Error(`Audit database is corrupted and cleanup failed. Please manually delete: ${file} (${messageOf(e)})`);
        }
    }
}

function open(path: string): Database.Database {
    const db = new Database(path);
    if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    return db;
}

export function initDB(path: string): Database.Database {
    console.error(`[Database] Opening database: ${path}`);

    let db: Database.Database;
    try {
        db = open(path);
    } catch (e) {
        const message = messageOf(e);
        if (!message.includes('SQLITE_CORRUPT') && !message.includes('malformed')) throw e;
        discardCorruptedDatabase(path, message);
        db = open(path);
    }

    if (path === ':memory:') return db;

    const integrity = checkDatabaseIntegrity(db);
    if (!integrity.ok) {
        db.close();
        discardCorruptedDatabase(path, integrity.errors.join(', '));
        db = open(path);
        console.error('[Database] Fresh audit database created');
    }
    return db;
}
