import Database from 'better-sqlite3';
import { isAbsolute, join } from 'path';
import { initDB } from './db.js';
import { migrate } from './migrations.js';

let dbInstance: Database.Database | null = null;
let configuredDbPath = ':memory:';

function resolveDbPath(path: string): string {
    if (path === ':memory:' || isAbsolute(path)) return path;
    return join(process.cwd(), path);
}

/**
 * Set the database path before the first getDb(). Relative paths resolve
 * against the working directory.
 */
export function configureDbPath(path: string): void {
    if (dbInstance) {
        throw new Error('Cannot configure database path after database has been initialized');
    }
    configuredDbPath = resolveDbPath(path);
}

export function getDbPath(): string {
    return configuredDbPath;
}

export function getDb(): Database.Database {
    if (!dbInstance) {
        console.error(`[Database] Initializing database at: ${configuredDbPath}`);
        dbInstance = initDB(configuredDbPath);
        migrate(dbInstance);
    }
    return dbInstance;
}

/**
 * Close the database, checkpointing the WAL of file databases first.
 */
export function closeDb(): void {
    if (!dbInstance) return;
    if (configuredDbPath !== ':memory:') {
        try {
            dbInstance.pragma('wal_checkpoint(TRUNCATE)');
            console.error('[Database] WAL checkpoint completed');
        } catch (e) {
            console.error('[Database] WAL checkpoint failed:', e instanceof Error ? e.message : e);
        }
    }
    dbInstance.close();
    dbInstance = null;
    console.error('[Database] Database closed');
}

export * from './db.js';
export * from './migrations.js';
export * from './audit.repo.js';
