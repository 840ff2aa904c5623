import Database from 'better-sqlite3';
import { AuditDetailsSchema, type AuditLog, AuditLogRowSchema, AuditLogSchema } from '../schema/audit.js';

export class AuditRepository {
    constructor(private db: Database.Database) { }

    create(log: Omit<AuditLog, 'id'>): AuditLog {
        // Validate input
        const validated = AuditLogSchema.omit({ id: true }).parse(log);

        const stmt = this.db.prepare(`
            INSERT INTO audit_logs (action, target, details, timestamp)
            VALUES (@action, @target, @details, @timestamp)
        `);

        const info = stmt.run({
            action: validated.action,
            target: validated.target,
            details: JSON.stringify(validated.details),
            timestamp: validated.timestamp
        });

        return { ...validated, id: Number(info.lastInsertRowid) };
    }

    list(limit: number = 50): AuditLog[] {
        const stmt = this.db.prepare(`
            SELECT id, action, target, details, timestamp
            FROM audit_logs
            ORDER BY id DESC
            LIMIT ?
        `);

        return stmt.all(limit).map(raw => {
            const row = AuditLogRowSchema.parse(raw);
            return {
                ...row,
                details: AuditDetailsSchema.parse(JSON.parse(row.details))
            };
        });
    }
}
