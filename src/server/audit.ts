import type { AuditRepository } from '../storage/audit.repo.js';
import type { ArgumentBag } from '../utils/arguments.js';
import type { InvocationResult } from './tool-metadata.js';

export interface AuditEntry {
    toolName: string;
    args: ArgumentBag;
    result: InvocationResult;
    startedAt: number;
}

/** Records every tool call. Write failures are logged and never reach the caller. */
export class AuditLogger {
    constructor(private readonly repo: AuditRepository, private readonly now: () => number = Date.now) { }

    record({ toolName, args, result, startedAt }: AuditEntry): void {
        const filePath = args?.['file_path'];
        try {
            this.repo.create({
                action: toolName,
                target: typeof filePath === 'string' && filePath.trim() !== '' ? filePath : null,
                details: {
                    arguments: args ? { ...args } : undefined,
                    outcome: result.isError ? 'error' : 'success',
                    message: result.content.map(c => c.text).join('\n'),
                    durationMs: Math.max(0, Math.round(this.now() - startedAt))
                },
                timestamp: new Date().toISOString()
            });
        } catch (logError) {
            console.error('[Audit] Failed to write audit log:', logError);
        }
    }
}
