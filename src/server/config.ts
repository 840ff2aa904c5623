import { z } from 'zod';

export const ServerConfigSchema = z.object({
    auditEnabled: z.boolean(),
    auditDbPath: z.string().trim().min(1, 'audit database path must not be empty')
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads configuration from the environment and command line; flags win over
 * variables.
 *
 *   CAST_MCP_AUDIT_DB / --audit-db <path>   audit database (default :memory:)
 *   CAST_MCP_AUDIT=off / --no-audit         disable the audit log
 */
export function loadServerConfig(env: Environment = process.env, argv: readonly string[] = process.argv.slice(2)): ServerConfig {
    let auditDbPath = env.CAST_MCP_AUDIT_DB ?? ':memory:';
    let auditEnabled = env.CAST_MCP_AUDIT?.toLowerCase() !== 'off';

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--no-audit') {
            auditEnabled = false;
        } else if (arg === '--audit-db') {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error('--audit-db requires a path');
            }
            auditDbPath = value;
            i++;
        } else if (arg.startsWith('--audit-db=')) {
            auditDbPath = arg.slice('--audit-db='.length);
        }
    }

    return ServerConfigSchema.parse({ auditEnabled, auditDbPath });
}
