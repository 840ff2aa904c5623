import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SourceRefactoringEngine } from '../engine/refactoring/engine.js';
import type { RefactoringEngine } from '../engine/refactoring/types.js';
import { AuditRepository, closeDb, configureDbPath, getDb, getDbPath } from '../storage/index.js';
import { AuditLogger } from './audit.js';
import { buildCapabilityRegistry, RegistryBuildError } from './capability-registry.js';
import { loadServerConfig, type ServerConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { ProtocolAdapter } from './protocol-adapter.js';

export const SERVER_INFO = { name: 'cast-mcp-server', version: '0.3.0' } as const;

/**
 * Wires the registry, dispatcher and (optionally) the audit log around an
 * engine. Throws RegistryBuildError when the catalog cannot be built.
 */
export function createAdapter(engine: RefactoringEngine, audit?: AuditLogger): ProtocolAdapter {
    const registry = buildCapabilityRegistry(engine);
    return new ProtocolAdapter(registry, new Dispatcher(engine), audit);
}

/** An MCP server answering tools/list and tools/call through the adapter. */
export function createServer(adapter: ProtocolAdapter): Server {
    const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: adapter.listTools() }));
    server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
        adapter.callTool(request.params.name, request.params.arguments, extra.signal)
    );

    return server;
}

/**
 * Setup graceful shutdown handlers to ensure the audit database is closed.
 */
function setupShutdownHandlers(): void {
    let isShuttingDown = false;

    const shutdown = (signal: string, exitCode = 0) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        console.error(`[Server] Received ${signal}, shutting down gracefully...`);

        try {
            closeDb();
            console.error('[Server] Shutdown complete');
            process.exit(exitCode);
        } catch (e) {
            console.error('[Server] Error during shutdown:', e instanceof Error ? e.message : e);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    // On Windows, Ctrl+Break arrives as SIGBREAK
    if (process.platform === 'win32') {
        process.on('SIGBREAK', () => shutdown('SIGBREAK'));
    }

    process.on('uncaughtException', (error) => {
        console.error('[Server] Uncaught exception:', error);
        shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        console.error('[Server] Unhandled rejection:', reason);
        shutdown('unhandledRejection', 1);
    });

    process.on('exit', (code) => {
        if (!isShuttingDown) {
            console.error(`[Server] Process exiting with code ${code}`);
            closeDb();
        }
    });
}

function createAuditLogger(config: ServerConfig): AuditLogger | undefined {
    if (!config.auditEnabled) {
        console.error('[Server] Audit log disabled');
        return undefined;
    }
    configureDbPath(config.auditDbPath);
    console.error(`[Server] Audit database: ${getDbPath()}`);
    return new AuditLogger(new AuditRepository(getDb()));
}

export async function main(): Promise<void> {
    setupShutdownHandlers();

    const config = loadServerConfig();

    let adapter: ProtocolAdapter;
    try {
        adapter = createAdapter(new SourceRefactoringEngine(), createAuditLogger(config));
    } catch (e) {
        if (e instanceof RegistryBuildError) {
            console.error(`[Server] ${e.message}`);
            process.exit(1);
        }
        throw e;
    }

    const server = createServer(adapter);
    await server.connect(new StdioServerTransport());
    console.error('[Server] Cast MCP Server running on stdio');
}
