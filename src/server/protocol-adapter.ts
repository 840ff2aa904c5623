/**
 * Protocol Adapter
 *
 * Implements the two MCP verbs against the registry and dispatcher.
 * callTool always returns a result; it never throws.
 */

import type { ArgumentBag } from '../utils/arguments.js';
import type { AuditLogger } from './audit.js';
import type { CapabilityRegistry } from './capability-registry.js';
import type { Dispatcher } from './dispatcher.js';
import { fromWireName, toWireName, WIRE_PREFIX } from './naming.js';
import { textResult, type InvocationResult, type WireToolDescriptor } from './tool-metadata.js';

export class ProtocolAdapter {
    constructor(
        private readonly registry: CapabilityRegistry,
        private readonly dispatcher: Dispatcher,
        private readonly audit?: AuditLogger
    ) { }

    listTools(): WireToolDescriptor[] {
        return this.registry.listAll().map(descriptor => ({
            name: toWireName(descriptor.toolName),
            description: descriptor.description,
            inputSchema: descriptor.inputSchema
        }));
    }

    async callTool(name: string, args: ArgumentBag, signal?: AbortSignal): Promise<InvocationResult> {
        const startedAt = Date.now();
        const result = await this.resolveAndDispatch(name, args, signal);
        this.audit?.record({ toolName: name, args, result, startedAt });
        return result;
    }

    private async resolveAndDispatch(name: string, args: ArgumentBag, signal?: AbortSignal): Promise<InvocationResult> {
        try {
            const { toolName, recognized } = fromWireName(name);
            if (!recognized) {
                console.error(`[Server] Tool name '${name}' lacks the ${WIRE_PREFIX} prefix; resolving it as '${toolName}'`);
            }
            const descriptor = this.registry.resolve(toolName);
            if (!descriptor) {
                return textResult(`Unknown tool: ${name}`, true);
            }
            const outcome = await this.dispatcher.invoke(descriptor, args, signal);
            return textResult(outcome.text, outcome.isError);
        } catch (e) {
            console.error(`[Server] Unexpected failure in ${name}:`, e);
            return textResult(`Error: ${e instanceof Error ? e.message : String(e)}`, true);
        }
    }
}
