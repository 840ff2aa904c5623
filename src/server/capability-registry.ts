/**
 * Capability Registry
 *
 * Built once at startup from the engine's operation list. Holds one frozen
 * descriptor per operation, keyed by tool name, in the engine's order.
 */

import type { OperationDefinition, RefactoringEngine } from '../engine/refactoring/types.js';
import { isValidToolName, toToolName } from './naming.js';
import { generateInputSchema } from './schema-generator.js';
import { describeTool } from './tool-descriptions.js';
import type { CapabilityDescriptor } from './tool-metadata.js';

export class RegistryBuildError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RegistryBuildError';
    }
}

/** Freezes the descriptor together with its schema, parameters and enum lists. */
function freezeDescriptor(descriptor: CapabilityDescriptor): CapabilityDescriptor {
    const { inputSchema } = descriptor;
    for (const parameter of Object.values(inputSchema.properties)) {
        if (parameter.enum) Object.freeze(parameter.enum);
        Object.freeze(parameter);
    }
    Object.freeze(inputSchema.properties);
    Object.freeze(inputSchema.required);
    Object.freeze(inputSchema);
    return Object.freeze(descriptor);
}

export class CapabilityRegistry {
    private readonly descriptors: ReadonlyMap<string, CapabilityDescriptor>;

    constructor(descriptors: readonly CapabilityDescriptor[]) {
        const map = new Map<string, CapabilityDescriptor>();
        for (const descriptor of descriptors) {
            if (map.has(descriptor.toolName)) {
                throw new RegistryBuildError(
                    `Duplicate tool name '${descriptor.toolName}' (from ${map.get(descriptor.toolName)?.operationId} and ${descriptor.operationId})`
                );
            }
            map.set(descriptor.toolName, freezeDescriptor(descriptor));
        }
        this.descriptors = map;
    }

    get size(): number {
        return this.descriptors.size;
    }

    listAll(): CapabilityDescriptor[] {
        return [...this.descriptors.values()];
    }

    resolve(toolName: string): CapabilityDescriptor | undefined {
        return this.descriptors.get(toolName);
    }
}

export function buildCapabilityRegistry(engine: RefactoringEngine): CapabilityRegistry {
    let operations: readonly OperationDefinition[];
    try {
        operations = engine.listOperations();
    } catch (e) {
        throw new RegistryBuildError(`Failed to enumerate operations: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }

    const descriptors = operations.map((operation): CapabilityDescriptor => {
        const toolName = toToolName(operation.id);
        if (!isValidToolName(toolName)) {
            throw new RegistryBuildError(`Operation '${operation.id}' maps to invalid tool name '${toolName}'`);
        }
        return {
            toolName,
            operationId: operation.id,
            description: describeTool(toolName),
            inputSchema: generateInputSchema(toolName)
        };
    });

    const registry = new CapabilityRegistry(descriptors);
    console.error(`[Registry] Registered ${registry.size} tools`);
    return registry;
}
