/**
 * Dispatcher
 *
 * The single choke point in front of the refactoring engine. Expected
 * failures come back as values; engine exceptions are caught, logged and
 * turned into error text. Nothing thrown by the engine reaches the caller.
 */

import { stat } from 'fs/promises';
import type { OperationRequest, RefactoringEngine } from '../engine/refactoring/types.js';
import { getBool, getInt, getString, isBlank, type ArgumentBag } from '../utils/arguments.js';
import type { CapabilityDescriptor } from './tool-metadata.js';

export type DispatchFailure =
    | { kind: 'missing-argument'; argument: string }
    | { kind: 'target-not-found'; path: string }
    | { kind: 'engine-failure'; message: string }
    | { kind: 'cancelled' };

export type DispatchOutcome =
    | { isError: false; text: string }
    | { isError: true; text: string; failure: DispatchFailure };

export function describeFailure(failure: DispatchFailure): string {
    switch (failure.kind) {
        case 'missing-argument':
            return `Error: ${failure.argument} is required`;
        case 'target-not-found':
            return `Error: File not found: ${failure.path}`;
        case 'engine-failure':
            return `Error: ${failure.message}`;
        case 'cancelled':
            return 'Error: Operation cancelled';
    }
}

function fail(failure: DispatchFailure): DispatchOutcome {
    return { isError: true, text: describeFailure(failure), failure };
}

async function isRegularFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch {
        return false;
    }
}

class CancelledError extends Error {
    constructor() {
        super('Operation cancelled');
        this.name = 'CancelledError';
    }
}

/** Settles with `work`, or rejects with CancelledError as soon as `signal` aborts. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (!signal) return work;
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CancelledError());
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
        void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
}

export class Dispatcher {
    constructor(private readonly engine: RefactoringEngine) { }

    async invoke(descriptor: CapabilityDescriptor, args: ArgumentBag, signal?: AbortSignal): Promise<DispatchOutcome> {
        if (isBlank(args, 'file_path')) {
            return fail({ kind: 'missing-argument', argument: 'file_path' });
        }
        const missing = descriptor.inputSchema.required.find(name => name !== 'file_path' && isBlank(args, name));
        if (missing !== undefined) {
            return fail({ kind: 'missing-argument', argument: missing });
        }

        const filePath = getString(args, 'file_path').trim();
        if (!(await isRegularFile(filePath))) {
            return fail({ kind: 'target-not-found', path: filePath });
        }
        if (signal?.aborted) {
            return fail({ kind: 'cancelled' });
        }

        const outputPath = getString(args, 'output_path').trim();
        const request: OperationRequest = {
            filePath,
            lineNumber: getInt(args, 'line_number', 1),
            columnNumber: getInt(args, 'column_number', 0),
            outputPath: outputPath === '' ? undefined : outputPath,
            dryRun: getBool(args, 'dry_run', false),
            arguments: args
        };

        try {
            const text = await raceAbort(this.engine.execute(descriptor.operationId, request, signal), signal);
            return { isError: false, text };
        } catch (e) {
            if (e instanceof CancelledError || signal?.aborted) {
                console.error(`[Dispatcher] ${descriptor.toolName} cancelled`);
                return fail({ kind: 'cancelled' });
            }
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[Dispatcher] ${descriptor.toolName} failed:`, e instanceof Error ? e.stack : e);
            return fail({ kind: 'engine-failure', message });
        }
    }
}
