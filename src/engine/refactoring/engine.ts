import { readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';
import { OPERATIONS } from './catalog.js';
import { createUnifiedDiff } from './diff.js';
import { SourceDocument } from './document.js';
import { RefactoringError } from './errors.js';
import type { OperationDefinition, OperationId, OperationRequest, RefactoringEngine } from './types.js';

/** Writes to a sibling temporary file, then renames it over the target. */
export async function writeAtomically(target: string, text: string, signal?: AbortSignal): Promise<void> {
    const temp = join(dirname(target), `.${basename(target)}.${process.pid}.${randomUUID()}.tmp`);
    try {
        await writeFile(temp, text, { encoding: 'utf8', signal });
        signal?.throwIfAborted();
        await rename(temp, target);
    } catch (e) {
        await rm(temp, { force: true });
        throw e;
    }
}

/**
 * Token-level C# refactoring engine. Operations see one file at a time and
 * have no semantic model; anything they cannot decide from the tokens is
 * reported as a RefactoringError.
 */
export class SourceRefactoringEngine implements RefactoringEngine {
    private readonly operations: ReadonlyMap<OperationId, OperationDefinition>;

    constructor(operations: readonly OperationDefinition[] = OPERATIONS) {
        this.operations = new Map(operations.map(op => [op.id, op]));
    }

    listOperations(): readonly OperationDefinition[] {
        return [...this.operations.values()];
    }

    async execute(id: OperationId, request: OperationRequest, signal?: AbortSignal): Promise<string> {
        const operation = this.operations.get(id);
        if (!operation) {
            throw new RefactoringError(`Unknown operation: ${id}`);
        }

        signal?.throwIfAborted();
        const original = await readFile(request.filePath, { encoding: 'utf8', signal });
        const outcome = operation.run(new SourceDocument(request.filePath, original), request);

        if (outcome.kind === 'report') {
            return outcome.text;
        }
        const target = request.outputPath?.trim() || request.filePath;
        if (request.dryRun) {
            return `[DRY RUN] ${outcome.summary}\n${createUnifiedDiff(request.filePath, original, outcome.text, target)}`;
        }

        if (outcome.text === original && target === request.filePath) {
            return outcome.summary;
        }

        signal?.throwIfAborted();
        await writeAtomically(target, outcome.text, signal);
        return `${outcome.summary} in ${target}`;
    }
}
