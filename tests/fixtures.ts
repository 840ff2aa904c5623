/**
 * Shared test fixtures: a scratch directory per test and a scriptable engine.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SourceDocument } from '../src/engine/refactoring/document.js';
import type {
    EditOutcome,
    OperationDefinition,
    OperationHandler,
    OperationId,
    OperationRequest,
    RefactoringEngine
} from '../src/engine/refactoring/types.js';
import { report } from '../src/engine/refactoring/types.js';

export const FIXED_TIMESTAMP = '2025-01-01T00:00:00.000Z';

export interface Scratch {
    dir: string;
    /** Writes `content` to `name` inside the scratch directory and returns its path. */
    file(name: string, content: string): Promise<string>;
    cleanup(): Promise<void>;
}

export async function createScratch(): Promise<Scratch> {
    const dir = await mkdtemp(join(tmpdir(), 'cast-mcp-'));
    return {
        dir,
        async file(name, content) {
            const path = join(dir, name);
            await writeFile(path, content, 'utf8');
            return path;
        },
        cleanup: () => rm(dir, { recursive: true, force: true })
    };
}

export type ExecuteHandler = (id: OperationId, request: OperationRequest, signal?: AbortSignal) => Promise<string>;

/** Engine double that records calls and answers through `handler`. */
export class FakeEngine implements RefactoringEngine {
    readonly calls: { id: OperationId; request: OperationRequest }[] = [];

    constructor(
        private readonly ids: readonly OperationId[] = ['RenameCommand', 'ExtractMethodCommand'],
        public handler: ExecuteHandler = async id => `ran ${id}`
    ) { }

    listOperations(): readonly OperationDefinition[] {
        return this.ids.map(id => ({ id, parameters: [], run: () => report('') }));
    }

    execute(id: OperationId, request: OperationRequest, signal?: AbortSignal): Promise<string> {
        this.calls.push({ id, request });
        return this.handler(id, request, signal);
    }
}

export const SAMPLE_PATH = 'Sample.cs';

export interface Position {
    line?: number;
    column?: number;
}

function runOperation(handler: OperationHandler, source: string, args: Record<string, unknown>, position: Position) {
    return handler(new SourceDocument(SAMPLE_PATH, source), {
        filePath: SAMPLE_PATH,
        lineNumber: position.line ?? 1,
        columnNumber: position.column ?? 0,
        dryRun: false,
        arguments: args
    });
}

/** Runs an editing operation on `source` and returns its outcome. */
export function editWith(handler: OperationHandler, source: string, args: Record<string, unknown> = {}, position: Position = {}): EditOutcome {
    const outcome = runOperation(handler, source, args, position);
    if (outcome.kind !== 'edit') throw new Error(`expected an edit, got a report: ${outcome.text}`);
    return outcome;
}

/** Runs a reporting operation on `source` and returns the report text. */
export function reportWith(handler: OperationHandler, source: string, args: Record<string, unknown> = {}, position: Position = {}): string {
    const outcome = runOperation(handler, source, args, position);
    if (outcome.kind !== 'report') throw new Error(`expected a report, got an edit: ${outcome.summary}`);
    return outcome.text;
}

/** Joins lines with \n and a trailing newline. */
export function lines(...content: string[]): string {
    return content.join('\n') + '\n';
}
