import type { ArgumentBag } from '../../utils/arguments.js';
import type { SourceDocument } from './document.js';

/** Identifier of an engine operation, e.g. `RenameCommand`. */
export type OperationId = string;

export interface OperationRequest {
    filePath: string;
    /** 1-based */
    lineNumber: number;
    /** 0-based */
    columnNumber: number;
    outputPath?: string;
    dryRun: boolean;
    /** Raw tool arguments; operations bind their own parameters from it. */
    arguments: ArgumentBag;
}

export interface EditOutcome {
    kind: 'edit';
    text: string;
    summary: string;
}

export interface ReportOutcome {
    kind: 'report';
    text: string;
}

export type OperationOutcome = EditOutcome | ReportOutcome;

export type OperationHandler = (doc: SourceDocument, request: OperationRequest) => OperationOutcome;

export interface OperationDefinition {
    id: OperationId;
    /** Names of the operation-specific arguments the handler reads. */
    parameters: readonly string[];
    run: OperationHandler;
}

export interface RefactoringEngine {
    listOperations(): readonly OperationDefinition[];
    execute(id: OperationId, request: OperationRequest, signal?: AbortSignal): Promise<string>;
}

export function edit(text: string, summary: string): EditOutcome {
    return { kind: 'edit', text, summary };
}

export function report(text: string): ReportOutcome {
    return { kind: 'report', text };
}
