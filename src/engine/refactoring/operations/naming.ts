import { getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { pluralize, requireIdentifier } from './shared.js';

/**
 * Renames every identifier token spelled `old_name` (or `@old_name`).
 * Strings and comments are left alone.
 */
export function rename(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const oldName = requireIdentifier(getString(request.arguments, 'old_name'), 'old_name');
    const newName = requireIdentifier(getString(request.arguments, 'new_name'), 'new_name');
    if (oldName === newName) {
        throw new RefactoringError(`old_name and new_name are both '${oldName}'`);
    }

    const edits: TextEdit[] = [];
    for (const token of doc.tokens) {
        if (token.kind !== 'identifier') continue;
        if (token.text === oldName) {
            edits.push({ start: token.start, end: token.end, text: newName });
        } else if (token.text === `@${oldName}`) {
            edits.push({ start: token.start, end: token.end, text: `@${newName}` });
        }
    }

    if (edits.length === 0) {
        throw new RefactoringError(`Symbol '${oldName}' not found in ${doc.path}`);
    }

    return edit(
        doc.applyEdits(edits),
        `Renamed '${oldName}' to '${newName}' (${pluralize(edits.length, 'occurrence')})`
    );
}
