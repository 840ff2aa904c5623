import { getString } from '../../../utils/arguments.js';
import type { SourceDocument } from '../document.js';
import { RefactoringError } from '../errors.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { afterByteOrderMark } from './shared.js';

/**
 * Header lines for `add-file-header`. `header_text` wins over `copyright`;
 * a literal `\n` in `header_text` starts a new line.
 */
export function headerLines(request: OperationRequest, year = new Date().getFullYear()): string[] {
    const headerText = getString(request.arguments, 'header_text');
    if (headerText.trim() !== '') {
        return headerText.replace(/\\n/g, '\n').split(/\r?\n/);
    }
    const owner = getString(request.arguments, 'copyright').trim();
    if (owner !== '') {
        return [`Copyright (c) ${year} ${owner}. All rights reserved.`];
    }
    throw new RefactoringError('Either header_text or copyright must be provided');
}

export function addFileHeader(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const header = headerLines(request)
        .map(line => (line.trim() === '' ? '//' : `// ${line.trimEnd()}`))
        .join(doc.eol);

    const bodyStart = afterByteOrderMark(doc, 0);
    const body = doc.text.slice(bodyStart);
    if (body.startsWith(header)) {
        return edit(doc.text, `File header already present in ${doc.path}`);
    }
    const text = body === '' ? header + doc.eol : header + doc.eol + doc.eol + body;
    return edit(doc.text.slice(0, bodyStart) + text, 'Added file header');
}
