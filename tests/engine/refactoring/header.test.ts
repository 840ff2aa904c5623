import { addFileHeader, headerLines } from '../../../src/engine/refactoring/operations/header.js';
import type { OperationRequest } from '../../../src/engine/refactoring/types.js';
import { editWith, lines } from '../../fixtures.js';

const request = (args: Record<string, unknown>): OperationRequest => ({
    filePath: 'Sample.cs',
    lineNumber: 1,
    columnNumber: 0,
    dryRun: false,
    arguments: args
});

describe('headerLines', () => {
    it('splits header_text on literal \\n sequences', () => {
        expect(headerLines(request({ header_text: 'Line one\\nLine two' }))).toEqual(['Line one', 'Line two']);
    });

    it('builds a copyright line for the given year', () => {
        expect(headerLines(request({ copyright: 'Example Corp' }), 2024)).toEqual(['Copyright (c) 2024 Example Corp. All rights reserved.']);
    });

    it('prefers header_text over copyright', () => {
        expect(headerLines(request({ header_text: 'Custom', copyright: 'Example Corp' }))).toEqual(['Custom']);
    });

    it('requires one of the two', () => {
        expect(() => headerLines(request({}))).toThrow('Either header_text or copyright must be provided');
    });
});

describe('add-file-header', () => {
    const source = lines('namespace App;', '', 'class A { }');

    it('prepends a comment block and a blank line', () => {
        const result = editWith(addFileHeader, source, { header_text: 'Sample project\\n\\nMIT licensed' });
        expect(result.summary).toBe('Added file header');
        expect(result.text).toBe(lines('// Sample project', '//', '// MIT licensed', '', 'namespace App;', '', 'class A { }'));
    });

    it('keeps CRLF line endings', () => {
        const result = editWith(addFileHeader, 'class A { }\r\n', { header_text: 'One\\nTwo' });
        expect(result.text).toBe('// One\r\n// Two\r\n\r\nclass A { }\r\n');
    });

    it('writes the header after a leading byte order mark', () => {
        const result = editWith(addFileHeader, '\uFEFFclass A { }\n', { header_text: 'Demo' });
        expect(result.text).toBe('\uFEFF// Demo\n\nclass A { }\n');
        expect(editWith(addFileHeader, result.text, { header_text: 'Demo' }).summary).toBe('File header already present in Sample.cs');
    });

    it('does nothing when the header is already there', () => {
        const withHeader = lines('// Sample project', '', 'class A { }');
        const result = editWith(addFileHeader, withHeader, { header_text: 'Sample project' });
        expect(result.text).toBe(withHeader);
        expect(result.summary).toBe('File header already present in Sample.cs');
    });
});
