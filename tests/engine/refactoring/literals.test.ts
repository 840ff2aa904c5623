import {
    convertNumericLiteral,
    convertStringFormat,
    convertStringLiteral,
    convertToInterpolatedString,
    parseIntegerLiteral
} from '../../../src/engine/refactoring/operations/literals.js';
import { editWith } from '../../fixtures.js';

describe('convert-numeric-literal', () => {
    it('converts to hexadecimal by default', () => {
        const result = editWith(convertNumericLiteral, 'int mask = 255;', {}, { column: 11 });
        expect(result.text).toBe('int mask = 0xFF;');
        expect(result.summary).toBe('Converted 255 to 0xFF');
    });

    it('converts to binary', () => {
        expect(editWith(convertNumericLiteral, 'int mask = 255;', { target_format: 'binary' }, { column: 11 }).text)
            .toBe('int mask = 0b11111111;');
    });

    it('keeps the type suffix', () => {
        expect(editWith(convertNumericLiteral, 'ulong big = 0xFFul;', { target_format: 'dec' }, { column: 12 }).text)
            .toBe('ulong big = 255ul;');
    });

    it('falls back to the first literal on the line', () => {
        expect(editWith(convertNumericLiteral, 'int flags = 16;', { target_format: 'hex' }).text).toBe('int flags = 0x10;');
    });

    it('reports a literal already in the target form', () => {
        const result = editWith(convertNumericLiteral, 'var x = 0x10;', { target_format: 'hex' });
        expect(result.text).toBe('var x = 0x10;');
        expect(result.summary).toBe('Literal 0x10 is already in hex form');
    });

    it('rejects unknown formats and non-integers', () => {
        expect(() => editWith(convertNumericLiteral, 'var x = 1;', { target_format: 'oct' }))
            .toThrow("Unknown target_format 'oct' (expected dec, hex or bin)");
        expect(() => editWith(convertNumericLiteral, 'var x = 1.5;')).toThrow("'1.5' is not an integer literal");
        expect(() => editWith(convertNumericLiteral, 'var x = y;')).toThrow('No numeric literal found at line 1, column 0');
    });

    it('parses separators and suffixes', () => {
        expect(parseIntegerLiteral('1_000L')).toEqual({ value: 1000n, suffix: 'L' });
        expect(parseIntegerLiteral('0b1010')).toEqual({ value: 10n, suffix: '' });
    });
});

describe('convert-string-literal', () => {
    it('turns a regular string into a verbatim one', () => {
        const result = editWith(convertStringLiteral, 'var p = "C:\\\\temp";', {}, { column: 8 });
        expect(result.text).toBe('var p = @"C:\\temp";');
        expect(result.summary).toBe('Converted string literal to verbatim form');
    });

    it('turns a verbatim string into a regular one', () => {
        const result = editWith(convertStringLiteral, 'var q = @"say ""hi""";', {}, { column: 8 });
        expect(result.text).toBe('var q = "say \\"hi\\"";');
        expect(result.summary).toBe('Converted string literal to regular form');
    });

    it('converts a verbatim string ending in an escaped quote', () => {
        const result = editWith(convertStringLiteral, 'var q = @"x""";', {}, { column: 8 });
        expect(result.text).toBe('var q = "x\\"";');
    });

    it('refuses raw strings', () => {
        expect(() => editWith(convertStringLiteral, 'var s = """raw""";', {}, { column: 8 }))
            .toThrow('Interpolated and raw string literals cannot be converted');
    });

    it('refuses escapes a verbatim string cannot hold', () => {
        expect(() => editWith(convertStringLiteral, 'var s = "a\\nb";'))
            .toThrow("Escape sequence '\\n' cannot be represented in a verbatim string");
    });

    it('refuses interpolated strings', () => {
        expect(() => editWith(convertStringLiteral, 'var s = $"{x}";'))
            .toThrow('Interpolated and raw string literals cannot be converted');
    });
});

describe('convert-string-format', () => {
    it('rewrites the call as an interpolated string', () => {
        const result = editWith(convertStringFormat, 'var s = string.Format("{0} has {1:N2} items", name, count);');
        expect(result.text).toBe('var s = $"{name} has {count:N2} items";');
        expect(result.summary).toBe('Converted string.Format call to interpolated string');
    });

    it('parenthesizes conditional arguments', () => {
        expect(editWith(convertStringFormat, 'Log(String.Format("{0}", ok ? "yes" : "no"));').text)
            .toBe('Log($"{(ok ? "yes" : "no")}");');
    });

    it('fails when an item has no argument', () => {
        expect(() => editWith(convertStringFormat, 'var s = string.Format("{0} {1}", a);'))
            .toThrow('Format item {1} has no matching argument');
    });
});

describe('convert-to-interpolated-string', () => {
    it('merges a concatenation', () => {
        const result = editWith(convertToInterpolatedString, 'var s = "Hello " + name + "!";', {}, { column: 8 });
        expect(result.text).toBe('var s = $"Hello {name}!";');
        expect(result.summary).toBe('Converted concatenation of 3 operands to interpolated string');
    });

    it('escapes braces from literal parts', () => {
        expect(editWith(convertToInterpolatedString, 'var s = "{" + id + "}";', {}, { column: 8 }).text)
            .toBe('var s = $"{{{id}}}";');
    });

    it('refuses chains that start with two non-string operands', () => {
        expect(() => editWith(convertToInterpolatedString, 'var s = a + b + "!";', {}, { column: 16 }))
            .toThrow('The concatenation starts with two non-string operands; converting it would change the result');
    });
});
