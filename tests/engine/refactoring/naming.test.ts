import { rename } from '../../../src/engine/refactoring/operations/naming.js';
import { editWith } from '../../fixtures.js';

describe('rename', () => {
    const source = 'Foo x = new Foo(@Foo, "Foo"); // Foo';

    it('renames identifiers and leaves strings and comments', () => {
        const result = editWith(rename, source, { old_name: 'Foo', new_name: 'Bar' });
        expect(result.text).toBe('Bar x = new Bar(@Bar, "Foo"); // Foo');
        expect(result.summary).toBe("Renamed 'Foo' to 'Bar' (3 occurrences)");
    });

    it('validates both names', () => {
        expect(() => editWith(rename, source, { old_name: 'Foo', new_name: '1bad' }))
            .toThrow("new_name '1bad' is not a valid C# identifier");
        expect(() => editWith(rename, source, { old_name: 'Foo', new_name: 'class' }))
            .toThrow("new_name 'class' is not a valid C# identifier");
        expect(() => editWith(rename, source, { old_name: 'Foo', new_name: 'Foo' }))
            .toThrow("old_name and new_name are both 'Foo'");
    });

    it('fails when the symbol is absent', () => {
        expect(() => editWith(rename, source, { old_name: 'Baz', new_name: 'Qux' }))
            .toThrow("Symbol 'Baz' not found in Sample.cs");
    });
});
