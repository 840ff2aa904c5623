import {
    addDebuggerDisplay,
    convertAutoProperty,
    encapsulateField,
    generateDefaultConstructor,
    makeLocalFunctionStatic,
    makeMemberStatic,
    syncTypeAndFile
} from '../../../src/engine/refactoring/operations/members.js';
import { editWith, lines } from '../../fixtures.js';

describe('generate-default-constructor', () => {
    it('inserts a public constructor before the first member', () => {
        const source = lines('public class Person', '{', '    public string Name { get; set; }', '}');
        const result = editWith(generateDefaultConstructor, source);
        expect(result.text).toBe(lines(
            'public class Person',
            '{',
            '    public Person()',
            '    {',
            '    }',
            '',
            '    public string Name { get; set; }',
            '}'
        ));
        expect(result.summary).toBe("Generated default constructor for 'Person'");
    });

    it('expands an empty single-line body', () => {
        expect(editWith(generateDefaultConstructor, lines('struct Point { }')).text)
            .toBe(lines('struct Point {', '    public Point()', '    {', '    }', '}'));
    });

    it('uses protected access for abstract classes', () => {
        expect(editWith(generateDefaultConstructor, lines('public abstract class Shape', '{', '}')).text)
            .toBe(lines('public abstract class Shape', '{', '    protected Shape()', '    {', '    }', '}'));
    });

    it('refuses when a parameterless constructor exists', () => {
        expect(() => editWith(generateDefaultConstructor, lines('class A', '{', '    public A() { }', '}')))
            .toThrow("'A' already has a parameterless constructor");
    });

    it('refuses interfaces and positions outside a type', () => {
        expect(() => editWith(generateDefaultConstructor, lines('interface IShape', '{', '}')))
            .toThrow("Interface 'IShape' cannot declare a constructor");
        expect(() => editWith(generateDefaultConstructor, lines('using System;')))
            .toThrow('No type declaration found at line 1');
    });
});

describe('add-debugger-display', () => {
    const source = lines(
        'using System;',
        '',
        'public class Person',
        '{',
        '    public string Name { get; set; }',
        '    public int Age { get; set; }',
        '}'
    );

    it('adds the attribute and its using directive', () => {
        const result = editWith(addDebuggerDisplay, source, {}, { line: 3 });
        expect(result.text).toBe(lines(
            'using System;',
            'using System.Diagnostics;',
            '',
            '[DebuggerDisplay("Person { Name = {Name}, Age = {Age} }")]',
            'public class Person',
            '{',
            '    public string Name { get; set; }',
            '    public int Age { get; set; }',
            '}'
        ));
        expect(result.summary).toBe("Added DebuggerDisplay attribute to 'Person'");
    });

    it('uses a supplied format', () => {
        const result = editWith(addDebuggerDisplay, source, { display_format: '{Name}' }, { line: 3 });
        expect(result.text.split('\n')[3]).toBe('[DebuggerDisplay("{Name}")]');
    });

    it('refuses a second attribute', () => {
        const once = editWith(addDebuggerDisplay, source, {}, { line: 3 }).text;
        expect(() => editWith(addDebuggerDisplay, once, {}, { line: 5 }))
            .toThrow("'Person' already has a DebuggerDisplay attribute");
    });
});

describe('make-member-static', () => {
    const source = lines(
        'class Calc',
        '{',
        '    public int Add(int a, int b) => a + b;',
        '    public int Self() => this.GetHashCode();',
        '    public static int Zero() => 0;',
        '}'
    );

    it('inserts static after the access modifier', () => {
        const result = editWith(makeMemberStatic, source, {}, { line: 3 });
        expect(result.text.split('\n')[2]).toBe('    public static int Add(int a, int b) => a + b;');
        expect(result.summary).toBe("Made member 'Add' static");
    });

    it('refuses members that use this', () => {
        expect(() => editWith(makeMemberStatic, source, {}, { line: 4 }))
            .toThrow("Member 'Self' uses 'this' and cannot be made static");
    });

    it('refuses members that are already static', () => {
        expect(() => editWith(makeMemberStatic, source, {}, { line: 5 })).toThrow("Member 'Zero' is already static");
    });
});

describe('make-local-function-static', () => {
    const source = lines(
        'class A',
        '{',
        '    int M()',
        '    {',
        '        int Square(int x) => x * x;',
        '        return Square(2);',
        '    }',
        '}'
    );

    it('prefixes the local function with static', () => {
        const result = editWith(makeLocalFunctionStatic, source, {}, { line: 5 });
        expect(result.text.split('\n')[4]).toBe('        static int Square(int x) => x * x;');
        expect(result.summary).toBe("Made local function 'Square' static");
    });

    it('refuses statements and members', () => {
        expect(() => editWith(makeLocalFunctionStatic, source, {}, { line: 6 })).toThrow('No local function found at line 6');
        expect(() => editWith(makeLocalFunctionStatic, source, {}, { line: 3 })).toThrow('No local function found at line 3');
    });
});

describe('convert-auto-property', () => {
    it('introduces a backing field', () => {
        const source = lines('class Person', '{', '    public string Name { get; set; }', '}');
        const result = editWith(convertAutoProperty, source, {}, { line: 3 });
        expect(result.text).toBe(lines(
            'class Person',
            '{',
            '    private string _name;',
            '    public string Name',
            '    {',
            '        get => _name;',
            '        set => _name = value;',
            '    }',
            '}'
        ));
        expect(result.summary).toBe("Converted auto property 'Name' to use backing field '_name'");
    });

    it('carries the initializer and setter access', () => {
        const source = lines('class Counter', '{', '    public int Count { get; private set; } = 5;', '}');
        const result = editWith(convertAutoProperty, source, {}, { line: 3 });
        expect(result.text.split('\n').slice(2, 8)).toEqual([
            '    private int _count = 5;',
            '    public int Count',
            '    {',
            '        get => _count;',
            '        private set => _count = value;',
            '    }'
        ]);
    });

    it('refuses lines without an auto property', () => {
        expect(() => editWith(convertAutoProperty, lines('class A', '{', '}'), {}, { line: 2 }))
            .toThrow('No auto-implemented property found at line 2');
    });
});

describe('encapsulate-field', () => {
    it('wraps the field in a property and routes reads through it', () => {
        const source = lines(
            'class Person',
            '{',
            '    private string name = "x";',
            '',
            '    public string Greet() => "Hi " + name;',
            '}'
        );
        const result = editWith(encapsulateField, source, {}, { line: 3 });
        expect(result.text).toBe(lines(
            'class Person',
            '{',
            '    private string _name = "x";',
            '    internal string Name',
            '    {',
            '        get => _name;',
            '        set => _name = value;',
            '    }',
            '',
            '    public string Greet() => "Hi " + Name;',
            '}'
        ));
        expect(result.summary).toBe("Encapsulated field 'name' as property 'Name'");
    });

    it('only rewrites this-qualified uses when a parameter reuses the name', () => {
        const source = lines('public class Point', '{', '    public int x;', '    public Point(int x) { this.x = x; }', '}');
        expect(editWith(encapsulateField, source, {}, { line: 3 }).text).toBe(lines(
            'public class Point',
            '{',
            '    private int _x;',
            '    public int X',
            '    {',
            '        get => _x;',
            '        set => _x = value;',
            '    }',
            '    public Point(int x) { this.X = x; }',
            '}'
        ));
    });

    it('gives a readonly field a get-only property', () => {
        const source = lines('class Config', '{', '    private static readonly int limit = 10;', '}');
        expect(editWith(encapsulateField, source, {}, { line: 3 }).text).toBe(lines(
            'class Config',
            '{',
            '    private static readonly int _limit = 10;',
            '    internal static int Limit',
            '    {',
            '        get => _limit;',
            '    }',
            '}'
        ));
    });

    it('refuses constants and non-fields', () => {
        const source = lines('class C', '{', '    const int Max = 1;', '    void Run() { }', '}');
        expect(() => editWith(encapsulateField, source, {}, { line: 3 })).toThrow('Constants cannot be encapsulated');
        expect(() => editWith(encapsulateField, source, {}, { line: 4 })).toThrow('No field declaration found at line 4');
    });

    it('refuses when the property name is taken', () => {
        const source = lines('class C', '{', '    private int count;', '    public int Count() => 0;', '}');
        expect(() => editWith(encapsulateField, source, {}, { line: 3 })).toThrow("A member named 'Count' already exists");
    });
});

describe('sync-type-and-file', () => {
    it('renames the type and its references to the file name', () => {
        const result = editWith(syncTypeAndFile, lines('public class Widget', '{', '    public Widget() { }', '}'));
        expect(result.text).toBe(lines('public class Sample', '{', '    public Sample() { }', '}'));
        expect(result.summary).toBe("Renamed type 'Widget' to 'Sample' to match Sample.cs");
    });

    it('picks the first public type', () => {
        expect(editWith(syncTypeAndFile, lines('class Helper { }', 'public class Main { }')).text)
            .toBe(lines('class Helper { }', 'public class Sample { }'));
    });

    it('leaves a matching file alone', () => {
        const source = lines('class Sample { }');
        const result = editWith(syncTypeAndFile, source);
        expect(result.text).toBe(source);
        expect(result.summary).toBe('File name and type name are already synchronized');
    });

    it('fails without a type', () => {
        expect(() => editWith(syncTypeAndFile, lines('namespace App;'))).toThrow('No type declaration found in Sample.cs');
    });
});
