/**
 * Human-readable tool descriptions, keyed by tool name. Tools missing from
 * the table fall back to a generic description.
 */
export const TOOL_DESCRIPTIONS: Readonly<Record<string, string>> = {
    'rename': 'Rename a symbol at the specified location',
    'extract-method': 'Extract a method from the selected code',
    'add-using': 'Add missing using statements',
    'convert-auto-property': 'Convert between auto property and full property',
    'add-explicit-cast': 'Add explicit cast to an expression',
    'remove-unused-usings': 'Remove unused using statements from the file',
    'sort-usings': 'Sort using statements alphabetically',
    'add-file-header': 'Add a file header comment to the source file',
    'make-local-function-static': 'Make local function static',
    'generate-default-constructor': 'Generate default constructor for class or struct',
    'make-member-static': 'Make member static',
    'use-explicit-type': 'Use explicit type (replace var)',
    'use-implicit-type': 'Use implicit type (var)',
    'invert-if-statement': 'Invert if statement condition',
    'invert-conditional-expressions': 'Invert conditional expressions and logical operators',
    'reverse-for-statement': 'Reverse for statement direction',
    'convert-string-literal': 'Convert between regular and verbatim string literals',
    'convert-string-format': 'Convert String.Format calls to interpolated strings',
    'convert-to-interpolated-string': 'Convert string concatenation to interpolated string',
    'wrap-binary-expressions': 'Wrap binary expressions with line breaks',
    'convert-numeric-literal': 'Convert numeric literal between decimal, hexadecimal, and binary formats',
    'add-await': 'Add await to an async call',
    'add-debugger-display': 'Add DebuggerDisplay attribute to a class',
    'find-symbols': 'Find symbols matching a pattern (including partial matches)',
    'find-references': 'Find all references to a symbol at the specified location',
    'find-usages': 'Find all usages of a symbol, type, or member',
    'find-duplicate-code': 'Find code that is substantially similar to existing code',
    'encapsulate-field': 'Encapsulate field as property',
    'introduce-local-variable': 'Introduce local variable for expression',
    'inline-temporary-variable': 'Inline temporary variable',
    'move-declaration-near-reference': 'Move variable declaration closer to its first use',
    'split-or-merge-if-statements': 'Split or merge if statements',
    'convert-for-loop': 'Convert between for and foreach loops',
    'add-named-argument': 'Add named arguments to method calls',
    'convert-cast-to-as-expression': 'Convert between cast and as expressions',
    'sync-type-and-file': 'Synchronize type name and file name',
    'find-dependencies': 'Find dependencies and create a dependency graph from a type'
};

export function describeTool(toolName: string): string {
    return TOOL_DESCRIPTIONS[toolName] ?? `C# refactoring command: ${toolName}`;
}
