import type { ParameterSchema } from './tool-metadata.js';

/** Parameters a tool adds on top of the common five. */
export interface SchemaExtension {
    properties: Readonly<Record<string, ParameterSchema>>;
    required?: readonly string[];
}

export const SCHEMA_EXTENSIONS: Readonly<Record<string, SchemaExtension>> = {
    'rename': {
        properties: {
            old_name: { type: 'string', description: 'Current name of the symbol to rename' },
            new_name: { type: 'string', description: 'New name for the symbol' }
        },
        required: ['old_name', 'new_name']
    },
    'extract-method': {
        properties: {
            method_name: { type: 'string', description: 'Name for the extracted method' },
            end_line_number: {
                type: 'integer',
                description: 'End line number for the code selection to extract',
                minimum: 1
            }
        },
        required: ['method_name']
    },
    'add-using': {
        properties: {
            namespace: { type: 'string', description: 'Namespace to add as a using statement' }
        },
        required: ['namespace']
    },
    'sort-usings': {
        properties: {
            system_first: {
                type: 'boolean',
                description: 'Place System namespaces before all others',
                default: true
            }
        }
    },
    'add-explicit-cast': {
        properties: {
            cast_type: { type: 'string', description: 'Type to cast to' }
        },
        required: ['cast_type']
    },
    'add-file-header': {
        properties: {
            header_text: { type: 'string', description: 'Header text to add to the file' },
            copyright: {
                type: 'string',
                description: 'Copyright owner; used to build a copyright line when header_text is omitted'
            }
        }
    },
    'add-debugger-display': {
        properties: {
            display_format: {
                type: 'string',
                description: 'DebuggerDisplay format string (defaults to the first public properties)'
            }
        }
    },
    'convert-numeric-literal': {
        properties: {
            target_format: {
                type: 'string',
                description: 'Format to convert the literal to',
                enum: ['dec', 'hex', 'bin'],
                default: 'hex'
            }
        }
    },
    'find-symbols': {
        properties: {
            pattern: { type: 'string', description: 'Name or wildcard pattern (* matches any characters)' }
        },
        required: ['pattern']
    },
    'find-usages': {
        properties: {
            symbol_name: { type: 'string', description: 'Name of the symbol to search for' }
        },
        required: ['symbol_name']
    },
    'find-duplicate-code': {
        properties: {
            min_lines: {
                type: 'integer',
                description: 'Minimum number of matching lines to report',
                minimum: 2,
                default: 4
            }
        }
    },
    'introduce-local-variable': {
        properties: {
            variable_name: { type: 'string', description: 'Name for the new local variable', default: 'temp' }
        }
    },
    'split-or-merge-if-statements': {
        properties: {
            operation: {
                type: 'string',
                description: 'Split a condition joined by && into nested ifs, or merge a nested if into its parent',
                enum: ['auto', 'split', 'merge'],
                default: 'auto'
            }
        }
    },
    'convert-for-loop': {
        properties: {
            target_type: {
                type: 'string',
                description: 'Kind of loop to convert to',
                enum: ['foreach', 'for'],
                default: 'foreach'
            }
        }
    },
    'add-named-argument': {
        properties: {
            parameter_index: {
                type: 'integer',
                description: 'Zero-based index of the single argument to name; all arguments when omitted',
                minimum: 0
            }
        }
    },
    'convert-cast-to-as-expression': {
        properties: {
            target: {
                type: 'string',
                description: "Convert a cast to an 'as' expression, or an 'as' expression to a cast",
                enum: ['as', 'cast'],
                default: 'as'
            }
        }
    },
    'find-dependencies': {
        properties: {
            type_name: { type: 'string', description: 'Type to analyze; defaults to the type at the given position' }
        }
    }
};
