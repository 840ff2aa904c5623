import { SCHEMA_EXTENSIONS } from './schema-extensions.js';
import type { InputSchema, ParameterSchema } from './tool-metadata.js';

function commonProperties(): Record<string, ParameterSchema> {
    return {
        file_path: { type: 'string', description: 'The C# source file to refactor' },
        line_number: {
            type: 'integer',
            description: 'Line number (1-based) where the refactoring should be applied',
            minimum: 1,
            default: 1
        },
        column_number: {
            type: 'integer',
            description: 'Column number (0-based) where the refactoring should be applied',
            minimum: 0,
            default: 0
        },
        output_path: {
            type: 'string',
            description: 'Output file path (optional, defaults to overwriting the input file)'
        },
        dry_run: {
            type: 'boolean',
            description: 'Show what changes would be made without applying them',
            default: false
        }
    };
}

/**
 * Input schema for a tool: the common parameters plus the tool's extension
 * record, if it has one. Returns a new object on every call.
 */
export function generateInputSchema(toolName: string): InputSchema {
    const properties = commonProperties();
    const required = ['file_path'];

    const extension = SCHEMA_EXTENSIONS[toolName];
    if (extension) {
        for (const [name, schema] of Object.entries(extension.properties)) {
            properties[name] = { ...schema, ...(schema.enum ? { enum: [...schema.enum] } : {}) };
        }
        for (const name of extension.required ?? []) {
            if (!required.includes(name)) required.push(name);
        }
    }

    return {
        type: 'object',
        description: `Input parameters for ${toolName} command`,
        properties,
        required
    };
}
