/**
 * Name conversion between engine operation ids, tool names and the names
 * clients see on the wire.
 *
 *   RenameCommand        -> rename           -> cast_rename
 *   ExtractMethodCommand -> extract-method   -> cast_extract_method
 */

export const WIRE_PREFIX = 'cast_';

const COMMAND_SUFFIX = 'Command';
const TOOL_NAME = /^[a-z0-9]+(-[a-z0-9]+)*$/;

const isUpper = (c: string | undefined) => c !== undefined && c >= 'A' && c <= 'Z';
const isLower = (c: string | undefined) => c !== undefined && c >= 'a' && c <= 'z';
const isDigit = (c: string | undefined) => c !== undefined && c >= '0' && c <= '9';

/**
 * `UseIOStreamCommand` -> `use-io-stream`, `ConvertToUTF8Command` -> `convert-to-utf8`.
 * A hyphen goes before an uppercase letter that follows a lowercase letter or
 * digit, or that starts a new word after an acronym.
 */
export function toToolName(operationId: string): string {
    const base = operationId.endsWith(COMMAND_SUFFIX) && operationId.length > COMMAND_SUFFIX.length
        ? operationId.slice(0, -COMMAND_SUFFIX.length)
        : operationId;

    let out = '';
    for (let i = 0; i < base.length; i++) {
        const c = base[i];
        if (i > 0 && isUpper(c)) {
            const prev = base[i - 1];
            const next = base[i + 1];
            if (isLower(prev) || isDigit(prev) || (isUpper(prev) && isLower(next))) out += '-';
        }
        out += c.toLowerCase();
    }
    return out;
}

export function isValidToolName(name: string): boolean {
    return TOOL_NAME.test(name);
}

export function toWireName(toolName: string): string {
    return WIRE_PREFIX + toolName.replace(/-/g, '_');
}

export interface ParsedWireName {
    toolName: string;
    /** False when the name lacks the `cast_` prefix; such names never resolve. */
    recognized: boolean;
}

export function fromWireName(wireName: string): ParsedWireName {
    const recognized = wireName.startsWith(WIRE_PREFIX);
    const bare = recognized ? wireName.slice(WIRE_PREFIX.length) : wireName;
    return { toolName: bare.replace(/_/g, '-'), recognized };
}
