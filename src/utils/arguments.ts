/**
 * Argument Binder
 *
 * Tool arguments arrive as an untyped JSON object (or not at all). These
 * helpers pull typed values out of it and fall back to the caller's default
 * when a key is missing or holds a value of the wrong kind. They never throw.
 */

export type ArgumentBag = Readonly<Record<string, unknown>> | undefined;

export function getString(bag: ArgumentBag, key: string, defaultValue = ''): string {
    const value = bag?.[key];
    return typeof value === 'string' ? value : defaultValue;
}

export function getBool(bag: ArgumentBag, key: string, defaultValue = false): boolean {
    const value = bag?.[key];
    return typeof value === 'boolean' ? value : defaultValue;
}

export function getInt(bag: ArgumentBag, key: string, defaultValue = 0): number {
    const value = bag?.[key];
    return typeof value === 'number' && Number.isInteger(value) ? value : defaultValue;
}

/** True when the key is missing, not a string, or only whitespace. */
export function isBlank(bag: ArgumentBag, key: string): boolean {
    return getString(bag, key).trim() === '';
}
