import { readFileSync } from 'fs';
import { z } from 'zod';

const KeywordListSchema = z.array(z.string().min(1));
const NamespaceTypesSchema = z.record(z.array(z.string().min(1)));

function readTable<T>(file: string, schema: z.ZodType<T>): T {
    const path = new URL(file, import.meta.url);
    return schema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

/** Reserved C# keywords; contextual keywords are not listed. */
export const CSHARP_KEYWORDS: readonly string[] = readTable('./csharp-keywords.json', KeywordListSchema);

/** Well-known framework namespaces and the public types each one declares. */
export const NAMESPACE_TYPES: Readonly<Record<string, string[]>> = readTable('./namespace-types.json', NamespaceTypesSchema);
