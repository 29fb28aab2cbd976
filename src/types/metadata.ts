/**
 * Property metadata: free-form annotations limited to JSON values, so that
 * every property can be duplicated and serialized.
 */

import { z } from 'zod';
import { createConstructionError } from './errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type PropertyMetadata = Record<string, JsonValue>;

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema),
    ])
);

export const propertyMetadataSchema = z.record(jsonValueSchema);

/**
 * Check metadata handed to a builder and return a detached copy of it.
 */
export function parsePropertyMetadata(input: unknown): PropertyMetadata {
    const result = propertyMetadataSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw createConstructionError(
            'InvalidMetadata',
            `Property metadata must hold only JSON values: ${issues.join('; ')}`,
            { issues }
        );
    }
    return result.data;
}
