/**
 * Channel message schemas
 *
 * Describe the message type published on each channel so that validation can
 * resolve field paths and finalize predicate types. Schemas usually arrive as
 * JSON, so they are checked with zod before use.
 */

import { z } from 'zod';
import { createInvalidOptionsError } from './errors.js';

export type PrimitiveFieldType = 'bool' | 'number' | 'string';

export interface ArrayFieldType {
    array: FieldType;
    /** Fixed length, when the array is not variable-sized. */
    length?: number;
}

export interface MessageType {
    fields: Record<string, FieldType>;
}

export type FieldType = PrimitiveFieldType | ArrayFieldType | MessageType;

/** Message type per channel name. */
export type ChannelSchemas = Record<string, MessageType>;

export const fieldTypeSchema: z.ZodType<FieldType> = z.lazy(() =>
    z.union([
        z.enum(['bool', 'number', 'string']),
        z.object({
            array: fieldTypeSchema,
            length: z.number().int().nonnegative().optional(),
        }).strict(),
        messageTypeSchema,
    ])
);

export const messageTypeSchema: z.ZodType<MessageType> = z.lazy(() =>
    z.object({
        fields: z.record(z.string().min(1), fieldTypeSchema),
    }).strict()
);

export const channelSchemasSchema = z.record(z.string().min(1), messageTypeSchema);

export function isArrayFieldType(type: FieldType): type is ArrayFieldType {
    return typeof type === 'object' && 'array' in type;
}

export function isMessageType(type: FieldType): type is MessageType {
    return typeof type === 'object' && 'fields' in type;
}

/**
 * Parse channel schemas from untrusted input (e.g. a JSON file).
 */
export function parseChannelSchemas(input: unknown): ChannelSchemas {
    const result = channelSchemasSchema.safeParse(input);
    if (!result.success) {
        throw createInvalidOptionsError(
            'channel schemas',
            result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }
    return result.data;
}
