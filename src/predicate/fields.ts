/**
 * Field path resolution against channel message schemas.
 */

import type { FieldAccessNode, PathSegment } from '../types/index.js';
import {
    isArrayFieldType,
    isMessageType,
    type ChannelSchemas,
    type FieldType,
    type MessageType,
} from '../types/schema.js';
import {
    T_ANY,
    T_ARR,
    T_BOOL,
    T_FIELD,
    T_ITEM,
    T_MSG,
    T_NUM,
    T_STR,
    typeName,
    type TypeMask,
} from '../types/valueTypes.js';

export type FieldProblemCode = 'UnknownField' | 'InvalidFieldAccess' | 'InconsistentAlias';

export interface FieldProblem {
    code: FieldProblemCode;
    message: string;
    field: string;
    channel?: string;
}

export interface FieldResolution {
    mask: TypeMask;
    problems: FieldProblem[];
}

type PathResult =
    | { ok: true; type: FieldType }
    | { ok: false; code: 'UnknownField' | 'InvalidFieldAccess'; message: string };

export function formatFieldPath(path: readonly PathSegment[]): string {
    let text = '';
    for (const segment of path) {
        if (typeof segment === 'number') {
            text += `[${segment}]`;
        } else {
            text += text.length > 0 ? `.${segment}` : segment;
        }
    }
    return text;
}

export function fieldTypeMask(type: FieldType): TypeMask {
    if (type === 'bool') return T_BOOL;
    if (type === 'number') return T_NUM;
    if (type === 'string') return T_STR;
    if (isArrayFieldType(type)) return T_ARR;
    return T_MSG;
}

/**
 * Mask of a field read without any schema to consult.
 */
export function untypedFieldMask(path: readonly PathSegment[]): TypeMask {
    if (path.length === 0) return T_MSG;
    return typeof path[path.length - 1] === 'number' ? T_ITEM : T_FIELD;
}

/**
 * Walk `path` through a message type.
 */
export function resolveFieldPath(message: MessageType, path: readonly PathSegment[]): PathResult {
    let current: FieldType = message;
    for (let i = 0; i < path.length; i++) {
        const segment = path[i];
        const prefix = formatFieldPath(path.slice(0, i));
        if (typeof segment === 'number') {
            if (!isArrayFieldType(current)) {
                return {
                    ok: false,
                    code: 'InvalidFieldAccess',
                    message: `'${prefix}' is not an array and cannot be indexed`,
                };
            }
            if (current.length !== undefined && segment >= current.length) {
                return {
                    ok: false,
                    code: 'InvalidFieldAccess',
                    message: `Index ${segment} is out of bounds for '${prefix}' of length ${current.length}`,
                };
            }
            current = current.array;
        } else {
            if (!isMessageType(current)) {
                return {
                    ok: false,
                    code: 'InvalidFieldAccess',
                    message: `'${prefix}' is not a message and has no field '${segment}'`,
                };
            }
            if (!Object.hasOwn(current.fields, segment)) {
                return {
                    ok: false,
                    code: 'UnknownField',
                    message: prefix.length > 0
                        ? `'${prefix}' has no field '${segment}'`
                        : `Message has no field '${segment}'`,
                };
            }
            current = current.fields[segment];
        }
    }
    return { ok: true, type: current };
}

/**
 * Resolve a field access read from a message on any of `channels`.
 *
 * An alias bound by a disjunction can stand for messages on several
 * channels; the field must then have a compatible type on all of them.
 * Channels without a schema contribute an untyped mask (the missing
 * schema is reported on the event itself).
 */
export function resolveFieldAccess(
    field: FieldAccessNode,
    channels: readonly string[],
    schemas?: ChannelSchemas
): FieldResolution {
    const untyped = untypedFieldMask(field.path);
    if (!schemas || channels.length === 0) {
        return { mask: untyped, problems: [] };
    }

    const name = formatFieldPath(field.path);
    const problems: FieldProblem[] = [];
    const masks: Array<[string, TypeMask]> = [];
    for (const channel of channels) {
        if (!Object.hasOwn(schemas, channel)) {
            masks.push([channel, untyped]);
            continue;
        }
        const result = resolveFieldPath(schemas[channel], field.path);
        if (result.ok) {
            masks.push([channel, fieldTypeMask(result.type)]);
        } else {
            problems.push({ code: result.code, message: `${result.message} on channel '${channel}'`, field: name, channel });
        }
    }
    if (problems.length > 0) {
        return { mask: T_ANY, problems };
    }

    const combined = masks.reduce((acc, [, mask]) => acc & mask, T_ANY);
    if (combined === 0) {
        const found = masks.map(([channel, mask]) => `${typeName(mask)} on '${channel}'`).join(', ');
        return {
            mask: T_ANY,
            problems: [{
                code: 'InconsistentAlias',
                message: `Field '${name}' has incompatible types across channels: ${found}`,
                field: name,
            }],
        };
    }
    return { mask: combined, problems: [] };
}
