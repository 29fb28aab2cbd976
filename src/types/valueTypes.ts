/**
 * Coarse value types as bit masks.
 *
 * A mask lists every type an expression may still have: a field read from a
 * channel without a schema is "boolean or number or string or array or
 * message" until something narrows it.
 */

export type TypeMask = number;

export const T_BOOL: TypeMask = 0x1;
export const T_NUM: TypeMask = 0x2;
export const T_STR: TypeMask = 0x4;
export const T_ARR: TypeMask = 0x8;
export const T_RAN: TypeMask = 0x10;
export const T_SET: TypeMask = 0x20;
export const T_MSG: TypeMask = 0x40;

export const T_ANY: TypeMask = T_BOOL | T_NUM | T_STR | T_ARR | T_RAN | T_SET | T_MSG;
export const T_COMP: TypeMask = T_ARR | T_RAN | T_SET;
export const T_PRIM: TypeMask = T_BOOL | T_NUM | T_STR;
/** Anything a message field can hold. */
export const T_FIELD: TypeMask = T_BOOL | T_NUM | T_STR | T_ARR | T_MSG;
export const T_ITEM: TypeMask = T_BOOL | T_NUM | T_STR | T_MSG;

const TYPE_NAMES: Array<[TypeMask, string]> = [
    [T_BOOL, 'boolean'],
    [T_NUM, 'number'],
    [T_STR, 'string'],
    [T_ARR, 'array'],
    [T_RAN, 'range'],
    [T_SET, 'set'],
    [T_MSG, 'message'],
];

/**
 * Human-readable name of a mask, e.g. "number or string".
 */
export function typeName(mask: TypeMask): string {
    const names = TYPE_NAMES.filter(([flag]) => (mask & flag) !== 0).map(([, name]) => name);
    return names.length > 0 ? names.join(' or ') : 'nothing';
}

export function canBe(mask: TypeMask, expected: TypeMask): boolean {
    return (mask & expected) !== 0;
}
