import { z } from 'zod';
import { inspectSchema, isPlainObject } from '../record/schema';

/**
 * Decides whether a value counts as absent when merging.
 */
export interface EmptinessPolicy {
    /** When true only nil values (`undefined`/`null`) are empty */
    allowEmpty: boolean;
    isEmpty: (schema: z.ZodTypeAny, value: unknown) => boolean;
}

/**
 * Returns the zero value of a schema: `undefined` for optional schemas,
 * `null` for nullable ones, `''`, `0`, `false` and `0n` for scalars, and an
 * object of zero fields for nested objects. Kinds that have no non-nil zero
 * (dates, arrays, maps, enums, dynamic values) yield `undefined`.
 */
export const zeroValue = (schema: z.ZodTypeAny): unknown => {
    const info = inspectSchema(schema);
    if (!info || info.optional) {
        return undefined;
    }
    if (info.nullable) {
        return null;
    }
    switch (info.kind) {
        case 'string':
            return '';
        case 'number':
            return 0;
        case 'boolean':
            return false;
        case 'bigint':
            return BigInt(0);
        case 'object':
            return zeroObject(info.core);
        default:
            return undefined;
    }
}

const zeroObject = (schema: z.ZodTypeAny): Record<string, unknown> => {
    const result: Record<string, unknown> = {};
    if (!(schema instanceof z.ZodObject)) {
        return result;
    }
    for (const [key, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
        const zero = zeroValue(fieldSchema);
        if (zero !== undefined) {
            result[key] = zero;
        }
    }
    return result;
}

/**
 * Structural comparison of `value` with the zero value of `schema`.
 * Optional and nullable members are zero only when nil; so are arrays and
 * maps, even empty ones. Dates are never zero.
 */
export const isZero = (schema: z.ZodTypeAny, value: unknown): boolean => {
    const info = inspectSchema(schema);
    if (!info || info.optional || info.nullable) {
        return value === undefined || value === null;
    }
    switch (info.kind) {
        case 'string':
            return value === '';
        case 'number':
            return value === 0;
        case 'boolean':
            return value === false;
        case 'bigint':
            return value === BigInt(0);
        case 'object':
            if (!isPlainObject(value) || !(info.core instanceof z.ZodObject)) {
                return false;
            }
            return Object.entries<z.ZodTypeAny>(info.core.shape)
                .every(([key, fieldSchema]) => isZero(fieldSchema, value[key]));
        default:
            return value === undefined || value === null;
    }
}

/**
 * Checks whether `value` is empty for `schema`.
 *
 * Nil is always empty. Unless `allowEmpty` is set, a zero-length array and a
 * value equal to the zero value of the schema (one level of optional/nullable
 * wrapping removed) are empty too.
 */
export const isEmptyValue = (schema: z.ZodTypeAny, value: unknown, allowEmpty: boolean): boolean => {
    if (value === undefined || value === null) {
        return true;
    }
    if (allowEmpty) {
        return false;
    }
    if (Array.isArray(value) && value.length === 0) {
        return true;
    }
    const info = inspectSchema(schema);
    if (!info) {
        return false;
    }
    return isZero(info.core, value);
}

export const createEmptinessPolicy = (allowEmpty: boolean): EmptinessPolicy => ({
    allowEmpty,
    isEmpty: (schema, value) => isEmptyValue(schema, value, allowEmpty),
});
