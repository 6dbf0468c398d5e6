import { z } from 'zod';

/**
 * Structural category of a zod schema once optional/nullable wrappers are
 * removed.
 */
export type SchemaKind =
    | 'string'
    | 'number'
    | 'boolean'
    | 'bigint'
    | 'date'
    | 'array'
    | 'map'
    | 'object'
    | 'enum'
    | 'dynamic';

/**
 * Result of inspecting a field schema.
 */
export interface SchemaInfo {
    /** The schema with every optional/nullable wrapper removed */
    core: z.ZodTypeAny;
    kind: SchemaKind;
    /** Wrapped in `.optional()` at least once */
    optional: boolean;
    /** Wrapped in `.nullable()` at least once */
    nullable: boolean;
}

/**
 * Classifies a zod schema for merging purposes.
 *
 * @returns The schema information, or `undefined` when the schema type is not
 * one the merge engine understands (unions, effects, defaults...)
 */
export const inspectSchema = (schema: z.ZodTypeAny): SchemaInfo | undefined => {
    let core = schema;
    let optional = false;
    let nullable = false;

    while (core instanceof z.ZodOptional || core instanceof z.ZodNullable) {
        if (core instanceof z.ZodOptional) {
            optional = true;
        } else {
            nullable = true;
        }
        core = core.unwrap();
    }

    const kind = kindOf(core);
    if (!kind) {
        return undefined;
    }
    return { core, kind, optional, nullable };
}

const kindOf = (core: z.ZodTypeAny): SchemaKind | undefined => {
    if (core instanceof z.ZodString) return 'string';
    if (core instanceof z.ZodNumber) return 'number';
    if (core instanceof z.ZodBoolean) return 'boolean';
    if (core instanceof z.ZodBigInt) return 'bigint';
    if (core instanceof z.ZodDate) return 'date';
    if (core instanceof z.ZodArray) return 'array';
    if (core instanceof z.ZodRecord) return 'map';
    if (core instanceof z.ZodObject) return 'object';
    if (core instanceof z.ZodEnum || core instanceof z.ZodNativeEnum || core instanceof z.ZodLiteral) return 'enum';
    if (core instanceof z.ZodAny || core instanceof z.ZodUnknown) return 'dynamic';
    return undefined;
}

/**
 * Type guard for plain objects (not arrays, dates or null).
 */
export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
    return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Property names that reach the prototype chain when used as an object key.
 */
export const isUnsafeKey = (key: string): boolean => key === '__proto__' || key === 'constructor' || key === 'prototype';

/**
 * Reads an own property, never one inherited through the prototype chain.
 */
export const ownValue = (value: Record<string, unknown>, key: string): unknown => {
    return Object.prototype.hasOwnProperty.call(value, key) ? value[key] : undefined;
}
