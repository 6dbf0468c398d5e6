import { z } from 'zod';
import { VALUE_PATH } from '../constants';
import { ValidationError } from '../error/ValidationError';
import { zeroValue } from '../merge/emptiness';
import type { RecordDescriptor, RecordValue } from '../record/descriptor';
import { inspectSchema, isPlainObject, isUnsafeKey } from '../record/schema';

/**
 * Serialized form of a record as kept by a scope store: lower-cased keys,
 * ISO-8601 dates and decimal-string bigints, nothing a JSON or YAML document
 * cannot hold.
 */
export type StoredRecord = Record<string, unknown>;

/**
 * A single field write, ready for the store.
 */
export interface EncodedField {
    /** Lower-cased dotted path, starting with the value container segment */
    path: string;
    value: unknown;
}

/**
 * Converts records to and from their stored form.
 *
 * @template T - The record type
 */
export interface RecordCodec<T> {
    encode: (value: T) => StoredRecord;
    /** Decodes a stored record; a missing record decodes to the zero value */
    decode: (stored: StoredRecord | undefined) => T;
    /** Resolves a case-insensitive dotted field name to its stored path */
    fieldPath: (name: string) => string;
    /** Resolves a field name, checks the value against the field schema and encodes it */
    encodeField: (name: string, value: unknown) => EncodedField;
}

const toStored = (schema: z.ZodTypeAny, value: unknown): unknown => {
    if (value === undefined || value === null) {
        return value;
    }
    const info = inspectSchema(schema);
    if (!info) {
        return toStoredGeneric(value);
    }
    const { core } = info;
    switch (info.kind) {
        case 'date':
            return value instanceof Date ? value.toISOString() : value;
        case 'bigint':
            return typeof value === 'bigint' ? value.toString() : value;
        case 'object':
            return isPlainObject(value) && core instanceof z.ZodObject ? encodeObject(core.shape, value) : value;
        case 'map':
            if (!isPlainObject(value) || !(core instanceof z.ZodRecord)) {
                return value;
            }
            return Object.fromEntries(
                Object.entries(value)
                    .map(([key, entry]) => [key, toStored(core.valueSchema, entry)])
                    .filter(([, entry]) => entry !== undefined)
            );
        case 'array':
            return Array.isArray(value) && core instanceof z.ZodArray
                ? value.map(entry => toStored(core.element, entry))
                : value;
        default:
            return toStoredGeneric(value);
    }
}

const toStoredGeneric = (value: unknown): unknown => {
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value === 'bigint') {
        return value.toString();
    }
    if (Array.isArray(value)) {
        return value.map(toStoredGeneric);
    }
    if (isPlainObject(value)) {
        return Object.fromEntries(
            Object.entries(value)
                .filter(([, entry]) => entry !== undefined)
                .map(([key, entry]) => [key, toStoredGeneric(entry)])
        );
    }
    return value;
}

const encodeObject = (shape: z.ZodRawShape, value: Record<string, unknown>): StoredRecord => {
    const stored: StoredRecord = {};
    for (const [name, schema] of Object.entries(shape)) {
        const encoded = toStored(schema, value[name]);
        if (encoded !== undefined) {
            stored[name.toLowerCase()] = encoded;
        }
    }
    return stored;
}

const fromStored = (schema: z.ZodTypeAny, raw: unknown): unknown => {
    if (raw === undefined || raw === null) {
        return raw;
    }
    const info = inspectSchema(schema);
    if (!info) {
        return raw;
    }
    const { core } = info;
    switch (info.kind) {
        case 'date':
            return typeof raw === 'string' ? new Date(raw) : raw;
        case 'bigint':
            return typeof raw === 'string' && /^-?\d+$/.test(raw) ? BigInt(raw) : raw;
        case 'object':
            return isPlainObject(raw) && core instanceof z.ZodObject ? decodeObject(core.shape, raw) : raw;
        case 'map':
            if (!isPlainObject(raw) || !(core instanceof z.ZodRecord)) {
                return raw;
            }
            return Object.fromEntries(
                Object.entries(raw).map(([key, entry]) => [key, fromStored(core.valueSchema, entry)])
            );
        case 'array':
            return Array.isArray(raw) && core instanceof z.ZodArray
                ? raw.map(entry => fromStored(core.element, entry))
                : raw;
        default:
            return raw;
    }
}

const decodeObject = (shape: z.ZodRawShape, raw: Record<string, unknown>): Record<string, unknown> => {
    const byKey = new Map<string, unknown>();
    for (const [key, entry] of Object.entries(raw)) {
        byKey.set(key.toLowerCase(), entry);
    }

    const decoded: Record<string, unknown> = {};
    for (const [name, schema] of Object.entries(shape)) {
        const stored = byKey.get(name.toLowerCase());
        // A null left behind for a field that cannot hold one reads as unset.
        const absent = stored === undefined || (stored === null && !inspectSchema(schema)?.nullable);
        if (!absent) {
            decoded[name] = fromStored(schema, stored);
            continue;
        }
        const zero = zeroValue(schema);
        if (zero !== undefined) {
            decoded[name] = zero;
        }
    }
    return decoded;
}

const resolveFieldSchema = (root: z.ZodTypeAny, segments: string[]): z.ZodTypeAny | undefined => {
    let current: z.ZodTypeAny | undefined = root;
    for (const segment of segments) {
        const info: ReturnType<typeof inspectSchema> = current ? inspectSchema(current) : undefined;
        if (!info) {
            return undefined;
        }
        const { core } = info;
        if (core instanceof z.ZodObject) {
            const shape: z.ZodRawShape = core.shape;
            const name = Object.keys(shape).find(candidate => candidate.toLowerCase() === segment);
            current = name === undefined ? undefined : shape[name];
        } else if (core instanceof z.ZodRecord) {
            current = core.valueSchema;
        } else {
            return undefined;
        }
    }
    return current;
}

const splitFieldName = (name: string): string[] => {
    const segments = name.toLowerCase().split('.');
    if (segments.some(segment => segment.trim().length === 0)) {
        throw new ValidationError(`Invalid field name: "${name}"`);
    }
    if (segments.some(isUnsafeKey)) {
        throw new ValidationError(`Unsafe field name: "${name}"`);
    }
    return segments;
}

/**
 * Creates the default codec for a described record type.
 *
 * Decoding starts from the zero record, reads stored keys case-insensitively,
 * revives dates and bigints in the positions the schema declares them, and
 * validates the result with the record schema. Unknown stored keys are
 * ignored.
 *
 * @throws {ValidationError} From `decode` when the stored value does not
 * match the record schema, and from `encodeField` for an empty or unsafe
 * field name or a value its field schema rejects
 */
export const createRecordCodec = <S extends z.ZodRawShape>(
    descriptor: RecordDescriptor<S>
): RecordCodec<RecordValue<S>> => {
    const { schema } = descriptor;

    return {
        encode: (value) => {
            if (!isPlainObject(value)) {
                throw ValidationError.notARecord(value);
            }
            return encodeObject(schema.shape, value);
        },
        decode: (stored) => {
            if (stored === undefined) {
                return descriptor.zero();
            }
            const parsed = schema.safeParse(decodeObject(schema.shape, stored));
            if (!parsed.success) {
                throw ValidationError.schemaMismatch('Stored record', parsed.error);
            }
            return parsed.data;
        },
        fieldPath: (name) => [VALUE_PATH, ...splitFieldName(name)].join('.'),
        encodeField: (name, value) => {
            const segments = splitFieldName(name);
            const fieldSchema = resolveFieldSchema(schema, segments);
            if (!fieldSchema) {
                return { path: [VALUE_PATH, ...segments].join('.'), value: toStoredGeneric(value) };
            }
            const parsed = fieldSchema.safeParse(value);
            if (!parsed.success) {
                throw ValidationError.schemaMismatch(`Value of field "${name}"`, parsed.error);
            }
            return { path: [VALUE_PATH, ...segments].join('.'), value: toStored(fieldSchema, parsed.data) };
        },
    };
}
