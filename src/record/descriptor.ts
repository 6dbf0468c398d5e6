import { z } from 'zod';
import { ValidationError } from '../error/ValidationError';
import { isEmptyValue, zeroValue } from '../merge/emptiness';
import { inspectSchema, isPlainObject, type SchemaKind } from './schema';

/**
 * Value type of a record described by a zod object shape.
 */
export type RecordValue<S extends z.ZodRawShape> = z.infer<z.ZodObject<S>>;

interface FieldBase {
    /** Property name on the record */
    name: string;
    /** Dotted path from the root record */
    path: string;
    schema: z.ZodTypeAny;
    /** Name of the boolean companion that records whether the value was inherited */
    inherited?: string;
    isEmpty: (value: unknown, allowEmpty: boolean) => boolean;
}

/** Scalars, pointers, sequences and enums: replaced wholesale. */
export interface LeafField extends FieldBase {
    kind: 'leaf';
}

/** Dates: replaced wholesale, never decomposed. */
export interface TimeField extends FieldBase {
    kind: 'time';
}

/** String-keyed maps: merged key by key with tombstone deletion. */
export interface MapField extends FieldBase {
    kind: 'map';
    valueSchema: z.ZodTypeAny;
}

/** Required nested objects: merged field by field. */
export interface RecordField extends FieldBase {
    kind: 'record';
    layout: RecordLayout;
}

export type FieldDescriptor = LeafField | TimeField | MapField | RecordField;

/**
 * Ordered field list of one record level.
 */
export interface RecordLayout {
    /** Every field except the inheritance companions, which never take part in a merge */
    fields: FieldDescriptor[];
}

/**
 * Field-descriptor list of a record type together with its schema.
 */
export interface RecordDescriptor<S extends z.ZodRawShape> extends RecordLayout {
    schema: z.ZodObject<S>;
    /** Returns a fresh zero-valued record */
    zero: () => RecordValue<S>;
}

type BooleanKeys<T> = {
    [K in keyof T]-?: NonNullable<T[K]> extends boolean ? K : never
}[keyof T] & string;

type NestedKeys<T> = {
    [K in keyof T]-?: NonNullable<T[K]> extends Date | readonly unknown[] ? never : NonNullable<T[K]> extends object ? K : never
}[keyof T] & string;

/**
 * Explicit associations between a field and the boolean companion that the
 * two-layer load fills in.
 *
 * @example
 * ```typescript
 * const links: RecordLinks<NodeConfig> = {
 *   inherited: { image: 'imageInherited' },
 *   nested: { limits: { inherited: { memory: 'memoryInherited' } } },
 * };
 * ```
 */
export interface RecordLinks<T> {
    inherited?: Partial<Record<keyof T & string, BooleanKeys<T>>>;
    nested?: { [K in NestedKeys<T>]?: RecordLinks<NonNullable<T[K]>> };
}

interface LinkSpec {
    inherited: Record<string, unknown>;
    nested: Record<string, unknown>;
}

const toLinkSpec = (value: unknown): LinkSpec => ({
    inherited: isPlainObject(value) && isPlainObject(value.inherited) ? value.inherited : {},
    nested: isPlainObject(value) && isPlainObject(value.nested) ? value.nested : {},
});

const NIL_ONLY_KINDS: ReadonlySet<SchemaKind> = new Set(['date', 'array', 'map', 'enum']);

const describeField = (
    name: string,
    schema: z.ZodTypeAny,
    path: string,
    nestedLinks: unknown
): FieldDescriptor => {
    const info = inspectSchema(schema);
    if (!info) {
        throw ValidationError.descriptor(path, `unsupported schema type ${schema.constructor.name}`);
    }
    const nilable = info.optional || info.nullable;
    if (NIL_ONLY_KINDS.has(info.kind) && !nilable) {
        throw ValidationError.descriptor(path, `${info.kind} fields must be declared optional or nullable`);
    }
    if (nestedLinks !== undefined && (info.kind !== 'object' || nilable)) {
        throw ValidationError.descriptor(path, 'nested links are only allowed on required object fields');
    }

    const base = {
        name,
        path,
        schema,
        isEmpty: (value: unknown, allowEmpty: boolean) => isEmptyValue(schema, value, allowEmpty),
    };

    if (info.kind === 'object' && !nilable && info.core instanceof z.ZodObject) {
        return { ...base, kind: 'record', layout: describeLayout(info.core.shape, path, nestedLinks) };
    }
    if (info.kind === 'map' && info.core instanceof z.ZodRecord) {
        if (!(info.core.keySchema instanceof z.ZodString)) {
            throw ValidationError.descriptor(path, 'map fields must have string keys');
        }
        return { ...base, kind: 'map', valueSchema: info.core.valueSchema };
    }
    if (info.kind === 'date') {
        return { ...base, kind: 'time' };
    }
    return { ...base, kind: 'leaf' };
}

const describeLayout = (shape: z.ZodRawShape, prefix: string, links: unknown): RecordLayout => {
    const linked = toLinkSpec(links);
    const names = Object.keys(shape);
    const keys = new Map<string, string>();

    for (const name of names) {
        const key = name.toLowerCase();
        const clash = keys.get(key);
        if (clash !== undefined) {
            throw ValidationError.descriptor(joinPath(prefix, name), `clashes with "${clash}" once lower-cased`);
        }
        keys.set(key, name);
    }

    const companions = new Map<string, string>();
    for (const [field, companion] of Object.entries(linked.inherited)) {
        const path = joinPath(prefix, field);
        if (typeof companion !== 'string') {
            throw ValidationError.descriptor(path, 'inherited companion must be a field name');
        }
        if (!(field in shape)) {
            throw ValidationError.descriptor(path, 'linked field does not exist');
        }
        const companionSchema = shape[companion];
        const companionInfo = companionSchema ? inspectSchema(companionSchema) : undefined;
        if (!companionInfo || companionInfo.kind !== 'boolean') {
            throw ValidationError.descriptor(joinPath(prefix, companion), 'inherited companion must be a boolean field');
        }
        companions.set(field, companion);
    }

    for (const nestedName of Object.keys(linked.nested)) {
        if (!(nestedName in shape)) {
            throw ValidationError.descriptor(joinPath(prefix, nestedName), 'linked field does not exist');
        }
    }

    const companionNames = new Set(companions.values());
    const fields: FieldDescriptor[] = [];
    for (const name of names) {
        if (companionNames.has(name)) {
            continue;
        }
        const field = describeField(name, shape[name], joinPath(prefix, name), linked.nested[name]);
        const companion = companions.get(name);
        fields.push(companion === undefined ? field : { ...field, inherited: companion });
    }

    return { fields };
}

const joinPath = (prefix: string, name: string): string => prefix ? `${prefix}.${name}` : name;

/**
 * Builds the field-descriptor list the merge engine walks for a record type.
 *
 * Nil-only kinds (dates, arrays, maps, enums) must be declared optional or
 * nullable, field names must stay distinct once lower-cased, and the schema
 * must accept its own zero value.
 *
 * @param schema - Zod object schema of the record
 * @param links - Inheritance companions, per record level
 * @throws {ValidationError} When the schema cannot be described
 *
 * @example
 * ```typescript
 * const descriptor = describeRecord(z.object({
 *   image: z.string(),
 *   imageInherited: z.boolean(),
 *   env: z.record(z.string(), z.string()).optional(),
 * }), { inherited: { image: 'imageInherited' } });
 * ```
 */
export const describeRecord = <S extends z.ZodRawShape>(
    schema: z.ZodObject<S>,
    links?: RecordLinks<RecordValue<S>>
): RecordDescriptor<S> => {
    const layout = describeLayout(schema.shape, '', links);

    const parsedZero = schema.safeParse(zeroValue(schema));
    if (!parsedZero.success) {
        throw ValidationError.schemaMismatch('The zero value of the record', parsedZero.error);
    }
    const zero = parsedZero.data;

    return {
        ...layout,
        schema,
        zero: () => structuredClone(zero),
    };
}
