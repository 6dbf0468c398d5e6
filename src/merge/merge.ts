import { z } from 'zod';
import { MergeError } from '../error/MergeError';
import { ValidationError } from '../error/ValidationError';
import type { FieldDescriptor, MapField, RecordDescriptor, RecordField, RecordLayout, RecordValue } from '../record/descriptor';
import { isPlainObject, isUnsafeKey } from '../record/schema';
import { createEmptinessPolicy, zeroValue, type EmptinessPolicy } from './emptiness';

/**
 * Controls how an override is layered onto a base record.
 */
export interface MergeOptions {
    /** Write the inheritance companion of every linked field (default: false) */
    trackInheritance?: boolean;
    /** Replace whole fields instead of recursing into them (default: false) */
    shallowMerge?: boolean;
    /** Treat zero scalars as meaningful overrides (default: false) */
    allowEmpty?: boolean;
}

export interface MergeResult<T> {
    merged: T;
    /** True when at least one field took its value from the override */
    overridden: boolean;
}

interface MergeContext {
    policy: EmptinessPolicy;
    trackInheritance: boolean;
    shallowMerge: boolean;
}

const copyValue = (path: string, value: unknown): unknown => {
    try {
        return structuredClone(value);
    } catch (error: unknown) {
        throw new MergeError(path, error instanceof Error ? error.message : String(error));
    }
}

const assign = (
    target: Record<string, unknown>,
    key: string,
    schema: z.ZodTypeAny,
    value: unknown,
    path: string
): void => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new MergeError(path, parsed.error.issues.map(issue => issue.message).join('; '));
    }
    target[key] = copyValue(path, value);
}

const mergeMap = (
    field: MapField,
    target: Record<string, unknown>,
    overrideMap: unknown,
    context: MergeContext
): boolean => {
    if (overrideMap === undefined || overrideMap === null) {
        return false;
    }
    if (!isPlainObject(overrideMap)) {
        throw new MergeError(field.path, 'expected a map');
    }

    let merged = false;
    for (const [key, value] of Object.entries(overrideMap)) {
        if (isUnsafeKey(key)) {
            throw new MergeError(`${field.path}.${key}`, 'unsafe map key');
        }
        const current = target[field.name];
        if (context.policy.isEmpty(field.valueSchema, value)) {
            if (isPlainObject(current)) {
                delete current[key];
            }
            continue;
        }
        let map: Record<string, unknown>;
        if (isPlainObject(current)) {
            map = current;
        } else {
            map = {};
            target[field.name] = map;
        }
        assign(map, key, field.valueSchema, value, `${field.path}.${key}`);
        merged = true;
    }
    return merged;
}

const mergeNested = (
    field: RecordField,
    target: Record<string, unknown>,
    overrideValue: unknown,
    context: MergeContext
): boolean => {
    if (overrideValue === undefined || overrideValue === null) {
        return false;
    }
    if (!isPlainObject(overrideValue)) {
        throw new MergeError(field.path, 'expected an object');
    }
    const current = target[field.name];
    let nested: Record<string, unknown>;
    if (isPlainObject(current)) {
        nested = current;
    } else {
        const zero = zeroValue(field.schema);
        nested = isPlainObject(zero) ? zero : {};
        target[field.name] = nested;
    }
    return mergeLayout(field.layout, nested, overrideValue, context);
}

const mergeField = (
    field: FieldDescriptor,
    target: Record<string, unknown>,
    overrideValue: unknown,
    context: MergeContext
): boolean => {
    switch (field.kind) {
        case 'record':
            return mergeNested(field, target, overrideValue, context);
        case 'map':
            return mergeMap(field, target, overrideValue, context);
        case 'time':
        case 'leaf':
            if (field.isEmpty(overrideValue, context.policy.allowEmpty)) {
                return false;
            }
            assign(target, field.name, field.schema, overrideValue, field.path);
            return true;
    }
}

const mergeLayout = (
    layout: RecordLayout,
    target: Record<string, unknown>,
    override: Record<string, unknown>,
    context: MergeContext
): boolean => {
    let merged = false;
    for (const field of layout.fields) {
        const overrideValue = override[field.name];

        if (context.shallowMerge) {
            if (!field.isEmpty(overrideValue, context.policy.allowEmpty)) {
                assign(target, field.name, field.schema, overrideValue, field.path);
                merged = true;
            }
            continue;
        }

        const fieldMerged = mergeField(field, target, overrideValue, context);
        if (context.trackInheritance && field.inherited !== undefined) {
            target[field.inherited] = !fieldMerged;
        }
        if (fieldMerged) {
            merged = true;
        }
    }
    return merged;
}

const contextOf = (options: MergeOptions): MergeContext => ({
    policy: createEmptinessPolicy(options.allowEmpty ?? false),
    trackInheritance: options.trackInheritance ?? false,
    shallowMerge: options.shallowMerge ?? false,
});

/**
 * Layers `override` onto `target` in place.
 *
 * Non-empty override values replace the target's, nested records are merged
 * field by field, maps key by key (an empty value deletes the key), and
 * dates as a whole. When a value fails its field schema a `MergeError` is
 * thrown; fields merged before it stay applied.
 *
 * @returns Whether any field took its value from the override
 * @throws {ValidationError} When either argument is not an object
 * @throws {MergeError} When an override value cannot be assigned
 */
export const mergeInto = <S extends z.ZodRawShape>(
    descriptor: RecordDescriptor<S>,
    target: RecordValue<S>,
    override: RecordValue<S>,
    options: MergeOptions = {}
): boolean => {
    if (!isPlainObject(target)) {
        throw ValidationError.notARecord(target);
    }
    if (!isPlainObject(override)) {
        throw ValidationError.notARecord(override);
    }
    return mergeLayout(descriptor, target, override, contextOf(options));
}

/**
 * Returns a copy of `base` with `override` layered on top. Neither argument
 * is modified.
 *
 * @example
 * ```typescript
 * const { merged } = merge(descriptor, { limit: 1, env: { a: '1', b: '2' } }, { limit: 0, env: { a: '', c: '3' } });
 * // merged: { limit: 1, env: { b: '2', c: '3' } }
 * ```
 */
export const merge = <S extends z.ZodRawShape>(
    descriptor: RecordDescriptor<S>,
    base: RecordValue<S>,
    override: RecordValue<S>,
    options: MergeOptions = {}
): MergeResult<RecordValue<S>> => {
    const merged = structuredClone(base);
    const overridden = mergeInto(descriptor, merged, override, options);
    return { merged, overridden };
}
