import type { z } from 'zod';
import { BASE_SCOPE } from './constants';
import { NotFoundError } from './error/NotFoundError';
import { mergeInto } from './merge/merge';
import type { RecordValue } from './record/descriptor';
import { findStored, withCollection } from './store/session';
import type { Options } from './types';
import { ensureRecord, validateRecord, validateScope } from './validate';

/**
 * Stores `value` at `scope` without merging.
 *
 * @throws {ValidationError} When `value` is not a record of the described type
 */
export const save = async <S extends z.ZodRawShape>(
    scope: string,
    value: RecordValue<S>,
    options: Options<S>
): Promise<void> => {
    validateScope(scope);
    const record = validateRecord(options.descriptor, value, 'Saved value');
    const stored = options.codec.encode(record);

    await withCollection(options, async collection => {
        const result = await collection.upsertById(scope, stored);
        options.logger.debug(`Saved scope "${scope}" in ${options.collection} (${result})`);
    });
}

export const saveBase = async <S extends z.ZodRawShape>(value: RecordValue<S>, options: Options<S>): Promise<void> => {
    return save(BASE_SCOPE, value, options);
}

/**
 * Layers `value` onto the record stored at `scope` and stores the result.
 * Inheritance companions are left alone.
 *
 * This is a read-modify-write without any guard: two concurrent calls on
 * the same scope can lose one of the updates.
 *
 * @throws {ValidationError} When `value` is not an object
 * @throws {MergeError} When a field of `value` does not fit the record type
 */
export const saveMerge = async <S extends z.ZodRawShape>(
    scope: string,
    value: RecordValue<S>,
    options: Options<S>
): Promise<void> => {
    validateScope(scope);
    ensureRecord(value);
    const { codec, descriptor, defaults } = options;

    await withCollection(options, async collection => {
        const current = codec.decode(await findStored(collection, scope));
        const overridden = mergeInto(descriptor, current, value, {
            trackInheritance: false,
            shallowMerge: defaults.shallowMerge,
            allowEmpty: defaults.allowEmpty,
        });
        const result = await collection.upsertById(scope, codec.encode(current));
        options.logger.debug(`Merged into scope "${scope}" in ${options.collection} (${result}, overridden: ${overridden})`);
    });
}

/**
 * Sets one field of the record stored at `scope`, creating the entry when
 * needed. `name` is a case-insensitive dotted path.
 *
 * @throws {ValidationError} When the name is unsafe or the value does not fit
 * the field it names
 */
export const setField = async <S extends z.ZodRawShape>(
    scope: string,
    name: string,
    value: unknown,
    options: Options<S>
): Promise<void> => {
    validateScope(scope);
    const field = options.codec.encodeField(name, value);

    await withCollection(options, async collection => {
        await collection.updateFieldById(scope, field.path, field.value, { upsert: true });
        options.logger.debug(`Set ${field.path} of scope "${scope}" in ${options.collection}`);
    });
}

/**
 * Sets one field only when it is absent or holds `''`, as a single atomic
 * store operation.
 *
 * @returns `false` when the field was already occupied
 */
export const setFieldAtomic = async <S extends z.ZodRawShape>(
    scope: string,
    name: string,
    value: unknown,
    options: Options<S>
): Promise<boolean> => {
    validateScope(scope);
    const field = options.codec.encodeField(name, value);

    return withCollection(options, async collection => {
        const result = await collection.conditionalUpsert(
            { id: scope, path: field.path, absentOrEquals: '' },
            { path: field.path, value: field.value }
        );
        options.logger.debug(`Atomic set of ${field.path} on scope "${scope}" in ${options.collection}: ${result}`);
        return result === 'applied';
    });
}

/**
 * Unsets one field. A missing entry or field counts as success.
 */
export const removeField = async <S extends z.ZodRawShape>(
    scope: string,
    name: string,
    options: Options<S>
): Promise<void> => {
    validateScope(scope);
    const path = options.codec.fieldPath(name);

    await withCollection(options, async collection => {
        try {
            await collection.unsetFieldById(scope, path);
            options.logger.debug(`Removed ${path} from scope "${scope}" in ${options.collection}`);
        } catch (error: unknown) {
            if (!(error instanceof NotFoundError)) {
                throw error;
            }
            options.logger.verbose(`Scope "${scope}" not found in ${options.collection}, nothing to remove`);
        }
    });
}

/**
 * Deletes the whole entry of `scope`.
 *
 * @throws {NotFoundError} When nothing is stored at `scope`
 */
export const remove = async <S extends z.ZodRawShape>(scope: string, options: Options<S>): Promise<void> => {
    validateScope(scope);

    await withCollection(options, async collection => {
        await collection.removeById(scope);
        options.logger.debug(`Removed scope "${scope}" from ${options.collection}`);
    });
}
