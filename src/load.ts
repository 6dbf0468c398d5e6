import type { z } from 'zod';
import { BASE_SCOPE } from './constants';
import { merge } from './merge/merge';
import type { RecordValue } from './record/descriptor';
import { findStored, withCollection } from './store/session';
import type { Options } from './types';
import { validateRecord, validateScope } from './validate';

/**
 * Layers a pool record onto a copy of the base record, filling in the
 * inheritance companions.
 */
const resolvePool = <S extends z.ZodRawShape>(
    base: RecordValue<S>,
    pool: RecordValue<S>,
    options: Options<S>
): RecordValue<S> => {
    const { merged } = merge(options.descriptor, base, pool, {
        trackInheritance: true,
        shallowMerge: options.defaults.shallowMerge,
        allowEmpty: options.defaults.allowEmpty,
    });
    return merged;
}

/**
 * Resolves the record of `scope`, using `base` as the base layer when given
 * and the stored base record otherwise.
 *
 * A scope without a stored entry reads as the zero record. For the base
 * scope the base layer is returned as is.
 *
 * @throws {ValidationError} When `base` does not satisfy the record schema
 */
export const loadWithBase = async <S extends z.ZodRawShape>(
    scope: string,
    base: RecordValue<S> | undefined,
    options: Options<S>
): Promise<RecordValue<S>> => {
    validateScope(scope);
    const { codec, descriptor, logger } = options;
    const suppliedBase = base === undefined ? undefined : validateRecord(descriptor, base, 'Base record');

    return withCollection(options, async collection => {
        const baseValue = suppliedBase ?? codec.decode(await findStored(collection, BASE_SCOPE));
        if (scope === BASE_SCOPE) {
            logger.debug(`Loaded base record from ${options.collection}`);
            return baseValue;
        }

        const stored = await findStored(collection, scope);
        if (stored === undefined) {
            logger.verbose(`No override stored for pool "${scope}" in ${options.collection}`);
        }
        logger.debug(`Loaded pool "${scope}" from ${options.collection}`);
        return resolvePool(baseValue, codec.decode(stored), options);
    });
}

export const load = async <S extends z.ZodRawShape>(scope: string, options: Options<S>): Promise<RecordValue<S>> => {
    return loadWithBase(scope, undefined, options);
}

export const loadBase = async <S extends z.ZodRawShape>(options: Options<S>): Promise<RecordValue<S>> => {
    return loadWithBase(BASE_SCOPE, undefined, options);
}

/**
 * Resolves every stored pool (or the stored pools named in `filterScopes`)
 * against the base record.
 *
 * The result always holds the base record under `''`. Requested scopes
 * without a stored entry are left out.
 */
export const loadPools = async <S extends z.ZodRawShape>(
    filterScopes: string[] | undefined,
    options: Options<S>
): Promise<Record<string, RecordValue<S>>> => {
    const { codec, logger } = options;

    return withCollection(options, async collection => {
        const base = codec.decode(await findStored(collection, BASE_SCOPE));
        const documents = await collection.find(
            filterScopes && filterScopes.length > 0
                ? { ids: filterScopes, excludeIds: [BASE_SCOPE] }
                : { excludeIds: [BASE_SCOPE] }
        );
        logger.debug(`Loaded ${documents.length} pool(s) from ${options.collection}`);

        const entries: [string, RecordValue<S>][] = [[BASE_SCOPE, base]];
        for (const document of documents) {
            entries.push([document.id, resolvePool(base, codec.decode(document.val), options)]);
        }
        return Object.fromEntries(entries);
    });
}

export const loadAll = async <S extends z.ZodRawShape>(options: Options<S>): Promise<Record<string, RecordValue<S>>> => {
    return loadPools(undefined, options);
}
