import type { Command } from 'commander';
import { z } from 'zod';
import { createRecordCodec, type RecordCodec } from './codec/record-codec';
import { configure, read } from './configure';
import { COLLECTION_PREFIX, DEFAULT_LOGGER, DEFAULT_OPTIONS } from './constants';
import { ArgumentError } from './error/ArgumentError';
import { load, loadAll, loadBase, loadPools, loadWithBase } from './load';
import { describeRecord, type RecordLinks, type RecordValue } from './record/descriptor';
import { remove, removeField, save, saveBase, saveMerge, setField, setFieldAtomic } from './save';
import type { ScopeStore } from './store/types';
import type { Args, EngineDefaults, Logger, Options, ScopedConfig } from './types';
import { validateDefaults } from './validate';

export * from './types';
export { ArgumentError, MergeError, NotFoundError, StoreError, ValidationError } from './error';
export { createRecordCodec } from './codec/record-codec';
export type { EncodedField, RecordCodec, StoredRecord } from './codec/record-codec';
export { describeRecord } from './record/descriptor';
export type { FieldDescriptor, RecordDescriptor, RecordLayout, RecordLinks, RecordValue } from './record/descriptor';
export { createEmptinessPolicy, isEmptyValue, isZero, zeroValue } from './merge/emptiness';
export type { EmptinessPolicy } from './merge/emptiness';
export { merge, mergeInto } from './merge/merge';
export type { MergeOptions, MergeResult } from './merge/merge';
export { createMemoryStore } from './store/memory';
export type { MemoryStoreOptions } from './store/memory';
export { createFileStore } from './store/file';
export type { FileStoreOptions } from './store/file';
export type {
    ConditionalMatch,
    ConditionalResult,
    FieldUpdate,
    ScopeCollection,
    ScopeDocument,
    ScopeFilter,
    ScopeStore,
    UpsertResult,
} from './store/types';
export { validatePoolName } from './configure';

const NAMESPACE = /^[A-Za-z0-9_-]+$/;

/**
 * Options accepted by {@link create}.
 *
 * @template S - The Zod schema shape of the stored record
 */
export interface CreateOptions<S extends z.ZodRawShape> {
    /** Name of the configuration; entries live in the `scoped_<namespace>` collection */
    namespace: string;
    /** Zod schema shape of the record */
    configShape: S;
    /** Where scope entries are persisted */
    store: ScopeStore;
    /** Merge settings (default: no allowEmpty, deep merge, any pool) */
    defaults?: Partial<EngineDefaults>;
    /** Inheritance companions filled in when a pool is loaded */
    links?: RecordLinks<RecordValue<S>>;
    /** Serialization between records and stored documents (default: {@link createRecordCodec}) */
    codec?: RecordCodec<RecordValue<S>>;
    /** Custom logger implementation (default: console logger) */
    logger?: Logger;
}

/**
 * Creates a pool-scoped configuration for one record type.
 *
 * The record stored at scope `''` is the base every pool inherits from; a
 * pool stores only the fields it overrides. Loading a pool merges its
 * override onto the base field by field and reports, through the linked
 * companion fields, which values were inherited.
 *
 * @template S - The Zod schema shape of the stored record
 * @throws {ArgumentError} When the namespace is not a non-empty name
 * @throws {ValidationError} When the defaults or the record schema are invalid
 *
 * @example
 * ```typescript
 * import { create, createMemoryStore } from 'scoped-pool-config';
 * import { z } from 'zod';
 *
 * const agents = create({
 *   namespace: 'agent',
 *   store: createMemoryStore(),
 *   configShape: {
 *     image: z.string(),
 *     imageInherited: z.boolean(),
 *     env: z.record(z.string(), z.string()).optional(),
 *   },
 *   links: { inherited: { image: 'imageInherited' } },
 * });
 *
 * await agents.saveBase({ image: 'registry/agent:1.0', imageInherited: false, env: { LOG: 'info' } });
 * await agents.saveMerge('pool-a', { image: '', imageInherited: false, env: { LOG: 'debug' } });
 *
 * const config = await agents.load('pool-a');
 * // { image: 'registry/agent:1.0', imageInherited: true, env: { LOG: 'debug' } }
 * ```
 */
export const create = <S extends z.ZodRawShape>(pOptions: CreateOptions<S>): ScopedConfig<S> => {
    if (!pOptions.namespace || typeof pOptions.namespace !== 'string' || !NAMESPACE.test(pOptions.namespace)) {
        throw new ArgumentError('namespace', `Namespace must be a non-empty name of letters, digits, "_" or "-", received: ${JSON.stringify(pOptions.namespace)}`);
    }

    const defaults = validateDefaults({ ...DEFAULT_OPTIONS, ...pOptions.defaults });
    const descriptor = describeRecord(z.object(pOptions.configShape), pOptions.links);

    const options: Options<S> = {
        collection: `${COLLECTION_PREFIX}${pOptions.namespace}`,
        defaults,
        descriptor,
        codec: pOptions.codec ?? createRecordCodec(descriptor),
        store: pOptions.store,
        logger: pOptions.logger ?? DEFAULT_LOGGER,
    };

    const setLogger = (pLogger: Logger) => {
        options.logger = pLogger;
    }

    options.logger.verbose(`Created scoped configuration ${options.collection} with fields: ${descriptor.fields.map(field => field.name).join(', ')}`);

    return {
        collection: options.collection,
        descriptor,
        setLogger,
        configure: (command: Command) => configure(command, options),
        read: (args: Args) => read(args, options),
        save: (scope, value) => save(scope, value, options),
        saveBase: (value) => saveBase(value, options),
        saveMerge: (scope, value) => saveMerge(scope, value, options),
        load: (scope) => load(scope, options),
        loadBase: () => loadBase(options),
        loadWithBase: (scope, base) => loadWithBase(scope, base, options),
        loadPools: (filterScopes) => loadPools(filterScopes, options),
        loadAll: () => loadAll(options),
        setField: (scope, name, value) => setField(scope, name, value, options),
        setFieldAtomic: (scope, name, value) => setFieldAtomic(scope, name, value, options),
        removeField: (scope, name) => removeField(scope, name, options),
        remove: (scope) => remove(scope, options),
    };
}
