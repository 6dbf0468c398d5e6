import type { StoredRecord } from '../codec/record-codec';
import { NotFoundError } from '../error/NotFoundError';
import { StoreError } from '../error/StoreError';
import type { Logger } from '../types';
import { getFieldValue, setFieldValue, unsetFieldValue } from './paths';
import type { ScopeCollection, ScopeDocument, ScopeStore } from './types';

export interface MemoryStoreOptions {
    logger?: Logger;
}

/**
 * Creates a store that keeps every collection in process memory.
 *
 * Documents are deep-copied on the way in and out. Each operation runs to
 * completion without yielding, so `conditionalUpsert` is atomic with respect
 * to every other caller in the process.
 */
export const createMemoryStore = (options: MemoryStoreOptions = {}): ScopeStore => {
    const collections = new Map<string, Map<string, StoredRecord>>();
    const log = options.logger?.silly ?? (() => { });

    const open = async (name: string): Promise<ScopeCollection> => {
        let documents = collections.get(name);
        if (!documents) {
            documents = new Map();
            collections.set(name, documents);
        }
        const docs = documents;
        let closed = false;

        const checkOpen = (operation: string) => {
            if (closed) {
                throw new StoreError(operation, `Collection ${name} is closed`);
            }
        }

        const read = (id: string): ScopeDocument => {
            const val = docs.get(id);
            if (val === undefined) {
                throw new NotFoundError(name, id);
            }
            return { id, val: structuredClone(val) };
        }

        const write = (document: ScopeDocument) => {
            docs.set(document.id, structuredClone(document.val));
        }

        log(`Opened memory collection ${name}`);

        return {
            name,
            findById: async (id) => {
                checkOpen('find');
                return read(id);
            },
            upsertById: async (id, val) => {
                checkOpen('upsert');
                const existed = docs.has(id);
                write({ id, val });
                return existed ? 'updated' : 'created';
            },
            conditionalUpsert: async (match, update) => {
                checkOpen('conditional upsert');
                const existing = docs.has(match.id) ? read(match.id) : undefined;
                if (existing) {
                    const current = getFieldValue(existing, match.path);
                    if (current !== undefined && current !== match.absentOrEquals) {
                        return 'duplicate';
                    }
                }
                const document: ScopeDocument = existing ?? { id: match.id, val: {} };
                setFieldValue(document, update.path, structuredClone(update.value));
                write(document);
                return 'applied';
            },
            find: async (filter) => {
                checkOpen('find');
                return [...docs.keys()]
                    .filter(id => !filter.ids || filter.ids.includes(id))
                    .filter(id => !filter.excludeIds || !filter.excludeIds.includes(id))
                    .sort()
                    .map(read);
            },
            updateFieldById: async (id, path, value, updateOptions = {}) => {
                checkOpen('update field');
                const existed = docs.has(id);
                if (!existed && !updateOptions.upsert) {
                    throw new NotFoundError(name, id);
                }
                const document: ScopeDocument = existed ? read(id) : { id, val: {} };
                setFieldValue(document, path, structuredClone(value));
                write(document);
                return existed ? 'updated' : 'created';
            },
            unsetFieldById: async (id, path) => {
                checkOpen('unset field');
                const document = read(id);
                unsetFieldValue(document, path);
                write(document);
            },
            removeById: async (id) => {
                checkOpen('remove');
                if (!docs.delete(id)) {
                    throw new NotFoundError(name, id);
                }
            },
            close: async () => {
                closed = true;
            },
        };
    }

    return { open };
}
