import * as path from 'node:path';
import * as yaml from 'js-yaml';
import type { StoredRecord } from '../codec/record-codec';
import { DEFAULT_ENCODING } from '../constants';
import { NotFoundError } from '../error/NotFoundError';
import { StoreError } from '../error/StoreError';
import { isPlainObject } from '../record/schema';
import type { Logger } from '../types';
import * as Storage from '../util/storage';
import { getFieldValue, setFieldValue, unsetFieldValue } from './paths';
import type { ConditionalResult, ScopeCollection, ScopeDocument, ScopeStore, UpsertResult } from './types';

/**
 * Options for a YAML file backed store.
 */
export interface FileStoreOptions {
    /** Directory holding one `<collection>.yaml` file per collection */
    directory: string;
    /** File encoding (default: 'utf8') */
    encoding?: BufferEncoding;
    logger?: Logger;
}

const COLLECTION_NAME = /^[A-Za-z0-9_.-]+$/;

type Documents = Map<string, StoredRecord>;

/**
 * Creates a store that keeps each collection in a YAML file mapping scope id
 * to its encoded record:
 *
 * ```yaml
 * '':
 *   image: registry/agent:1.0
 * pool-a:
 *   image: registry/agent:2.0
 * ```
 *
 * Every operation on a collection reads the file, applies the change and
 * writes it back through a temporary file and a rename. Operations on the
 * same file are queued one after another inside the process, which is what
 * makes `conditionalUpsert` atomic. Separate processes sharing a directory
 * get no such guarantee.
 */
export const createFileStore = (options: FileStoreOptions): ScopeStore => {
    const { directory, encoding = DEFAULT_ENCODING, logger } = options;
    const storage = Storage.create({ log: logger?.debug ?? (() => { }) });
    const queues = new Map<string, Promise<void>>();

    const serialize = <T>(file: string, task: () => Promise<T>): Promise<T> => {
        const previous = queues.get(file) ?? Promise.resolve();
        const run = previous.then(() => task());
        // The queue only tracks completion; callers see the outcome through `run`.
        queues.set(file, run.then(() => undefined, () => undefined));
        return run;
    }

    const readDocuments = async (file: string): Promise<Documents> => {
        let content: string;
        try {
            if (!await storage.exists(file)) {
                return new Map();
            }
            if (!await storage.isFileReadable(file)) {
                throw new StoreError('read', `Collection file is not readable: ${file}`);
            }
            content = await storage.readFile(file, encoding);
        } catch (error: unknown) {
            if (error instanceof StoreError) {
                throw error;
            }
            throw StoreError.wrap('read', file, error);
        }

        let parsed: unknown;
        try {
            parsed = yaml.load(content);
        } catch (error: unknown) {
            throw StoreError.wrap('parse', file, error);
        }
        if (parsed === undefined || parsed === null) {
            return new Map();
        }
        if (!isPlainObject(parsed)) {
            throw new StoreError('parse', `Collection file does not hold a mapping: ${file}`);
        }

        const documents: Documents = new Map();
        for (const [id, val] of Object.entries(parsed)) {
            if (!isPlainObject(val)) {
                throw new StoreError('parse', `Scope "${id}" in ${file} does not hold a mapping`);
            }
            documents.set(id, val);
        }
        return documents;
    }

    const writeDocuments = async (file: string, documents: Documents): Promise<void> => {
        let content: string;
        try {
            content = yaml.dump(Object.fromEntries(documents), {
                indent: 2,
                lineWidth: 120,
                noRefs: true,
                sortKeys: true,
            });
        } catch (error: unknown) {
            throw StoreError.wrap('serialize', file, error);
        }

        const temporary = `${file}.${process.pid}.tmp`;
        try {
            await storage.createDirectory(directory);
            await storage.writeFile(temporary, content, encoding);
            await storage.rename(temporary, file);
        } catch (error: unknown) {
            await storage.deleteFile(temporary);
            throw StoreError.wrap('write', file, error);
        }
    }

    const open = async (name: string): Promise<ScopeCollection> => {
        if (!COLLECTION_NAME.test(name)) {
            throw new StoreError('open', `Invalid collection name: "${name}"`);
        }
        const file = path.join(directory, `${name}.yaml`);
        let closed = false;

        const withDocuments = <T>(operation: string, task: (documents: Documents) => Promise<T>): Promise<T> => {
            if (closed) {
                return Promise.reject(new StoreError(operation, `Collection ${name} is closed`));
            }
            return serialize(file, async () => task(await readDocuments(file)));
        }

        const documentOf = (documents: Documents, id: string): ScopeDocument => {
            const val = documents.get(id);
            if (val === undefined) {
                throw new NotFoundError(name, id);
            }
            return { id, val };
        }

        logger?.verbose(`Opened file collection ${name} at ${file}`);

        return {
            name,
            findById: (id) => withDocuments('find', async documents => documentOf(documents, id)),
            upsertById: (id, val) => withDocuments<UpsertResult>('upsert', async documents => {
                const existed = documents.has(id);
                documents.set(id, val);
                await writeDocuments(file, documents);
                return existed ? 'updated' : 'created';
            }),
            conditionalUpsert: (match, update) => withDocuments<ConditionalResult>('conditional upsert', async documents => {
                const existing = documents.has(match.id) ? documentOf(documents, match.id) : undefined;
                if (existing) {
                    const current = getFieldValue(existing, match.path);
                    if (current !== undefined && current !== match.absentOrEquals) {
                        return 'duplicate';
                    }
                }
                const document: ScopeDocument = existing ?? { id: match.id, val: {} };
                setFieldValue(document, update.path, update.value);
                documents.set(document.id, document.val);
                await writeDocuments(file, documents);
                return 'applied';
            }),
            find: (filter) => withDocuments('find', async documents => [...documents.keys()]
                .filter(id => !filter.ids || filter.ids.includes(id))
                .filter(id => !filter.excludeIds || !filter.excludeIds.includes(id))
                .sort()
                .map(id => documentOf(documents, id))),
            updateFieldById: (id, fieldPath, value, updateOptions = {}) => withDocuments<UpsertResult>('update field', async documents => {
                const existed = documents.has(id);
                if (!existed && !updateOptions.upsert) {
                    throw new NotFoundError(name, id);
                }
                const document: ScopeDocument = existed ? documentOf(documents, id) : { id, val: {} };
                setFieldValue(document, fieldPath, value);
                documents.set(id, document.val);
                await writeDocuments(file, documents);
                return existed ? 'updated' : 'created';
            }),
            unsetFieldById: (id, fieldPath) => withDocuments('unset field', async documents => {
                unsetFieldValue(documentOf(documents, id), fieldPath);
                await writeDocuments(file, documents);
            }),
            removeById: (id) => withDocuments('remove', async documents => {
                if (!documents.delete(id)) {
                    throw new NotFoundError(name, id);
                }
                await writeDocuments(file, documents);
            }),
            close: async () => {
                closed = true;
            },
        };
    }

    return { open };
}
