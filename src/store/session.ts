import type { z } from 'zod';
import type { StoredRecord } from '../codec/record-codec';
import { NotFoundError } from '../error/NotFoundError';
import type { Options } from '../types';
import type { ScopeCollection } from './types';

/**
 * Opens the instance's collection, runs `task` with it and closes the handle
 * whatever the outcome.
 */
export const withCollection = async <S extends z.ZodRawShape, R>(
    options: Options<S>,
    task: (collection: ScopeCollection) => Promise<R>
): Promise<R> => {
    const collection = await options.store.open(options.collection);
    try {
        return await task(collection);
    } finally {
        await collection.close();
    }
}

/**
 * Reads the stored record of `scope`, or `undefined` when the scope has no
 * entry.
 */
export const findStored = async (collection: ScopeCollection, scope: string): Promise<StoredRecord | undefined> => {
    try {
        const document = await collection.findById(scope);
        return document.val;
    } catch (error: unknown) {
        if (error instanceof NotFoundError) {
            return undefined;
        }
        throw error;
    }
}
