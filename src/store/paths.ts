import { VALUE_PATH } from '../constants';
import { StoreError } from '../error/StoreError';
import { isPlainObject, isUnsafeKey, ownValue } from '../record/schema';
import type { ScopeDocument } from './types';

/**
 * Splits a stored field path and checks that it points inside the record
 * container.
 *
 * @throws {StoreError} When the path is empty, does not start with `val` or
 * names a prototype property
 */
export const splitFieldPath = (path: string): string[] => {
    const segments = path.split('.');
    if (segments.length < 2 || segments[0] !== VALUE_PATH || segments.some(segment => segment.length === 0)) {
        throw new StoreError('resolve field path', `Invalid field path: "${path}"`);
    }
    // Prevent prototype pollution via dangerous property names in field paths
    if (segments.some(isUnsafeKey)) {
        throw new StoreError('resolve field path', `Unsafe field path: "${path}"`);
    }
    return segments.slice(1);
}

/**
 * Gets a nested value from a document using dot notation.
 */
export const getFieldValue = (document: ScopeDocument, path: string): unknown => {
    let current: unknown = document.val;
    for (const segment of splitFieldPath(path)) {
        if (!isPlainObject(current)) {
            return undefined;
        }
        current = ownValue(current, segment);
    }
    return current;
}

/**
 * Sets a nested value in a document using dot notation, creating the
 * intermediate objects that are missing.
 *
 * @throws {StoreError} When an intermediate segment holds a non-object value
 */
export const setFieldValue = (document: ScopeDocument, path: string, value: unknown): void => {
    const segments = splitFieldPath(path);
    const last = segments[segments.length - 1];
    let target: Record<string, unknown> = document.val;
    for (const segment of segments.slice(0, -1)) {
        const next = ownValue(target, segment);
        if (next === undefined || next === null) {
            const created: Record<string, unknown> = {};
            target[segment] = created;
            target = created;
        } else if (isPlainObject(next)) {
            target = next;
        } else {
            throw new StoreError('set field', `Cannot create field "${path}": "${segment}" is not an object`);
        }
    }
    target[last] = value;
}

/**
 * Removes a nested value from a document. Missing intermediate objects are
 * ignored.
 */
export const unsetFieldValue = (document: ScopeDocument, path: string): void => {
    const segments = splitFieldPath(path);
    const last = segments[segments.length - 1];
    let target: unknown = document.val;
    for (const segment of segments.slice(0, -1)) {
        if (!isPlainObject(target)) {
            return;
        }
        target = ownValue(target, segment);
    }
    if (isPlainObject(target)) {
        delete target[last];
    }
}
