import type { StoredRecord } from '../codec/record-codec';

/**
 * A persisted scope entry. `id` is the scope (`''` for the base record) and
 * `val` the encoded record.
 */
export interface ScopeDocument {
    id: string;
    val: StoredRecord;
}

/**
 * Selects the documents returned by {@link ScopeCollection.find}.
 * `ids` keeps only the listed scopes, `excludeIds` drops the listed ones.
 */
export interface ScopeFilter {
    ids?: string[];
    excludeIds?: string[];
}

/**
 * Condition of a {@link ScopeCollection.conditionalUpsert}: the document
 * `id` matches when the field at `path` is absent or equal to
 * `absentOrEquals`.
 */
export interface ConditionalMatch {
    id: string;
    path: string;
    absentOrEquals: unknown;
}

export interface FieldUpdate {
    path: string;
    value: unknown;
}

export type UpsertResult = 'created' | 'updated';

/**
 * `duplicate` means the document exists but its field did not match, so the
 * upsert would have inserted a second document with the same id.
 */
export type ConditionalResult = 'applied' | 'duplicate';

/**
 * Handle on one keyed document collection. Field paths are lower-cased,
 * dot-separated and start with the `val` segment.
 *
 * Every method that targets a missing document (other than the upserts)
 * rejects with `NotFoundError`; I/O failures reject with `StoreError`.
 */
export interface ScopeCollection {
    readonly name: string;
    findById(id: string): Promise<ScopeDocument>;
    upsertById(id: string, val: StoredRecord): Promise<UpsertResult>;
    /** Check-and-set in a single atomic step */
    conditionalUpsert(match: ConditionalMatch, update: FieldUpdate): Promise<ConditionalResult>;
    /** Matching documents, sorted by id */
    find(filter: ScopeFilter): Promise<ScopeDocument[]>;
    updateFieldById(id: string, path: string, value: unknown, options?: { upsert?: boolean }): Promise<UpsertResult>;
    unsetFieldById(id: string, path: string): Promise<void>;
    removeById(id: string): Promise<void>;
    close(): Promise<void>;
}

/**
 * Source of collection handles. Each engine call opens its own handle and
 * closes it when done.
 */
export interface ScopeStore {
    open(collection: string): Promise<ScopeCollection>;
}
