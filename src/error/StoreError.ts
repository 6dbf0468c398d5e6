/**
 * Error raised when a scope store cannot complete an operation because of an
 * I/O, connection or parse failure. Propagated verbatim by the engine.
 */
export class StoreError extends Error {
    public readonly name = 'StoreError';

    constructor(
        public readonly operation: string,
        message: string,
        public readonly originalError?: Error
    ) {
        super(message);
        Object.setPrototypeOf(this, StoreError.prototype);
    }

    /**
     * Wraps an unknown failure thrown while running `operation`.
     */
    static wrap(operation: string, target: string, error: unknown): StoreError {
        const original = error instanceof Error ? error : new Error(String(error));
        return new StoreError(operation, `Failed to ${operation} ${target}: ${original.message}`, original);
    }
}
