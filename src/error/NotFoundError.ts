/**
 * Error raised by a scope store when the requested document does not exist.
 *
 * The engine absorbs it into a zero-valued record while loading and when
 * removing a single field; every other operation lets it propagate.
 */
export class NotFoundError extends Error {
    public readonly name = 'NotFoundError';

    constructor(
        public readonly collection: string,
        public readonly id: string,
        message?: string
    ) {
        super(message ?? `Scope "${id}" not found in ${collection}`);
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}
