/**
 * Error thrown when an override value cannot be assigned into the merged
 * record. Fields merged before the failing one stay applied.
 */
export class MergeError extends Error {
    public readonly name = 'MergeError';

    constructor(
        public readonly path: string,
        message: string
    ) {
        super(`error trying to set field ${path}: ${message}`);
        Object.setPrototypeOf(this, MergeError.prototype);
    }
}
