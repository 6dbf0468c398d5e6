/**
 * Error thrown when an argument passed to the library or supplied on the
 * command line is invalid.
 *
 * @example
 * ```typescript
 * throw new ArgumentError('pool', 'Pool name cannot be empty');
 * ```
 */
export class ArgumentError extends Error {
    public readonly name = 'ArgumentError';

    /**
     * @param argument - Name of the offending argument
     * @param message - Human-readable error message
     */
    constructor(
        public readonly argument: string,
        message: string
    ) {
        super(message);
        Object.setPrototypeOf(this, ArgumentError.prototype);
    }
}
