import { ZodError } from 'zod';

/**
 * Error thrown when a value handed to the engine is not a usable record:
 * it is not an object, it does not satisfy the record schema, or a record
 * descriptor cannot be built from the schema it was given.
 *
 * Validation errors are never retried.
 */
export class ValidationError extends Error {
    public readonly name = 'ValidationError';

    constructor(
        message: string,
        public readonly details?: ZodError
    ) {
        super(message);
        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    /** The value is not a plain object. */
    static notARecord(received: unknown): ValidationError {
        const kind = received === null ? 'null' : Array.isArray(received) ? 'array' : typeof received;
        return new ValidationError(`A record object is required as value, received: ${kind}`);
    }

    /** The value is an object but does not match the record schema. */
    static schemaMismatch(context: string, error: ZodError): ValidationError {
        const issues = error.issues
            .map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`)
            .join('; ');
        return new ValidationError(`${context} does not match the record schema (${issues})`, error);
    }

    /** The schema cannot be described as a mergeable record. */
    static descriptor(path: string, message: string): ValidationError {
        return new ValidationError(`Invalid record field "${path}": ${message}`);
    }

    /**
     * Returns the message followed by each schema issue on its own line.
     */
    public getDetailedMessage(): string {
        if (!this.details) {
            return this.message;
        }
        const issues = this.details.issues
            .map(issue => `  - ${issue.path.join('.') || 'root'}: ${issue.message}`)
            .join('\n');
        return `${this.message}\n\nValidation errors:\n${issues}`;
    }
}
