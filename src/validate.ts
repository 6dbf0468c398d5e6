import type { z } from "zod";
import { ValidationError } from "./error/ValidationError";
import type { RecordDescriptor, RecordValue } from "./record/descriptor";
import { isPlainObject } from "./record/schema";
import { EngineDefaultsSchema, type EngineDefaults } from "./types";
export { ValidationError };

/**
 * Checks that `value` is a plain object.
 *
 * @throws {ValidationError} When it is not
 */
export const ensureRecord = (value: unknown): Record<string, unknown> => {
    if (!isPlainObject(value)) {
        throw ValidationError.notARecord(value);
    }
    return value;
}

/**
 * Checks that `value` is a record satisfying the descriptor's schema and
 * returns the parsed copy.
 *
 * @param context - Names the value in the error message
 * @throws {ValidationError} When `value` is not an object or fails the schema
 */
export const validateRecord = <S extends z.ZodRawShape>(
    descriptor: RecordDescriptor<S>,
    value: unknown,
    context: string
): RecordValue<S> => {
    ensureRecord(value);
    const parsed = descriptor.schema.safeParse(value);
    if (!parsed.success) {
        throw ValidationError.schemaMismatch(context, parsed.error);
    }
    return parsed.data;
}

/**
 * Checks that a scope id is a string. `''` is the base scope.
 *
 * @throws {ValidationError} When it is not
 */
export const validateScope = (scope: unknown): string => {
    if (typeof scope !== 'string') {
        throw new ValidationError(`Scope must be a string, received: ${typeof scope}`);
    }
    return scope;
}

/**
 * Validates engine settings against {@link EngineDefaultsSchema}.
 *
 * @throws {ValidationError} When a setting has the wrong type
 */
export const validateDefaults = (defaults: unknown): EngineDefaults => {
    const parsed = EngineDefaultsSchema.safeParse(defaults);
    if (!parsed.success) {
        throw ValidationError.schemaMismatch('Engine defaults', parsed.error);
    }
    return parsed.data;
}
