import type { Command } from "commander";
import type { z } from "zod";
import { BASE_SCOPE } from "./constants";
import { ArgumentError } from "./error/ArgumentError";
import { load } from "./load";
import type { RecordValue } from "./record/descriptor";
import type { Args, Options } from "./types";
export { ArgumentError };

/**
 * Validates a pool name given on the command line.
 *
 * @param pool - The pool name to validate
 * @param allowedPools - Accepted pool names; an empty list accepts any
 * @returns The trimmed pool name
 * @throws {ArgumentError} When the name is empty, contains a NUL character
 * or is not one of `allowedPools`
 *
 * @example
 * ```typescript
 * validatePoolName(' pool-a ', ['pool-a']); // Returns 'pool-a'
 * validatePoolName('pool-b', ['pool-a']); // Throws ArgumentError
 * ```
 */
export function validatePoolName(pool: string, allowedPools: string[]): string {
    if (typeof pool !== 'string') {
        throw new ArgumentError('pool', 'Pool name must be a string');
    }

    const trimmed = pool.trim();
    if (trimmed.length === 0) {
        throw new ArgumentError('pool', 'Pool name cannot be empty or whitespace only');
    }

    if (trimmed.includes('\0')) {
        throw new ArgumentError('pool', 'Pool name contains invalid null character');
    }

    if (allowedPools.length > 0 && !allowedPools.includes(trimmed)) {
        throw new ArgumentError('pool', `Pool "${trimmed}" is not one of: ${allowedPools.join(', ')}`);
    }

    return trimmed;
}

/**
 * Adds the `-p, --pool <pool>` option to a Commander.js command. Without the
 * option the base configuration is read.
 *
 * @throws {ArgumentError} When `command` is not a Commander.js command
 *
 * @example
 * ```typescript
 * const program = await configure(new Command(), options);
 * program.parse(['node', 'agent', '--pool', 'pool-a']);
 * const config = await read(program.opts(), options);
 * ```
 */
export const configure = async <S extends z.ZodRawShape>(
    command: Command,
    options: Options<S>
): Promise<Command> => {
    if (!command) {
        throw new ArgumentError('command', 'Command instance is required');
    }

    if (typeof command.option !== 'function') {
        throw new ArgumentError('command', 'Command must be a valid Commander.js Command instance');
    }

    return command.option(
        '-p, --pool <pool>',
        'Pool whose configuration is resolved (default: the base configuration)',
        (value: string) => {
            try {
                return validatePoolName(value, options.defaults.allowedPools);
            } catch (error) {
                if (error instanceof ArgumentError) {
                    throw new ArgumentError('pool', `Invalid --pool: ${error.message}`);
                }
                throw error;
            }
        }
    );
}

/**
 * Loads the configuration of the pool named in `args.pool`, or the base
 * configuration when no pool was given.
 *
 * @throws {ArgumentError} When `args.pool` is not a valid pool name
 */
export const read = async <S extends z.ZodRawShape>(args: Args, options: Options<S>): Promise<RecordValue<S>> => {
    const pool = args.pool;
    if (pool === undefined) {
        options.logger.verbose('No pool selected, reading the base configuration');
        return load(BASE_SCOPE, options);
    }
    if (typeof pool !== 'string') {
        throw new ArgumentError('pool', 'Pool name must be a string');
    }
    return load(validatePoolName(pool, options.defaults.allowedPools), options);
}
