import type { Command } from "commander";
import { z } from "zod";
import type { RecordCodec } from "./codec/record-codec";
import type { RecordDescriptor, RecordValue } from "./record/descriptor";
import type { ScopeStore } from "./store/types";

/**
 * Logger interface for the engine's internal logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Zod schema for the merge settings of an engine instance.
 */
export const EngineDefaultsSchema = z.object({
    /** Only nil values are empty; `0`, `''` and `false` override */
    allowEmpty: z.boolean(),
    /** Merge whole fields instead of recursing into nested records and maps */
    shallowMerge: z.boolean(),
    /** Pools accepted on the command line; empty means any */
    allowedPools: z.array(z.string().min(1)),
});

export type EngineDefaults = z.infer<typeof EngineDefaultsSchema>;

/**
 * Resolved options shared by every operation of an engine instance.
 *
 * @template S - The Zod schema shape of the stored record
 */
export interface Options<S extends z.ZodRawShape> {
    /** Store collection holding the scope entries */
    collection: string;
    defaults: EngineDefaults;
    descriptor: RecordDescriptor<S>;
    codec: RecordCodec<RecordValue<S>>;
    store: ScopeStore;
    logger: Logger;
}

/**
 * Parsed command-line arguments object, typically from Commander.js opts().
 */
export interface Args {
    [key: string]: unknown;
}

/**
 * Pool-scoped configuration for one record type: a base record at scope
 * `''` and per-pool overrides layered on top of it.
 *
 * @template S - The Zod schema shape of the stored record
 */
export interface ScopedConfig<S extends z.ZodRawShape> {
    /** Store collection this instance reads and writes */
    readonly collection: string;
    readonly descriptor: RecordDescriptor<S>;
    /** Sets a custom logger for debugging and error reporting */
    setLogger: (logger: Logger) => void;
    /** Adds the `--pool` option to a Commander.js command */
    configure: (command: Command) => Promise<Command>;
    /** Loads the record of the pool selected on the command line */
    read: (args: Args) => Promise<RecordValue<S>>;

    /** Stores `value` at `scope` as is */
    save: (scope: string, value: RecordValue<S>) => Promise<void>;
    saveBase: (value: RecordValue<S>) => Promise<void>;
    /** Layers `value` onto what is stored at `scope`; not safe under concurrent calls on one scope */
    saveMerge: (scope: string, value: RecordValue<S>) => Promise<void>;
    /** Base record with the pool override layered on top */
    load: (scope: string) => Promise<RecordValue<S>>;
    loadBase: () => Promise<RecordValue<S>>;
    /** Like `load`, with `base` standing in for the stored base record */
    loadWithBase: (scope: string, base?: RecordValue<S>) => Promise<RecordValue<S>>;
    /** Resolved records keyed by scope, `''` holding the base record */
    loadPools: (filterScopes?: string[]) => Promise<Record<string, RecordValue<S>>>;
    loadAll: () => Promise<Record<string, RecordValue<S>>>;
    setField: (scope: string, name: string, value: unknown) => Promise<void>;
    /** Sets the field only when it is absent or `''`; resolves to whether it did */
    setFieldAtomic: (scope: string, name: string, value: unknown) => Promise<boolean>;
    removeField: (scope: string, name: string) => Promise<void>;
    /** Rejects with `NotFoundError` when nothing is stored at `scope` */
    remove: (scope: string) => Promise<void>;
}
