import type { EngineDefaults, Logger } from './types';

/** Scope id of the base record every pool inherits from */
export const BASE_SCOPE = '';

/** Prefix added to a namespace to form its store collection name */
export const COLLECTION_PREFIX = 'scoped_';

/** Path segment of the record container inside a stored document */
export const VALUE_PATH = 'val';

/** Default file encoding for file-backed stores */
export const DEFAULT_ENCODING = 'utf8';

/**
 * Engine settings applied when `create` is not given its own.
 * Zero values are empty, merges recurse, and pools are not restricted.
 */
export const DEFAULT_OPTIONS: EngineDefaults = {
    allowEmpty: false,
    shallowMerge: false,
    allowedPools: [],
}

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
