export const VERSION = '0.1.0';

/** Identity written to the `Generator` field of WHEEL unless the caller overrides it. */
export const DEFAULT_GENERATOR = `wheel-worker ${VERSION}`;
