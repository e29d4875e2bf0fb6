// Runtime-neutral entrypoint for @reflex/shared.
//
// Node-only helpers (node:crypto hashing) live in "@reflex/shared/server".

export * from './address';
export * from './errors';
export * from './format';
export * from './math';
export * from './schemas';
