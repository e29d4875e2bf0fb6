// Node/server-only entrypoint for @reflex/shared

export * from './address';
export * from './errors';
export * from './format';
export * from './math';
export * from './schemas';
export * from './hash';
