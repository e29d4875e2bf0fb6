export * from './env';
export * from './genesis';
