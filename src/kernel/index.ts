export * from './diagnostics.js';
export * from './schema-artifacts.js';
export * from './schemas.js';
export * from './types.js';
