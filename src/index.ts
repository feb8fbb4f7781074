export * from './kernel/index.js';
export * from './ssdl/index.js';
