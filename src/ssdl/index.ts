export * from './attribute-catalog.js';
export * from './compile-queries.js';
export * from './compiler-config.js';
export * from './compiler-core.js';
export * from './compiler-diagnostics.js';
export * from './compiler-logger.js';
export * from './descriptor-doc.js';
export * from './diagnostic-codes.js';
export * from './diagnostic-source-map.js';
export * from './document-tree.js';
export * from './emit-ir.js';
export * from './extract-entities.js';
export * from './load-descriptor-source.js';
export * from './parser.js';
export * from './provider-registry.js';
export * from './resolve-references.js';
export * from './source-map.js';
export * from './source-reader.js';
export * from './version-gate.js';
export * from './visualization-registry.js';
