export * from './blob-store.js';
export * from './azure-blob-store.js';
export * from './memory-blob-store.js';
export * from './paths.js';
export * from './rotation.js';
export * from './writer.js';
