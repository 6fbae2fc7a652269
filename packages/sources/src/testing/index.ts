export * from './fake-source.js';
